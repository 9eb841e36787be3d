export const FIELD_SERVICE_ORDER_RESOURCE = 'field_service.order'

export type ServiceOrderNavigation =
  | { type: 'close' }
  | { type: 'record'; resource: typeof FIELD_SERVICE_ORDER_RESOURCE; recordId: string }
  | { type: 'list'; resource: typeof FIELD_SERVICE_ORDER_RESOURCE; filter: { id: { $in: string[] } } }

export function buildServiceOrderNavigation(serviceOrderIds: readonly string[]): ServiceOrderNavigation {
  const ids = Array.from(new Set(serviceOrderIds))
  if (ids.length === 0) return { type: 'close' }
  if (ids.length === 1) return { type: 'record', resource: FIELD_SERVICE_ORDER_RESOURCE, recordId: ids[0] }
  return { type: 'list', resource: FIELD_SERVICE_ORDER_RESOURCE, filter: { id: { $in: ids } } }
}
