export type EventCategory = 'crud' | 'lifecycle' | 'system' | 'custom'

export interface EventDefinition {
  /** Event name pattern (e.g., 'sales.orders.confirmed') */
  id: string
  label: string
  description?: string
  category?: EventCategory
  /** Module that declared this event */
  module?: string
  entity?: string
}

export interface EventPayload {
  id?: string
  tenantId?: string | null
  organizationId?: string | null
  [key: string]: unknown
}

export type ModuleEventEmitter<TEventIds extends string> = (
  eventId: TEventIds,
  payload: EventPayload,
) => Promise<void>

export interface EventModuleConfig<TEventIds extends string = string> {
  moduleId: string
  events: EventDefinition[]
  emit: ModuleEventEmitter<TEventIds>
}

export interface CreateModuleEventsOptions<TEventIds extends string> {
  /** Module identifier (e.g., 'sales', 'field_service') */
  moduleId: string
  /** Array of event definitions (supports readonly arrays from `as const`) */
  events: ReadonlyArray<Omit<EventDefinition, 'module'> & { id: TEventIds }>
  /** If true, throw on undeclared events. If false (default), log an error and emit anyway */
  strict?: boolean
}
