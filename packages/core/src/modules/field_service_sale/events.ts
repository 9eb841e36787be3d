import { createModuleEvents } from '@fieldops/shared/modules/events'

const events = [
  {
    id: 'field_service_sale.service_order.created',
    label: 'Service Order Created from Sales Order',
    entity: 'service_order',
    category: 'lifecycle',
  },
] as const

export const eventsConfig = createModuleEvents({
  moduleId: 'field_service_sale',
  events,
})

export const emitFieldServiceSaleEvent = eventsConfig.emit

export type FieldServiceSaleEventId = typeof events[number]['id']

export default eventsConfig
