import { createModuleEvents } from '@fieldops/shared/modules/events'

const events = [
  { id: 'sales.orders.confirmed', label: 'Sales Order Confirmed', entity: 'orders', category: 'lifecycle' },
  { id: 'sales.orders.cancelled', label: 'Sales Order Cancelled', entity: 'orders', category: 'lifecycle' },
  { id: 'sales.orders.reset_to_draft', label: 'Sales Order Reset to Draft', entity: 'orders', category: 'lifecycle' },
  { id: 'sales.orders.customer_changed', label: 'Sales Order Customer Changed', entity: 'orders', category: 'crud' },
] as const

export const eventsConfig = createModuleEvents({
  moduleId: 'sales',
  events,
})

export const emitSalesEvent = eventsConfig.emit

export type SalesEventId = typeof events[number]['id']

export default eventsConfig
