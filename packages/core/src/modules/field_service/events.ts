import { createModuleEvents } from '@fieldops/shared/modules/events'

const events = [
  { id: 'field_service.orders.created', label: 'Field Service Order Created', entity: 'orders', category: 'crud' },
] as const

export const eventsConfig = createModuleEvents({
  moduleId: 'field_service',
  events,
})

export const emitFieldServiceEvent = eventsConfig.emit

export type FieldServiceEventId = typeof events[number]['id']

export default eventsConfig
