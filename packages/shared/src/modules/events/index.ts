export {
  createModuleEvents,
  setGlobalEventBus,
  getGlobalEventBus,
  getDeclaredEvents,
  isEventDeclared,
} from './factory'
export type {
  EventCategory,
  EventDefinition,
  EventPayload,
  EventModuleConfig,
  ModuleEventEmitter,
  CreateModuleEventsOptions,
} from './types'
