import type { EventPayload } from '@fieldops/shared/modules/events'
import type { ModuleSubscriber, SubscriberContext } from '@fieldops/shared/modules/registry'

export type { EventPayload, SubscriberContext }

/** Event handler function signature */
export type SubscriberHandler = ModuleSubscriber['handler']

/** Full descriptor for a module subscriber */
export type SubscriberDescriptor = ModuleSubscriber

export type CreateBusOptions = {
  /** DI container resolve function */
  resolve: SubscriberContext['resolve']
}

/**
 * In-process event bus. Handlers run in registration order; a failing
 * handler is logged and does not stop delivery to the others.
 */
export interface EventBus {
  emit(event: string, payload: EventPayload): Promise<void>
  on(event: string, handler: SubscriberHandler): void
  off(event: string, handler: SubscriberHandler): void
  registerModuleSubscribers(subs: SubscriberDescriptor[]): void
}
