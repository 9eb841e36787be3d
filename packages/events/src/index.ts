export { createEventBus } from './bus'
export type {
  CreateBusOptions,
  EventBus,
  EventPayload,
  SubscriberContext,
  SubscriberDescriptor,
  SubscriberHandler,
} from './types'
