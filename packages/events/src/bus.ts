import type {
  CreateBusOptions,
  EventBus,
  EventPayload,
  SubscriberDescriptor,
  SubscriberHandler,
} from './types'

/**
 * Creates an event bus instance.
 *
 * @example
 * ```typescript
 * const bus = createEventBus({ resolve: container.resolve.bind(container) })
 *
 * bus.on('sales.orders.confirmed', async (payload, ctx) => {
 *   const service = ctx.resolve<FieldServiceSaleService>('fieldServiceSaleService')
 *   await service.computeLinkedServiceOrders([String(payload.id)])
 * })
 *
 * await bus.emit('sales.orders.confirmed', { id: '123' })
 * ```
 */
export function createEventBus(opts: CreateBusOptions): EventBus {
  const listeners = new Map<string, Set<SubscriberHandler>>()

  async function deliver(event: string, payload: EventPayload): Promise<void> {
    const handlers = listeners.get(event)
    if (!handlers || handlers.size === 0) return

    for (const handler of handlers) {
      try {
        await Promise.resolve(handler(payload, { resolve: opts.resolve }))
      } catch (error) {
        console.error(`[events] Handler error for "${event}":`, error)
      }
    }
  }

  function on(event: string, handler: SubscriberHandler): void {
    const handlers = listeners.get(event) ?? new Set<SubscriberHandler>()
    handlers.add(handler)
    listeners.set(event, handlers)
  }

  function off(event: string, handler: SubscriberHandler): void {
    listeners.get(event)?.delete(handler)
  }

  function registerModuleSubscribers(subs: SubscriberDescriptor[]): void {
    for (const sub of subs) {
      on(sub.event, sub.handler)
    }
  }

  return {
    emit: deliver,
    on,
    off,
    registerModuleSubscribers,
  }
}
