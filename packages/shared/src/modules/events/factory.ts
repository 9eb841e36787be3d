/**
 * Event Module Factory
 *
 * Provides factory functions for creating type-safe event configurations.
 */

import type {
  CreateModuleEventsOptions,
  EventDefinition,
  EventModuleConfig,
  EventPayload,
} from './types'

interface GlobalEventBus {
  emit(event: string, payload: EventPayload): Promise<void>
}

// Set during bootstrap
let globalEventBus: GlobalEventBus | null = null

export function setGlobalEventBus(bus: GlobalEventBus | null): void {
  globalEventBus = bus
}

export function getGlobalEventBus(): GlobalEventBus | null {
  return globalEventBus
}

const allDeclaredEvents: EventDefinition[] = []

export function isEventDeclared(eventId: string): boolean {
  return allDeclaredEvents.some((event) => event.id === eventId)
}

export function getDeclaredEvents(): EventDefinition[] {
  return [...allDeclaredEvents]
}

/**
 * Creates a type-safe event configuration for a module.
 *
 * ```typescript
 * const events = [
 *   { id: 'sales.orders.confirmed', label: 'Sales Order Confirmed', category: 'lifecycle' },
 * ] as const
 *
 * export const eventsConfig = createModuleEvents({ moduleId: 'sales', events })
 * export const emitSalesEvent = eventsConfig.emit
 * ```
 *
 * Emitting an id that is not declared does not compile.
 */
export function createModuleEvents<
  const TEvents extends readonly { id: string }[],
  TEventIds extends TEvents[number]['id'] = TEvents[number]['id'],
>(options: CreateModuleEventsOptions<TEventIds>): EventModuleConfig<TEventIds> {
  const { moduleId, events, strict = false } = options
  const validEventIds = new Set<string>(events.map((event) => event.id))
  const fullEvents: EventDefinition[] = events.map((event) => ({ ...event, module: moduleId }))

  for (const event of fullEvents) {
    if (!isEventDeclared(event.id)) allDeclaredEvents.push(event)
  }

  const emit = async (eventId: TEventIds, payload: EventPayload): Promise<void> => {
    if (!validEventIds.has(eventId)) {
      const message =
        `[events] Module "${moduleId}" tried to emit undeclared event "${eventId}". ` +
        `Add it to the module's events.ts file first.`
      if (strict) throw new Error(message)
      console.error(message)
    }

    const eventBus = getGlobalEventBus()
    if (!eventBus) {
      console.warn(`[events] Event bus not available, cannot emit "${eventId}"`)
      return
    }

    await eventBus.emit(eventId, payload)
  }

  return {
    moduleId,
    events: fullEvents,
    emit,
  }
}
