import { asValue } from 'awilix'
import type { EntityManager } from '@mikro-orm/postgresql'
import { createEventBus, type EventBus } from '@fieldops/events'
import type { CommandAuth } from '@fieldops/shared/lib/commands'
import { createFeatureAccessPolicy } from '@fieldops/shared/lib/data/accessPolicy'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { createRequestContainer, type AppContainer, type DiRegistrar } from '@fieldops/shared/lib/di/container'
import { setGlobalEventBus } from '@fieldops/shared/modules/events'
import { collectWriteFeatures, type Module } from '@fieldops/shared/modules/registry'
import { modules as defaultModules } from './appModules'

export type AppContainerOptions = {
  auth?: CommandAuth | null
  em?: EntityManager
  recordRepository?: RecordRepository
  modules?: readonly Module[]
}

/**
 * Request container with every module registered in order. Writes made with
 * `user` access are checked against the features granted to `auth`.
 */
export function createAppContainer(options: AppContainerOptions = {}): AppContainer {
  const mods = options.modules ?? defaultModules
  const auth = options.auth ?? null
  const registrars = mods
    .map((mod) => mod.register)
    .filter((register): register is DiRegistrar => typeof register === 'function')
  return createRequestContainer({
    registrars,
    em: options.em,
    recordRepository: options.recordRepository,
    auth,
    recordAccessPolicy: auth
      ? createFeatureAccessPolicy({
          grantedFeatures: auth.features ?? [],
          writeFeatures: collectWriteFeatures(mods),
          tenantId: auth.tenantId,
        })
      : null,
  })
}

/** Creates the in-process event bus, subscribes module handlers and makes it the emit target. */
export function bootstrap(container: AppContainer, mods: readonly Module[] = defaultModules): EventBus {
  const eventBus = createEventBus({ resolve: <T,>(name: string): T => container.resolve<T>(name) })
  container.register({ eventBus: asValue(eventBus) })
  const subscribers = mods.flatMap((mod) => mod.subscribers ?? [])
  if (subscribers.length) eventBus.registerModuleSubscribers(subscribers)
  setGlobalEventBus(eventBus)
  return eventBus
}
