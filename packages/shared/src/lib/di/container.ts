import { asFunction, asValue, createContainer, InjectionMode, type AwilixContainer } from 'awilix'
import type { EntityManager } from '@mikro-orm/postgresql'
import { commandRegistry, CommandBus, type CommandAuth } from '../commands'
import { MikroRecordRepository } from '../data/mikroRepository'
import type { RecordAccessPolicy, RecordRepository } from '../data/repository'

export type AppContainer = AwilixContainer

export type DiRegistrar = (container: AppContainer) => void

export type RequestContainerOptions = {
  registrars: DiRegistrar[]
  /** Entity manager backing the default MikroORM record repository. */
  em?: EntityManager
  /** Replaces the MikroORM repository, e.g. with the in-memory one in tests. */
  recordRepository?: RecordRepository
  recordAccessPolicy?: RecordAccessPolicy | null
  auth?: CommandAuth | null
}

export function createRequestContainer(options: RequestContainerOptions): AppContainer {
  const container = createContainer({ injectionMode: InjectionMode.CLASSIC })
  const { em, recordRepository } = options
  container.register({
    auth: asValue(options.auth ?? null),
    recordAccessPolicy: asValue(options.recordAccessPolicy ?? null),
    commandRegistry: asValue(commandRegistry),
    commandBus: asValue(new CommandBus()),
  })
  if (recordRepository) {
    container.register({ recordRepository: asValue(recordRepository) })
  } else if (em) {
    container.register({
      em: asValue(em),
      recordRepository: asFunction(
        (recordAccessPolicy: RecordAccessPolicy | null) => new MikroRecordRepository(em, recordAccessPolicy),
      ).scoped(),
    })
  } else {
    throw new Error('[di] Request container needs an entity manager or a record repository')
  }
  for (const register of options.registrars) {
    register(container)
  }
  return container
}
