import type { DiRegistrar } from '../lib/di/container'
import type { EventPayload } from './events/types'

export type ModuleInfo = {
  name: string
  title?: string
  version?: string
  description?: string
  author?: string
  license?: string
}

export type ModuleFeature = {
  id: string
  title: string
  module: string
}

export type SubscriberContext = {
  resolve: <T = unknown>(name: string) => T
}

export type ModuleSubscriber = {
  id: string
  event: string
  handler: (payload: EventPayload, ctx: SubscriberContext) => Promise<void> | void
}

export type Module = {
  id: string
  info: ModuleInfo
  features?: ModuleFeature[]
  /** Entity class name to the feature a `user` write of that entity requires. */
  writeFeatures?: Record<string, string>
  register?: DiRegistrar
  subscribers?: ModuleSubscriber[]
}

export function collectWriteFeatures(modules: readonly Module[]): Record<string, string> {
  return modules.reduce<Record<string, string>>((acc, mod) => ({ ...acc, ...(mod.writeFeatures ?? {}) }), {})
}
