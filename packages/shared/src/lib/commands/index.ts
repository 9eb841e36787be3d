export { commandRegistry, registerCommand } from './registry'
export { CommandBus } from './command-bus'
export { parseCommandInput, ensureTenantScope } from './helpers'
export type {
  CommandAuth,
  CommandHandler,
  CommandRuntimeContext,
  CommandExecutionOptions,
  CommandExecuteResult,
} from './types'
