import { commandRegistry } from './registry'
import type { CommandExecuteResult, CommandExecutionOptions, CommandHandler } from './types'

export class CommandBus {
  async execute<TInput = unknown, TResult = unknown>(
    commandId: string,
    options: CommandExecutionOptions<TInput>,
  ): Promise<CommandExecuteResult<TResult>> {
    const handler = this.resolveHandler<TInput, TResult>(commandId)
    const startedAt = Date.now()
    const result = await handler.execute(options.input, options.ctx)
    const durationMs = Date.now() - startedAt
    if (process.env.COMMANDS_DEBUG === 'true') {
      console.debug(`[commands] ${commandId} finished in ${durationMs}ms`)
    }
    return { result, commandId, durationMs }
  }

  private resolveHandler<TInput, TResult>(commandId: string): CommandHandler<TInput, TResult> {
    const handler = commandRegistry.get<TInput, TResult>(commandId)
    if (!handler) throw new Error(`Command handler not registered for id ${commandId}`)
    return handler
  }
}
