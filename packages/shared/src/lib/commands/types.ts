import type { AwilixContainer } from 'awilix'

export type CommandAuth = {
  sub: string
  tenantId: string | null
  orgId: string | null
  features?: string[]
}

export type CommandRuntimeContext = {
  container: AwilixContainer
  auth: CommandAuth | null
  selectedOrganizationId?: string | null
}

export type CommandHandler<TInput = unknown, TResult = unknown> = {
  id: string
  execute(input: TInput, ctx: CommandRuntimeContext): Promise<TResult> | TResult
}

export type CommandExecutionOptions<TInput> = {
  input: TInput
  ctx: CommandRuntimeContext
}

export type CommandExecuteResult<TResult> = {
  result: TResult
  commandId: string
  durationMs: number
}
