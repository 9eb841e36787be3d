import type { ZodType, ZodTypeDef } from 'zod'
import { CrudHttpError } from '../crud/errors'
import type { CommandRuntimeContext } from './types'

export function parseCommandInput<TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, unknown>,
  rawInput: unknown,
): TOutput {
  const parsed = schema.safeParse(rawInput ?? {})
  if (!parsed.success) {
    throw new CrudHttpError(400, {
      error: 'Invalid input',
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    })
  }
  return parsed.data
}

export function ensureTenantScope(ctx: CommandRuntimeContext, tenantId: string): void {
  const currentTenant = ctx.auth?.tenantId ?? null
  if (currentTenant && currentTenant !== tenantId) {
    throw new CrudHttpError(403, { error: 'Forbidden' })
  }
}
