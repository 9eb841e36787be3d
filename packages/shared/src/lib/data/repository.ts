import type { FilterQuery, FindOptions, RequiredEntityData } from '@mikro-orm/core'
import { forbidden } from '../crud/errors'

export type RecordClass<T> = new () => T

/**
 * `user` writes are checked against the request's {@link RecordAccessPolicy};
 * `elevated` writes skip the check. Callers pick `elevated` only for records
 * derived from data the user already has access to.
 */
export type RecordAccess = 'user' | 'elevated'

export type RecordScope = {
  tenantId: string | null
  organizationId: string | null
}

export type RecordFindOptions<T extends object> = Pick<FindOptions<T>, 'orderBy' | 'limit'>

export type RecordCreateOptions = {
  access?: RecordAccess
}

export interface RecordAccessPolicy {
  canWrite(entityName: string, scope: RecordScope): boolean | Promise<boolean>
}

export interface RecordRepository {
  find<T extends object>(entity: RecordClass<T>, where: FilterQuery<T>, options?: RecordFindOptions<T>): Promise<T[]>
  findOne<T extends object>(entity: RecordClass<T>, where: FilterQuery<T>): Promise<T | null>
  findById<T extends { id: string }>(entity: RecordClass<T>, id: string): Promise<T | null>
  create<T extends object>(
    entity: RecordClass<T>,
    values: RequiredEntityData<T>,
    options?: RecordCreateOptions,
  ): Promise<T>
  flush(): Promise<void>
  /** Runs `work` in a transaction; nested calls open a savepoint. Writes made by `work` are undone when it throws. */
  transactional<R>(work: () => Promise<R>): Promise<R>
}

function readScopeValue(values: object, key: string): string | null {
  const value: unknown = Reflect.get(values, key)
  return typeof value === 'string' && value.length > 0 ? value : null
}

export function readRecordScope(values: object): RecordScope {
  return {
    tenantId: readScopeValue(values, 'tenantId'),
    organizationId: readScopeValue(values, 'organizationId'),
  }
}

export async function assertWriteAccess(
  policy: RecordAccessPolicy | null,
  entityName: string,
  values: object,
  access: RecordAccess = 'user',
): Promise<void> {
  if (access === 'elevated' || !policy) return
  const allowed = await policy.canWrite(entityName, readRecordScope(values))
  if (!allowed) throw forbidden(`Write access to ${entityName} denied`)
}
