import type { FilterQuery, RequiredEntityData } from '@mikro-orm/core'
import type { EntityManager } from '@mikro-orm/postgresql'
import {
  assertWriteAccess,
  type RecordAccessPolicy,
  type RecordClass,
  type RecordCreateOptions,
  type RecordFindOptions,
  type RecordRepository,
} from './repository'

export class MikroRecordRepository implements RecordRepository {
  constructor(
    private em: EntityManager,
    private readonly accessPolicy: RecordAccessPolicy | null = null,
  ) {}

  async find<T extends object>(
    entity: RecordClass<T>,
    where: FilterQuery<T>,
    options: RecordFindOptions<T> = {},
  ): Promise<T[]> {
    return this.em.find(entity, where, options)
  }

  async findOne<T extends object>(entity: RecordClass<T>, where: FilterQuery<T>): Promise<T | null> {
    return this.em.findOne(entity, where)
  }

  async findById<T extends { id: string }>(entity: RecordClass<T>, id: string): Promise<T | null> {
    return this.em.findOne(entity, { id })
  }

  async create<T extends object>(
    entity: RecordClass<T>,
    values: RequiredEntityData<T>,
    options: RecordCreateOptions = {},
  ): Promise<T> {
    await assertWriteAccess(this.accessPolicy, entity.name, values, options.access)
    const row = this.em.create(entity, values)
    this.em.persist(row)
    try {
      await this.em.flush()
    } catch (err) {
      // keep the failed insert out of the unit of work so later flushes do not retry it
      this.em.remove(row)
      throw err
    }
    return row
  }

  async flush(): Promise<void> {
    await this.em.flush()
  }

  async transactional<R>(work: () => Promise<R>): Promise<R> {
    const outer = this.em
    return outer.transactional(async (txEm) => {
      // calls made through this repository while `work` runs use the transaction's fork
      this.em = txEm
      try {
        return await work()
      } finally {
        this.em = outer
      }
    })
  }
}
