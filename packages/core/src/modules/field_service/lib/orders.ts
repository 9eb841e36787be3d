import type { RequiredEntityData } from '@mikro-orm/core'
import type { RecordCreateOptions, RecordRepository } from '@fieldops/shared/lib/data/repository'
import { FieldServiceOrder } from '../data/entities'
import { emitFieldServiceEvent } from '../events'

export type FieldServiceOrderValues = RequiredEntityData<FieldServiceOrder>

export function formatFieldServiceOrderName(prefix: string, reference: string, lineNumber?: number | null): string {
  const base = `${prefix}/${reference}`
  return typeof lineNumber === 'number' ? `${base}/${lineNumber}` : base
}

export async function createFieldServiceOrder(
  repo: RecordRepository,
  values: FieldServiceOrderValues,
  options: RecordCreateOptions = {},
): Promise<FieldServiceOrder> {
  const order = await repo.create(FieldServiceOrder, values, options)
  await emitFieldServiceEvent('field_service.orders.created', {
    id: order.id,
    name: order.name,
    saleOrderId: order.saleOrderId ?? null,
    saleOrderLineId: order.saleOrderLineId ?? null,
    tenantId: order.tenantId,
    organizationId: order.organizationId,
  })
  return order
}
