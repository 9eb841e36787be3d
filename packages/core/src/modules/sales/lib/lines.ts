import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { SalesOrderLine } from '../data/entities'

/** Lines of the given orders, in line order. */
export async function loadOrderLines(repo: RecordRepository, orderIds: readonly string[]): Promise<SalesOrderLine[]> {
  if (!orderIds.length) return []
  return repo.find(
    SalesOrderLine,
    { orderId: { $in: [...orderIds] } },
    { orderBy: { lineNumber: 'asc', id: 'asc' } },
  )
}
