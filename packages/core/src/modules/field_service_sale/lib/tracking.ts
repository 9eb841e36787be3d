import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { CatalogProduct, type FieldServiceTrackingMode } from '@fieldops/core/modules/catalog/data/entities'
import type { SalesOrderLine } from '@fieldops/core/modules/sales/data/entities'

export type TrackedLine = {
  line: SalesOrderLine
  product: CatalogProduct | null
  mode: FieldServiceTrackingMode
}

/** Pairs each line with its product and the tracking mode it inherits, keeping line order. */
export async function resolveLineTracking(
  repo: RecordRepository,
  lines: readonly SalesOrderLine[],
): Promise<TrackedLine[]> {
  const productIds = Array.from(
    new Set(lines.map((line) => line.productId).filter((id): id is string => typeof id === 'string')),
  )
  const products = productIds.length
    ? await repo.find(CatalogProduct, { id: { $in: productIds } })
    : []
  const byId = new Map(products.map((product) => [product.id, product]))
  return lines.map((line) => {
    const product = line.productId ? byId.get(line.productId) ?? null : null
    return { line, product, mode: product?.fieldServiceTracking ?? 'no' }
  })
}

export function requiresFieldService(tracked: readonly TrackedLine[]): boolean {
  return tracked.some((entry) => entry.mode !== 'no')
}
