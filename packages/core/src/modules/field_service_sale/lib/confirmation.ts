import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import type { SalesOrderCustomerChange } from '@fieldops/core/modules/sales/lib/customerChange'
import { loadOrderLines } from '@fieldops/core/modules/sales/lib/lines'
import type { SalesOrderConfirmation } from '@fieldops/core/modules/sales/lib/orderLifecycle'
import { MissingLocationError } from './errors'
import type { FieldServiceSaleService } from './fieldServiceSaleService'
import type { FieldServiceLineGenerator } from './lineGenerator'
import { requiresFieldService, resolveLineTracking } from './tracking'

export type FieldServiceConfirmationDeps = {
  repo: RecordRepository
  lineGenerator: FieldServiceLineGenerator
}

/**
 * Runs the base confirmation, then requires a service location and generates
 * service orders when any line is tracked for field service.
 */
export function createFieldServiceConfirmation(
  base: SalesOrderConfirmation,
  deps: FieldServiceConfirmationDeps,
): SalesOrderConfirmation {
  return async (order) => {
    const result = await base(order)
    const lines = await loadOrderLines(deps.repo, [order.id])
    const tracked = await resolveLineTracking(deps.repo, lines)
    if (!requiresFieldService(tracked)) return result
    if (!order.serviceLocationId) throw new MissingLocationError()
    await deps.lineGenerator.generateForLines(lines)
    return result
  }
}

export function createFieldServiceCustomerChange(
  base: SalesOrderCustomerChange,
  service: FieldServiceSaleService,
): SalesOrderCustomerChange {
  return async (order) => {
    await base(order)
    await service.onCustomerChanged(order)
  }
}
