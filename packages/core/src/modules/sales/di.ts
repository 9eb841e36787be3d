import { asFunction, asValue } from 'awilix'
import type { AppContainer } from '@fieldops/shared/lib/di/container'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { createBaseCustomerChange, type SalesOrderCustomerChange } from './lib/customerChange'
import { baseSalesOrderConfirmation, type SalesOrderConfirmation } from './lib/orderLifecycle'

/**
 * `salesOrderConfirmation` and `salesOrderCustomerChange` start as the base
 * behavior; modules registered later may replace them with a composition that
 * calls the `base*` registration first.
 */
export function register(container: AppContainer) {
  container.register({
    baseSalesOrderConfirmation: asValue<SalesOrderConfirmation>(baseSalesOrderConfirmation),
    salesOrderConfirmation: asFunction(
      (baseSalesOrderConfirmation: SalesOrderConfirmation) => baseSalesOrderConfirmation,
    ).scoped(),
    baseSalesOrderCustomerChange: asFunction((recordRepository: RecordRepository) =>
      createBaseCustomerChange(recordRepository),
    ).scoped(),
    salesOrderCustomerChange: asFunction(
      (baseSalesOrderCustomerChange: SalesOrderCustomerChange) => baseSalesOrderCustomerChange,
    ).scoped(),
  })
}
