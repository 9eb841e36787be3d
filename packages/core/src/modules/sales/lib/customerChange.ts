import { notFound } from '@fieldops/shared/lib/crud/errors'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { CustomerEntity } from '@fieldops/core/modules/customers/data/entities'
import { resolveShippingEntity } from '@fieldops/core/modules/customers/lib/hierarchy'
import type { SalesOrder } from '../data/entities'

/** Form-level reaction to a new customer on an order; never persists. */
export type SalesOrderCustomerChange = (order: SalesOrder) => Promise<void>

export function createBaseCustomerChange(repo: RecordRepository): SalesOrderCustomerChange {
  return async (order) => {
    if (!order.customerEntityId) {
      order.shippingCustomerEntityId = null
      return
    }
    const customer = await repo.findById(CustomerEntity, order.customerEntityId)
    if (!customer) throw notFound('Customer not found')
    const shipping = await resolveShippingEntity(repo, customer)
    order.shippingCustomerEntityId = shipping.id
  }
}
