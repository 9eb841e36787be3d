import { conflict } from '@fieldops/shared/lib/crud/errors'
import type { SalesOrder, SalesOrderStatus } from '../data/entities'

export type SalesOrderConfirmationResult = {
  orderId: string
  orderNumber: string
  status: SalesOrderStatus
  confirmedAt: Date
}

/**
 * Confirmation step applied to an order loaded in the current unit of work.
 * Implementations mutate the order in memory; the caller flushes.
 */
export type SalesOrderConfirmation = (order: SalesOrder) => Promise<SalesOrderConfirmationResult>

export function confirmSalesOrder(order: SalesOrder, now: Date = new Date()): SalesOrderConfirmationResult {
  if (order.status === 'confirmed') {
    throw conflict('Sales order is already confirmed', 'sales_order_already_confirmed')
  }
  if (order.status === 'cancelled') {
    throw conflict('Cancelled sales orders must be reset to draft before confirming', 'sales_order_cancelled')
  }
  order.status = 'confirmed'
  order.confirmedAt = now
  return {
    orderId: order.id,
    orderNumber: order.orderNumber,
    status: order.status,
    confirmedAt: now,
  }
}

export const baseSalesOrderConfirmation: SalesOrderConfirmation = async (order) => confirmSalesOrder(order)

export function cancelSalesOrder(order: SalesOrder): void {
  if (order.status === 'cancelled') {
    throw conflict('Sales order is already cancelled', 'sales_order_already_cancelled')
  }
  order.status = 'cancelled'
}

export function resetSalesOrderToDraft(order: SalesOrder): void {
  if (order.status !== 'cancelled') {
    throw conflict('Only cancelled sales orders can be reset to draft', 'sales_order_not_cancelled')
  }
  order.status = 'draft'
  order.confirmedAt = null
}
