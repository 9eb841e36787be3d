import { registerCommand, parseCommandInput, ensureTenantScope } from '@fieldops/shared/lib/commands'
import type { CommandHandler } from '@fieldops/shared/lib/commands'
import { notFound } from '@fieldops/shared/lib/crud/errors'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { SalesOrder, type SalesOrderStatus } from '../data/entities'
import { salesOrderCustomerChangeSchema, salesOrderIdSchema } from '../data/validators'
import { emitSalesEvent } from '../events'
import type { SalesOrderCustomerChange } from '../lib/customerChange'
import {
  cancelSalesOrder,
  resetSalesOrderToDraft,
  type SalesOrderConfirmation,
  type SalesOrderConfirmationResult,
} from '../lib/orderLifecycle'

export type SalesOrderStatusResult = { orderId: string; status: SalesOrderStatus }

export type SalesOrderCustomerChangeResult = {
  orderId: string
  customerEntityId: string | null
  shippingCustomerEntityId: string | null
  serviceLocationId: string | null
}

async function requireSalesOrder(repo: RecordRepository, id: string): Promise<SalesOrder> {
  const order = await repo.findOne(SalesOrder, { id, deletedAt: null })
  if (!order) throw notFound('Sales order not found')
  return order
}

const confirmOrderCommand: CommandHandler<unknown, SalesOrderConfirmationResult> = {
  id: 'sales.orders.confirm',
  async execute(rawInput, ctx) {
    const { id } = parseCommandInput(salesOrderIdSchema, rawInput)
    const repo = ctx.container.resolve<RecordRepository>('recordRepository')
    const order = await requireSalesOrder(repo, id)
    ensureTenantScope(ctx, order.tenantId)
    const confirm = ctx.container.resolve<SalesOrderConfirmation>('salesOrderConfirmation')
    const previous = { status: order.status, confirmedAt: order.confirmedAt ?? null }
    let result: SalesOrderConfirmationResult
    try {
      result = await repo.transactional(async () => {
        const confirmed = await confirm(order)
        await repo.flush()
        return confirmed
      })
    } catch (err) {
      // the transaction was rolled back; put the loaded order back the way it was read
      order.status = previous.status
      order.confirmedAt = previous.confirmedAt
      throw err
    }
    await emitSalesEvent('sales.orders.confirmed', {
      id: order.id,
      orderNumber: order.orderNumber,
      tenantId: order.tenantId,
      organizationId: order.organizationId,
    })
    return result
  },
}

const cancelOrderCommand: CommandHandler<unknown, SalesOrderStatusResult> = {
  id: 'sales.orders.cancel',
  async execute(rawInput, ctx) {
    const { id } = parseCommandInput(salesOrderIdSchema, rawInput)
    const repo = ctx.container.resolve<RecordRepository>('recordRepository')
    const order = await requireSalesOrder(repo, id)
    ensureTenantScope(ctx, order.tenantId)
    cancelSalesOrder(order)
    await repo.flush()
    await emitSalesEvent('sales.orders.cancelled', {
      id: order.id,
      tenantId: order.tenantId,
      organizationId: order.organizationId,
    })
    return { orderId: order.id, status: order.status }
  },
}

const resetOrderToDraftCommand: CommandHandler<unknown, SalesOrderStatusResult> = {
  id: 'sales.orders.reset_to_draft',
  async execute(rawInput, ctx) {
    const { id } = parseCommandInput(salesOrderIdSchema, rawInput)
    const repo = ctx.container.resolve<RecordRepository>('recordRepository')
    const order = await requireSalesOrder(repo, id)
    ensureTenantScope(ctx, order.tenantId)
    resetSalesOrderToDraft(order)
    await repo.flush()
    await emitSalesEvent('sales.orders.reset_to_draft', {
      id: order.id,
      tenantId: order.tenantId,
      organizationId: order.organizationId,
    })
    return { orderId: order.id, status: order.status }
  },
}

const changeCustomerCommand: CommandHandler<unknown, SalesOrderCustomerChangeResult> = {
  id: 'sales.orders.change_customer',
  async execute(rawInput, ctx) {
    const parsed = parseCommandInput(salesOrderCustomerChangeSchema, rawInput)
    const repo = ctx.container.resolve<RecordRepository>('recordRepository')
    const order = await requireSalesOrder(repo, parsed.id)
    ensureTenantScope(ctx, order.tenantId)
    order.customerEntityId = parsed.customerEntityId
    const applyCustomerChange = ctx.container.resolve<SalesOrderCustomerChange>('salesOrderCustomerChange')
    await applyCustomerChange(order)
    await repo.flush()
    await emitSalesEvent('sales.orders.customer_changed', {
      id: order.id,
      customerEntityId: order.customerEntityId ?? null,
      tenantId: order.tenantId,
      organizationId: order.organizationId,
    })
    return {
      orderId: order.id,
      customerEntityId: order.customerEntityId ?? null,
      shippingCustomerEntityId: order.shippingCustomerEntityId ?? null,
      serviceLocationId: order.serviceLocationId ?? null,
    }
  },
}

registerCommand(confirmOrderCommand)
registerCommand(cancelOrderCommand)
registerCommand(resetOrderToDraftCommand)
registerCommand(changeCustomerCommand)
