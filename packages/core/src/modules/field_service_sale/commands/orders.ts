import { registerCommand, parseCommandInput, ensureTenantScope } from '@fieldops/shared/lib/commands'
import type { CommandHandler, CommandRuntimeContext } from '@fieldops/shared/lib/commands'
import { notFound } from '@fieldops/shared/lib/crud/errors'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { SalesOrder } from '@fieldops/core/modules/sales/data/entities'
import { salesOrderIdsSchema } from '../data/validators'
import type { FieldServiceSaleService } from '../lib/fieldServiceSaleService'
import { buildServiceOrderNavigation, type ServiceOrderNavigation } from '../lib/navigation'

export type GeneratedServiceOrder = {
  salesOrderId: string
  serviceOrderId: string
  name: string
}

export type GenerateServiceOrdersResult = {
  serviceOrders: GeneratedServiceOrder[]
  navigation: ServiceOrderNavigation
}

export type LinkedServiceOrdersResult = {
  orders: Array<{ salesOrderId: string; serviceOrderIds: string[]; serviceOrderCount: number }>
  navigation: ServiceOrderNavigation
}

async function loadSalesOrders(ctx: CommandRuntimeContext, ids: readonly string[]): Promise<SalesOrder[]> {
  const repo = ctx.container.resolve<RecordRepository>('recordRepository')
  const unique = Array.from(new Set(ids))
  const orders = await repo.find(SalesOrder, { id: { $in: unique }, deletedAt: null })
  if (orders.length !== unique.length) throw notFound('Sales order not found')
  for (const order of orders) ensureTenantScope(ctx, order.tenantId)
  // keep the caller's order
  return unique.flatMap((id) => orders.filter((order) => order.id === id))
}

const generateServiceOrdersCommand: CommandHandler<unknown, GenerateServiceOrdersResult> = {
  id: 'field_service_sale.orders.generate',
  async execute(rawInput, ctx) {
    const { ids } = parseCommandInput(salesOrderIdsSchema, rawInput)
    const orders = await loadSalesOrders(ctx, ids)
    const service = ctx.container.resolve<FieldServiceSaleService>('fieldServiceSaleService')
    const byOrder = await service.findOrCreateServiceOrder(orders)
    const serviceOrders: GeneratedServiceOrder[] = []
    for (const order of orders) {
      const serviceOrder = byOrder.get(order.id)
      if (serviceOrder) {
        serviceOrders.push({ salesOrderId: order.id, serviceOrderId: serviceOrder.id, name: serviceOrder.name })
      }
    }
    return {
      serviceOrders,
      navigation: buildServiceOrderNavigation(serviceOrders.map((entry) => entry.serviceOrderId)),
    }
  },
}

const linkedServiceOrdersCommand: CommandHandler<unknown, LinkedServiceOrdersResult> = {
  id: 'field_service_sale.orders.linked',
  async execute(rawInput, ctx) {
    const { ids } = parseCommandInput(salesOrderIdsSchema, rawInput)
    const orders = await loadSalesOrders(ctx, ids)
    const service = ctx.container.resolve<FieldServiceSaleService>('fieldServiceSaleService')
    const linked = await service.computeLinkedServiceOrders(orders.map((order) => order.id))
    const result = orders.map((order) => {
      const entry = linked.get(order.id)
      return {
        salesOrderId: order.id,
        serviceOrderIds: entry ? entry.serviceOrders.map((serviceOrder) => serviceOrder.id) : [],
        serviceOrderCount: entry?.serviceOrderCount ?? 0,
      }
    })
    return {
      orders: result,
      navigation: buildServiceOrderNavigation(result.flatMap((entry) => entry.serviceOrderIds)),
    }
  },
}

registerCommand(generateServiceOrdersCommand)
registerCommand(linkedServiceOrdersCommand)
