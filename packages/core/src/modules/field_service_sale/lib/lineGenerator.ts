import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import type { FieldServiceOrder } from '@fieldops/core/modules/field_service/data/entities'
import { SalesOrder, type SalesOrderLine } from '@fieldops/core/modules/sales/data/entities'
import type { FieldServiceSaleSettings } from './config'
import type { FieldServiceSaleService } from './fieldServiceSaleService'
import { resolveLineTracking, type TrackedLine } from './tracking'

export interface FieldServiceLineGenerator {
  /** Resolves the service order of every tracked line, keyed by line id. */
  generateForLines(lines: readonly SalesOrderLine[]): Promise<Map<string, FieldServiceOrder>>
}

export class DefaultFieldServiceLineGenerator implements FieldServiceLineGenerator {
  constructor(
    private readonly repo: RecordRepository,
    private readonly service: FieldServiceSaleService,
    private readonly settings: FieldServiceSaleSettings,
  ) {}

  async generateForLines(lines: readonly SalesOrderLine[]): Promise<Map<string, FieldServiceOrder>> {
    const result = new Map<string, FieldServiceOrder>()
    const tracked = await resolveLineTracking(this.repo, lines)
    const orderIds = Array.from(new Set(tracked.filter((entry) => entry.mode !== 'no').map((e) => e.line.orderId)))
    if (!orderIds.length) return result
    const orders = await this.repo.find(SalesOrder, { id: { $in: orderIds } })
    const ordersById = new Map(orders.map((order) => [order.id, order]))

    const saleLines = tracked.filter((entry) => entry.mode === 'sale')
    const saleOrders = orders.filter((order) => saleLines.some((entry) => entry.line.orderId === order.id))
    const byOrder = await this.service.findOrCreateServiceOrder(saleOrders)
    for (const entry of saleLines) {
      const serviceOrder = byOrder.get(entry.line.orderId)
      if (serviceOrder) result.set(entry.line.id, serviceOrder)
    }

    const perLine = new Map<string, TrackedLine[]>()
    for (const entry of tracked) {
      if (entry.mode !== 'line') continue
      const group = perLine.get(entry.line.orderId) ?? []
      group.push(entry)
      perLine.set(entry.line.orderId, group)
    }
    for (const [orderId, entries] of perLine) {
      const order = ordersById.get(orderId)
      if (!order) continue
      const byLine = await this.service.findOrCreateLineServiceOrders(order, entries)
      for (const [lineId, serviceOrder] of byLine) result.set(lineId, serviceOrder)
    }

    if (this.settings.debug) {
      for (const entry of tracked) {
        if (entry.mode === 'delivery') {
          console.debug(`[field_service_sale] Line ${entry.line.id} is generated on delivery; skipped`)
        }
      }
    }
    return result
  }
}
