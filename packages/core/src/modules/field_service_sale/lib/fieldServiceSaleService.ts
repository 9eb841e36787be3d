import type { FilterQuery } from '@mikro-orm/core'
import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import type { TranslateWithFallbackFn } from '@fieldops/shared/lib/i18n/translate'
import { CustomerEntity } from '@fieldops/core/modules/customers/data/entities'
import { resolveCommercialEntity } from '@fieldops/core/modules/customers/lib/hierarchy'
import {
  FieldServiceLocation,
  FieldServiceOrder,
  FieldServiceOrderTemplate,
} from '@fieldops/core/modules/field_service/data/entities'
import { createFieldServiceOrder, type FieldServiceOrderValues } from '@fieldops/core/modules/field_service/lib/orders'
import type { SalesOrder, SalesOrderLine } from '@fieldops/core/modules/sales/data/entities'
import { loadOrderLines } from '@fieldops/core/modules/sales/lib/lines'
import { emitFieldServiceSaleEvent } from '../events'
import type { FieldServiceSaleSettings } from './config'
import { isServiceOrderUniqueViolation } from './duplicates'
import { buildServiceLocationFilter } from './locationFilter'
import { formatRecordLink, type MessagePoster } from './messages'
import { resolveLineTracking, type TrackedLine } from './tracking'
import { collectLineTemplates, prepareServiceOrderValues } from './values'

export type LinkedServiceOrders = {
  serviceOrders: FieldServiceOrder[]
  serviceOrderCount: number
}

type LinkedCacheEntry = {
  lineKey: string
  value: LinkedServiceOrders
}

const LOG_TAG = '[field_service_sale]'

function uniqueById<T extends { id: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>()
  return items.filter((item) => {
    if (seen.has(item.id)) return false
    seen.add(item.id)
    return true
  })
}

/**
 * Generates field service orders from sales orders and answers which service
 * orders belong to a sales order. Request scoped: the linkage memo lives as
 * long as the instance.
 */
export class FieldServiceSaleService {
  private readonly linkedCache = new Map<string, LinkedCacheEntry>()

  constructor(
    private readonly repo: RecordRepository,
    private readonly messages: MessagePoster,
    private readonly settings: FieldServiceSaleSettings,
    private readonly translate: TranslateWithFallbackFn,
  ) {}

  /** Service orders attached to each sales order directly or through one of its lines. */
  async computeLinkedServiceOrders(orderIds: readonly string[]): Promise<Map<string, LinkedServiceOrders>> {
    const ids = Array.from(new Set(orderIds))
    const lines = await loadOrderLines(this.repo, ids)
    const lineIdsByOrder = new Map<string, string[]>(ids.map((id) => [id, []]))
    for (const line of lines) lineIdsByOrder.get(line.orderId)?.push(line.id)

    const result = new Map<string, LinkedServiceOrders>()
    const stale: string[] = []
    for (const id of ids) {
      const cached = this.linkedCache.get(id)
      const lineKey = (lineIdsByOrder.get(id) ?? []).join(',')
      if (cached && cached.lineKey === lineKey) result.set(id, cached.value)
      else stale.push(id)
    }
    if (!stale.length) return result

    const staleLineIds = stale.flatMap((id) => lineIdsByOrder.get(id) ?? [])
    const where: FilterQuery<FieldServiceOrder> = staleLineIds.length
      ? { $or: [{ saleOrderId: { $in: stale } }, { saleOrderLineId: { $in: staleLineIds } }] }
      : { saleOrderId: { $in: stale } }
    const candidates = await this.repo.find(FieldServiceOrder, where, { orderBy: { name: 'asc', id: 'asc' } })

    for (const id of stale) {
      const orderLineIds = new Set(lineIdsByOrder.get(id) ?? [])
      const serviceOrders = uniqueById(
        candidates.filter(
          (candidate) =>
            candidate.saleOrderId === id ||
            (typeof candidate.saleOrderLineId === 'string' && orderLineIds.has(candidate.saleOrderLineId)),
        ),
      )
      const value = { serviceOrders, serviceOrderCount: serviceOrders.length }
      this.linkedCache.set(id, { lineKey: Array.from(orderLineIds).join(','), value })
      result.set(id, value)
    }
    return result
  }

  invalidate(orderId?: string): void {
    if (orderId) this.linkedCache.delete(orderId)
    else this.linkedCache.clear()
  }

  /** First matching service location by name, or null. */
  async inferServiceLocation(order: SalesOrder): Promise<FieldServiceLocation | null> {
    if (!order.customerEntityId) return null
    const customer = await this.repo.findById(CustomerEntity, order.customerEntityId)
    if (!customer) return null
    const commercial = await resolveCommercialEntity(this.repo, customer)
    const filter = buildServiceLocationFilter({
      customerId: customer.id,
      customerIsServiceLocation: customer.isServiceLocation,
      shippingEntityId: order.shippingCustomerEntityId ?? null,
      commercialEntityId: commercial.id,
    })
    const [first] = await this.repo.find(FieldServiceLocation, filter, {
      orderBy: { name: 'asc', id: 'asc' },
      limit: 1,
    })
    return first ?? null
  }

  async onCustomerChanged(order: SalesOrder): Promise<void> {
    const location = await this.inferServiceLocation(order)
    order.serviceLocationId = location?.id ?? null
  }

  /** Values of the order-level service order, built from the order's `sale` tracked lines. */
  async buildServiceOrderValues(order: SalesOrder): Promise<FieldServiceOrderValues> {
    const tracked = await resolveLineTracking(this.repo, await loadOrderLines(this.repo, [order.id]))
    const templateIds = tracked
      .filter((entry) => entry.mode === 'sale')
      .map((entry) => entry.product?.fieldServiceTemplateId ?? null)
    const templates = collectLineTemplates(templateIds, await this.loadTemplates(templateIds))
    return prepareServiceOrderValues({
      order,
      location: await this.loadLocation(order),
      templates,
      namePrefix: this.settings.orderNamePrefix,
    })
  }

  async buildLineServiceOrderValues(order: SalesOrder, entry: TrackedLine): Promise<FieldServiceOrderValues> {
    const templateIds = [entry.product?.fieldServiceTemplateId ?? null]
    const templates = collectLineTemplates(templateIds, await this.loadTemplates(templateIds))
    return prepareServiceOrderValues({
      order,
      line: entry.line,
      location: await this.loadLocation(order),
      templates,
      namePrefix: this.settings.orderNamePrefix,
    })
  }

  async createServiceOrder(orders: readonly SalesOrder[]): Promise<Map<string, FieldServiceOrder>> {
    const created = new Map<string, FieldServiceOrder>()
    for (const order of orders) {
      const values = await this.buildServiceOrderValues(order)
      const serviceOrder = await createFieldServiceOrder(this.repo, values, { access: 'elevated' })
      await this.announce(order, serviceOrder)
      created.set(order.id, serviceOrder)
    }
    return created
  }

  async findOrCreateServiceOrder(orders: readonly SalesOrder[]): Promise<Map<string, FieldServiceOrder>> {
    const unique = uniqueById(orders)
    if (!unique.length) return new Map()
    const existing = await this.repo.find(
      FieldServiceOrder,
      { saleOrderId: { $in: unique.map((order) => order.id) }, saleOrderLineId: null },
      { orderBy: { createdAt: 'asc', id: 'asc' } },
    )
    const byOrder = new Map<string, FieldServiceOrder>()
    for (const serviceOrder of existing) {
      if (serviceOrder.saleOrderId && !byOrder.has(serviceOrder.saleOrderId)) {
        byOrder.set(serviceOrder.saleOrderId, serviceOrder)
      }
    }
    for (const order of unique) {
      if (byOrder.has(order.id)) continue
      const values = await this.buildServiceOrderValues(order)
      const serviceOrder = await this.createOrRecover(order, values, { saleOrderId: order.id, saleOrderLineId: null })
      byOrder.set(order.id, serviceOrder)
    }
    return byOrder
  }

  /** One service order per given line, keyed by line id. Lines must belong to `order`. */
  async findOrCreateLineServiceOrders(
    order: SalesOrder,
    entries: readonly TrackedLine[],
  ): Promise<Map<string, FieldServiceOrder>> {
    const byLine = new Map<string, FieldServiceOrder>()
    if (!entries.length) return byLine
    const existing = await this.repo.find(FieldServiceOrder, {
      saleOrderLineId: { $in: entries.map((entry) => entry.line.id) },
    })
    for (const serviceOrder of existing) {
      if (serviceOrder.saleOrderLineId) byLine.set(serviceOrder.saleOrderLineId, serviceOrder)
    }
    for (const entry of entries) {
      if (byLine.has(entry.line.id)) continue
      const values = await this.buildLineServiceOrderValues(order, entry)
      const serviceOrder = await this.createOrRecover(order, values, { saleOrderLineId: entry.line.id }, entry.line)
      byLine.set(entry.line.id, serviceOrder)
    }
    return byLine
  }

  /**
   * Inserts in a savepoint so a unique violation leaves the surrounding
   * transaction usable for re-reading the winner. Only a record inserted here
   * gets the cross-reference notes.
   */
  private async createOrRecover(
    order: SalesOrder,
    values: FieldServiceOrderValues,
    winnerFilter: FilterQuery<FieldServiceOrder>,
    line: SalesOrderLine | null = null,
  ): Promise<FieldServiceOrder> {
    let serviceOrder: FieldServiceOrder
    try {
      serviceOrder = await this.repo.transactional(() =>
        createFieldServiceOrder(this.repo, values, { access: 'elevated' }),
      )
    } catch (err) {
      if (!this.settings.recoverDuplicates || !isServiceOrderUniqueViolation(err)) throw err
      const winner = await this.repo.findOne(FieldServiceOrder, winnerFilter)
      if (!winner) throw err
      console.warn(`${LOG_TAG} Concurrent generation for sales order ${order.orderNumber}; reusing ${winner.name}`)
      this.invalidate(order.id)
      return winner
    }
    await this.announce(order, serviceOrder, line)
    return serviceOrder
  }

  private async announce(
    order: SalesOrder,
    serviceOrder: FieldServiceOrder,
    line: SalesOrderLine | null = null,
  ): Promise<void> {
    const scope = { tenantId: order.tenantId, organizationId: order.organizationId }
    await this.messages.postMessage(
      { kind: 'sales.order', id: order.id, ...scope },
      this.translate('field_service_sale.messages.serviceOrderCreated', 'Field service order created: {link}', {
        link: formatRecordLink('field_service.order', serviceOrder.id, serviceOrder.name),
      }),
    )
    await this.messages.postMessage(
      { kind: 'field_service.order', id: serviceOrder.id, ...scope },
      this.translate('field_service_sale.messages.createdFrom', 'This order has been created from: {link}', {
        link: formatRecordLink('sales.order', order.id, order.orderNumber),
      }),
    )
    this.invalidate(order.id)
    console.info(`${LOG_TAG} Created service order ${serviceOrder.name} for sales order ${order.orderNumber}`)
    await emitFieldServiceSaleEvent('field_service_sale.service_order.created', {
      id: serviceOrder.id,
      name: serviceOrder.name,
      saleOrderId: order.id,
      saleOrderLineId: line?.id ?? null,
      tenantId: order.tenantId,
      organizationId: order.organizationId,
    })
  }

  private async loadTemplates(templateIds: ReadonlyArray<string | null>): Promise<FieldServiceOrderTemplate[]> {
    const ids = Array.from(new Set(templateIds.filter((id): id is string => typeof id === 'string')))
    if (!ids.length) return []
    return this.repo.find(FieldServiceOrderTemplate, { id: { $in: ids } })
  }

  private async loadLocation(order: SalesOrder): Promise<FieldServiceLocation | null> {
    if (!order.serviceLocationId) return null
    return this.repo.findById(FieldServiceLocation, order.serviceLocationId)
  }
}
