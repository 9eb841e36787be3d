import { UniqueConstraintViolationException } from '@mikro-orm/core'
import { FieldServiceLocation, FieldServiceNote, FieldServiceOrder } from '@fieldops/core/modules/field_service/data/entities'
import { SalesNote, SalesOrderLine } from '@fieldops/core/modules/sales/data/entities'
import type { FieldServiceSaleService } from '../lib/fieldServiceSaleService'
import { IDS, SCOPE, createWorld, seedOrder, seedPartners, seedProduct, seedTemplates, type WorldOptions } from './fixtures'

function setup(options: WorldOptions = {}) {
  const world = createWorld(options)
  seedPartners(world.repo)
  seedTemplates(world.repo)
  const service = world.container.resolve<FieldServiceSaleService>('fieldServiceSaleService')
  return { ...world, service }
}

function uniqueViolation(constraint: string): UniqueConstraintViolationException {
  const error = new UniqueConstraintViolationException(new Error('duplicate key value violates unique constraint'))
  Reflect.set(error, 'constraint', constraint)
  return error
}

function orderLevel(rows: FieldServiceOrder[]): FieldServiceOrder[] {
  return rows.filter((row) => !row.saleOrderLineId)
}

describe('FieldServiceSaleService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined)
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  describe('buildServiceOrderValues', () => {
    test('aggregates the templates of sale-tracked lines in line order', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, {}, [
        seedProduct(repo, 'Boiler install', 'sale', IDS.templateA),
        seedProduct(repo, 'Safety inspection', 'sale', IDS.templateB),
        seedProduct(repo, 'Filter cartridge', 'no'),
        seedProduct(repo, 'Per-unit setup', 'line', IDS.templateA),
      ])

      const values = await service.buildServiceOrderValues(order)

      expect(values).toMatchObject({
        name: 'FSO/SO-1001',
        status: 'new',
        locationId: IDS.mainLocation,
        locationDirections: 'Gate 3',
        notes: 'AB',
        scheduledDurationHours: 3.5,
        categoryIds: [IDS.categoryInstall, IDS.categoryInspect],
        saleOrderId: IDS.order,
        saleOrderLineId: null,
      })
    })

    test('uses the configured name prefix', async () => {
      const { repo, service } = setup({ settings: { orderNamePrefix: 'SVC' } })
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])

      await expect(service.buildServiceOrderValues(order)).resolves.toMatchObject({ name: 'SVC/SO-1001' })
    })
  })

  describe('findOrCreateServiceOrder', () => {
    test('creates one order-level service order and reuses it afterwards', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])

      const first = await service.findOrCreateServiceOrder([order])
      const second = await service.findOrCreateServiceOrder([order, order])

      expect(second.get(order.id)).toBe(first.get(order.id))
      expect(orderLevel(repo.all(FieldServiceOrder))).toHaveLength(1)
      expect(repo.all(SalesNote)).toHaveLength(1)
    })

    test('posts a cross-reference note on both records', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])

      const created = await service.createServiceOrder([order])
      const serviceOrder = created.get(order.id)

      expect(serviceOrder?.name).toBe('FSO/SO-1001')
      const [salesNote] = repo.all(SalesNote)
      expect(salesNote).toMatchObject({
        contextType: 'order',
        contextId: order.id,
        authorUserId: IDS.user,
        body: `Field service order created: <a href="#" data-model="field_service.order" data-id="${serviceOrder?.id}">FSO/SO-1001</a>`,
      })
      const [serviceNote] = repo.all(FieldServiceNote)
      expect(serviceNote).toMatchObject({
        orderId: serviceOrder?.id,
        body: `This order has been created from: <a href="#" data-model="sales.order" data-id="${IDS.order}">SO-1001</a>`,
      })
    })

    test('emits the created events', async () => {
      const { repo, service, events } = setup()
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])

      const created = await service.createServiceOrder([order])
      const serviceOrder = created.get(order.id)

      expect(events.map((entry) => entry.event)).toEqual([
        'field_service.orders.created',
        'field_service_sale.service_order.created',
      ])
      expect(events[1].payload).toEqual({
        id: serviceOrder?.id,
        name: 'FSO/SO-1001',
        saleOrderId: IDS.order,
        saleOrderLineId: null,
        tenantId: SCOPE.tenantId,
        organizationId: SCOPE.organizationId,
      })
    })

    test('returns the winning record when a concurrent create hits the unique index', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])
      let winner: FieldServiceOrder | null = null
      repo.onBeforeCreate((entityName) => {
        if (entityName !== 'FieldServiceOrder' || winner) return
        ;[winner] = repo.seed(FieldServiceOrder, [{ ...SCOPE, name: 'FSO/SO-1001', saleOrderId: IDS.order }])
        throw uniqueViolation('field_service_orders_sale_order_unique')
      })

      const result = await service.findOrCreateServiceOrder([order])

      expect(winner).not.toBeNull()
      expect(result.get(order.id)).toBe(winner)
      expect(repo.all(FieldServiceOrder)).toHaveLength(1)
      expect(repo.all(SalesNote)).toHaveLength(0)
      expect(console.warn).toHaveBeenCalledWith(
        '[field_service_sale] Concurrent generation for sales order SO-1001; reusing FSO/SO-1001',
      )
    })

    test('propagates a unique violation of another index without posting notes', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])
      repo.onBeforeCreate((entityName) => {
        if (entityName === 'FieldServiceOrder') throw uniqueViolation('field_service_orders_name_unique')
      })

      await expect(service.findOrCreateServiceOrder([order])).rejects.toMatchObject({
        constraint: 'field_service_orders_name_unique',
      })
      expect(repo.all(FieldServiceOrder)).toHaveLength(0)
      expect(repo.all(SalesNote)).toHaveLength(0)
      expect(console.warn).not.toHaveBeenCalled()
    })

    test('propagates the violation when recovery is disabled', async () => {
      const { repo, service } = setup({ settings: { recoverDuplicates: false } })
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])
      repo.onBeforeCreate((entityName) => {
        if (entityName === 'FieldServiceOrder') {
          throw uniqueViolation('field_service_orders_sale_order_unique')
        }
      })

      await expect(service.findOrCreateServiceOrder([order])).rejects.toBeInstanceOf(
        UniqueConstraintViolationException,
      )
    })

    test('creates service orders with elevated access when the caller cannot manage them', async () => {
      const { repo, service } = setup({ features: ['sales.*'] })
      const { order } = seedOrder(repo, {}, [seedProduct(repo, 'Boiler install', 'sale', IDS.templateA)])

      await service.findOrCreateServiceOrder([order])

      expect(repo.all(FieldServiceOrder)).toHaveLength(1)
      expect(repo.all(FieldServiceNote)).toHaveLength(1)
      await expect(
        repo.create(FieldServiceOrder, { ...SCOPE, name: 'Manual' }),
      ).rejects.toMatchObject({ status: 403, body: { error: 'Write access to FieldServiceOrder denied' } })
    })
  })

  describe('computeLinkedServiceOrders', () => {
    function seedLinked() {
      const world = setup()
      const { order, lines } = seedOrder(world.repo, {}, [
        seedProduct(world.repo, 'Boiler install', 'sale', IDS.templateA),
        seedProduct(world.repo, 'Per-unit setup', 'line', IDS.templateB),
      ])
      world.repo.seed(FieldServiceOrder, [
        { ...SCOPE, name: 'FSO/SO-1001/20', saleOrderLineId: lines[1].id },
        { ...SCOPE, name: 'FSO/SO-1001', saleOrderId: order.id },
        { ...SCOPE, name: 'FSO/SO-2002', saleOrderId: IDS.secondOrder },
      ])
      return { ...world, order, lines }
    }

    test('unions line-level and order-level service orders', async () => {
      const { service, order } = seedLinked()

      const linked = await service.computeLinkedServiceOrders([order.id])

      const entry = linked.get(order.id)
      expect(entry?.serviceOrderCount).toBe(2)
      expect(entry?.serviceOrders.map((row) => row.name)).toEqual(['FSO/SO-1001', 'FSO/SO-1001/20'])
    })

    test('counts a service order once when it matches both the order and a line', async () => {
      const { repo, service, order, lines } = seedLinked()
      repo.seed(FieldServiceOrder, [
        { ...SCOPE, name: 'FSO/SO-1001/10', saleOrderId: order.id, saleOrderLineId: lines[0].id },
      ])

      const linked = await service.computeLinkedServiceOrders([order.id])

      expect(linked.get(order.id)?.serviceOrderCount).toBe(3)
    })

    test('reports no service orders for an unrelated order', async () => {
      const { service } = seedLinked()

      const linked = await service.computeLinkedServiceOrders(['d0000000-0000-4000-8000-000000000099'])

      expect(linked.get('d0000000-0000-4000-8000-000000000099')).toEqual({ serviceOrders: [], serviceOrderCount: 0 })
    })

    test('memoizes per order until invalidated', async () => {
      const { repo, service, order } = seedLinked()
      await service.computeLinkedServiceOrders([order.id])
      repo.seed(FieldServiceOrder, [{ ...SCOPE, name: 'FSO/SO-1001-extra', saleOrderId: order.id }])

      const cached = await service.computeLinkedServiceOrders([order.id])
      expect(cached.get(order.id)?.serviceOrderCount).toBe(2)

      service.invalidate(order.id)
      const fresh = await service.computeLinkedServiceOrders([order.id])
      expect(fresh.get(order.id)?.serviceOrderCount).toBe(3)
    })

    test('recomputes when the order lines change', async () => {
      const { repo, service, order } = seedLinked()
      await service.computeLinkedServiceOrders([order.id])
      const [extraLine] = repo.seed(SalesOrderLine, [{ ...SCOPE, orderId: order.id, lineNumber: 30 }])
      repo.seed(FieldServiceOrder, [{ ...SCOPE, name: 'FSO/SO-1001/30', saleOrderLineId: extraLine.id }])

      const linked = await service.computeLinkedServiceOrders([order.id])

      expect(linked.get(order.id)?.serviceOrderCount).toBe(3)
    })
  })

  describe('onCustomerChanged', () => {
    test('infers a location owned by the commercial entity of a contact', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, { customerEntityId: IDS.contact, serviceLocationId: null })

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBe(IDS.mainLocation)
    })

    test('picks the first matching location by name', async () => {
      const { repo, service } = setup()
      repo.seed(FieldServiceLocation, [
        { ...SCOPE, id: 'a0000000-0000-4000-8000-000000000009', name: 'Annex', customerEntityId: IDS.company },
      ])
      const { order } = seedOrder(repo, { serviceLocationId: null })

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBe('a0000000-0000-4000-8000-000000000009')
    })

    test('considers locations of the shipping partner', async () => {
      const { repo, service } = setup()
      const [warehouse] = repo.seed(FieldServiceLocation, [
        {
          ...SCOPE,
          id: IDS.siteLocation,
          name: 'Dock',
          customerEntityId: 'c0000000-0000-4000-8000-000000000007',
        },
      ])
      const { order } = seedOrder(repo, {
        customerEntityId: IDS.contact,
        shippingCustomerEntityId: 'c0000000-0000-4000-8000-000000000007',
        serviceLocationId: null,
      })

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBe(warehouse.id)
    })

    test('clears the location of a flagged customer without its own location', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, { customerEntityId: IDS.site })

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBeNull()
    })

    test('uses the own location of a flagged customer', async () => {
      const { repo, service } = setup()
      repo.seed(FieldServiceLocation, [
        { ...SCOPE, id: IDS.siteLocation, name: 'Site Office', customerEntityId: IDS.site },
      ])
      const { order } = seedOrder(repo, { customerEntityId: IDS.site, serviceLocationId: null })

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBe(IDS.siteLocation)
    })

    test('skips deleted locations and clears when none remain', async () => {
      const { repo, service } = setup()
      const [mainLocation] = repo.all(FieldServiceLocation)
      mainLocation.deletedAt = new Date('2026-01-01T00:00:00.000Z')
      const { order } = seedOrder(repo)

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBeNull()
    })

    test('clears the location when the order has no customer', async () => {
      const { repo, service } = setup()
      const { order } = seedOrder(repo, { customerEntityId: null })

      await service.onCustomerChanged(order)

      expect(order.serviceLocationId).toBeNull()
    })
  })
})
