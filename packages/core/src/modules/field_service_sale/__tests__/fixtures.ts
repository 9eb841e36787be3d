import { asValue } from 'awilix'
import { CommandBus, type CommandAuth } from '@fieldops/shared/lib/commands'
import { createFeatureAccessPolicy } from '@fieldops/shared/lib/data/accessPolicy'
import type { AppContainer } from '@fieldops/shared/lib/di/container'
import { collectWriteFeatures } from '@fieldops/shared/modules/registry'
import { InMemoryRecordRepository } from '@fieldops/shared/lib/testing/inMemoryRepository'
import type { EventBus, EventPayload } from '@fieldops/events'
import { bootstrap, createAppContainer } from '@fieldops/core/bootstrap'
import { modules } from '@fieldops/core/appModules'
import { CatalogProduct, type FieldServiceTrackingMode } from '@fieldops/core/modules/catalog/data/entities'
import { CustomerEntity } from '@fieldops/core/modules/customers/data/entities'
import {
  FieldServiceLocation,
  FieldServiceOrderTemplate,
} from '@fieldops/core/modules/field_service/data/entities'
import { SalesOrder, SalesOrderLine } from '@fieldops/core/modules/sales/data/entities'
import { DEFAULT_FIELD_SERVICE_SALE_SETTINGS, type FieldServiceSaleSettings } from '../lib/config'

export const SCOPE = {
  organizationId: '70000000-0000-4000-8000-000000000001',
  tenantId: '60000000-0000-4000-8000-000000000001',
}

export const IDS = {
  company: 'c0000000-0000-4000-8000-000000000001',
  contact: 'c0000000-0000-4000-8000-000000000002',
  site: 'c0000000-0000-4000-8000-000000000003',
  mainLocation: 'a0000000-0000-4000-8000-000000000001',
  siteLocation: 'a0000000-0000-4000-8000-000000000002',
  templateA: 'b0000000-0000-4000-8000-000000000001',
  templateB: 'b0000000-0000-4000-8000-000000000002',
  categoryInstall: 'e0000000-0000-4000-8000-000000000001',
  categoryInspect: 'e0000000-0000-4000-8000-000000000002',
  order: 'd0000000-0000-4000-8000-000000000001',
  secondOrder: 'd0000000-0000-4000-8000-000000000002',
  user: 'f0000000-0000-4000-8000-000000000001',
}

export const EXPECTED_DATE = new Date('2026-03-02T09:00:00.000Z')

export const ALL_FEATURES = ['*']

export type WorldOptions = {
  features?: string[]
  settings?: Partial<FieldServiceSaleSettings>
}

export type World = {
  repo: InMemoryRecordRepository
  container: AppContainer
  bus: EventBus
  commandBus: CommandBus
  auth: CommandAuth
  events: Array<{ event: string; payload: EventPayload }>
  execute<TResult>(commandId: string, input: unknown): Promise<TResult>
}

/** Request container wired with every module on top of an in-memory repository. */
export function createWorld(options: WorldOptions = {}): World {
  const auth: CommandAuth = {
    sub: IDS.user,
    tenantId: SCOPE.tenantId,
    orgId: SCOPE.organizationId,
    features: options.features ?? ALL_FEATURES,
  }
  const repo = new InMemoryRecordRepository(
    createFeatureAccessPolicy({
      grantedFeatures: auth.features ?? [],
      writeFeatures: collectWriteFeatures(modules),
      tenantId: auth.tenantId,
    }),
  )
  const container = createAppContainer({ recordRepository: repo, auth })
  container.register({
    fieldServiceSaleSettings: asValue<FieldServiceSaleSettings>({
      ...DEFAULT_FIELD_SERVICE_SALE_SETTINGS,
      ...options.settings,
    }),
  })
  const bus = bootstrap(container)
  const events: World['events'] = []
  for (const event of [
    'sales.orders.confirmed',
    'field_service.orders.created',
    'field_service_sale.service_order.created',
  ]) {
    bus.on(event, (payload) => {
      events.push({ event, payload })
    })
  }
  const commandBus = new CommandBus()
  return {
    repo,
    container,
    bus,
    commandBus,
    auth,
    events,
    async execute<TResult>(commandId: string, input: unknown): Promise<TResult> {
      const { result } = await commandBus.execute<unknown, TResult>(commandId, { input, ctx: { container, auth } })
      return result
    },
  }
}

/**
 * Acme Corp (company) with a contact, and a separate partner flagged as a
 * service site. Acme owns "Main Plant"; the site owns "Site Office".
 */
export function seedPartners(repo: InMemoryRecordRepository) {
  const [company, contact, site] = repo.seed(CustomerEntity, [
    { ...SCOPE, id: IDS.company, displayName: 'Acme Corp', isCompany: true },
    { ...SCOPE, id: IDS.contact, displayName: 'Jane Buyer', parentEntityId: IDS.company },
    { ...SCOPE, id: IDS.site, displayName: 'Acme Remote Site', parentEntityId: IDS.company, isServiceLocation: true },
  ])
  const [mainLocation] = repo.seed(FieldServiceLocation, [
    { ...SCOPE, id: IDS.mainLocation, name: 'Main Plant', customerEntityId: IDS.company, direction: 'Gate 3' },
  ])
  return { company, contact, site, mainLocation }
}

export function seedTemplates(repo: InMemoryRecordRepository) {
  const [templateA, templateB] = repo.seed(FieldServiceOrderTemplate, [
    {
      ...SCOPE,
      id: IDS.templateA,
      name: 'Install',
      instructions: 'A',
      durationHours: 1.5,
      categoryIds: [IDS.categoryInstall],
    },
    {
      ...SCOPE,
      id: IDS.templateB,
      name: 'Inspect',
      instructions: 'B',
      durationHours: 2.0,
      categoryIds: [IDS.categoryInstall, IDS.categoryInspect],
    },
  ])
  return { templateA, templateB }
}

export function seedProduct(
  repo: InMemoryRecordRepository,
  name: string,
  mode: FieldServiceTrackingMode,
  templateId: string | null = null,
): CatalogProduct {
  const [product] = repo.seed(CatalogProduct, [
    { ...SCOPE, name, fieldServiceTracking: mode, fieldServiceTemplateId: templateId },
  ])
  return product
}

export function seedOrder(
  repo: InMemoryRecordRepository,
  overrides: Partial<SalesOrder> = {},
  products: CatalogProduct[] = [],
): { order: SalesOrder; lines: SalesOrderLine[] } {
  const [order] = repo.seed(SalesOrder, [
    {
      ...SCOPE,
      id: IDS.order,
      orderNumber: 'SO-1001',
      customerEntityId: IDS.company,
      expectedDate: EXPECTED_DATE,
      serviceLocationId: IDS.mainLocation,
      ...overrides,
    },
  ])
  const lines = repo.seed(
    SalesOrderLine,
    products.map((product, index) => ({
      ...SCOPE,
      orderId: order.id,
      lineNumber: (index + 1) * 10,
      productId: product.id,
      name: product.name,
    })),
  )
  return { order, lines }
}
