import { Entity, Index, OptionalProps, PrimaryKey, Property } from '@mikro-orm/core'

export const FIELD_SERVICE_TRACKING_MODES = ['no', 'sale', 'line', 'delivery'] as const

/**
 * `sale`: one field service order per sales order.
 * `line`: one field service order per sales order line.
 * `delivery`: generated when the goods are delivered, outside the confirmation flow.
 */
export type FieldServiceTrackingMode = (typeof FIELD_SERVICE_TRACKING_MODES)[number]

@Entity({ tableName: 'catalog_products' })
@Index({ name: 'catalog_products_org_tenant_idx', properties: ['organizationId', 'tenantId'] })
export class CatalogProduct {
  [OptionalProps]?: 'fieldServiceTracking' | 'createdAt' | 'updatedAt' | 'deletedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ type: 'text' })
  name!: string

  @Property({ type: 'text', nullable: true })
  sku?: string | null

  @Property({ name: 'field_service_tracking', type: 'text' })
  fieldServiceTracking: FieldServiceTrackingMode = 'no'

  @Property({ name: 'field_service_template_id', type: 'uuid', nullable: true })
  fieldServiceTemplateId?: string | null

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()

  @Property({ name: 'deleted_at', type: Date, nullable: true })
  deletedAt?: Date | null
}
