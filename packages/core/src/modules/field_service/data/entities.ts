import { Entity, Index, OptionalProps, PrimaryKey, Property } from '@mikro-orm/core'

export const FIELD_SERVICE_ORDER_STATUSES = ['new', 'scheduled', 'in_progress', 'done', 'cancelled'] as const
export type FieldServiceOrderStatus = (typeof FIELD_SERVICE_ORDER_STATUSES)[number]

@Entity({ tableName: 'field_service_locations' })
@Index({ name: 'field_service_locations_scope_idx', properties: ['organizationId', 'tenantId'] })
@Index({ name: 'field_service_locations_customer_idx', properties: ['customerEntityId'] })
export class FieldServiceLocation {
  [OptionalProps]?: 'createdAt' | 'updatedAt' | 'deletedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ type: 'text' })
  name!: string

  /** Partner owning the site. */
  @Property({ name: 'customer_entity_id', type: 'uuid' })
  customerEntityId!: string

  @Property({ type: 'text', nullable: true })
  direction?: string | null

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()

  @Property({ name: 'deleted_at', type: Date, nullable: true })
  deletedAt?: Date | null
}

@Entity({ tableName: 'field_service_categories' })
@Index({ name: 'field_service_categories_scope_idx', properties: ['organizationId', 'tenantId'] })
export class FieldServiceCategory {
  [OptionalProps]?: 'createdAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ type: 'text' })
  name!: string

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()
}

@Entity({ tableName: 'field_service_order_templates' })
@Index({ name: 'field_service_order_templates_scope_idx', properties: ['organizationId', 'tenantId'] })
export class FieldServiceOrderTemplate {
  [OptionalProps]?: 'durationHours' | 'categoryIds' | 'createdAt' | 'updatedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ type: 'text' })
  name!: string

  @Property({ type: 'text', nullable: true })
  instructions?: string | null

  @Property({ name: 'duration_hours', type: 'float' })
  durationHours: number = 0

  @Property({ name: 'category_ids', type: 'jsonb' })
  categoryIds: string[] = []

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()
}

@Entity({ tableName: 'field_service_orders' })
@Index({ name: 'field_service_orders_scope_idx', properties: ['organizationId', 'tenantId'] })
@Index({ name: 'field_service_orders_sale_order_idx', properties: ['saleOrderId'] })
@Index({
  name: 'field_service_orders_sale_order_unique',
  expression: `create unique index "field_service_orders_sale_order_unique" on "field_service_orders" ("sale_order_id") where sale_order_line_id is null`,
})
@Index({
  name: 'field_service_orders_sale_line_unique',
  expression: `create unique index "field_service_orders_sale_line_unique" on "field_service_orders" ("sale_order_line_id") where sale_order_line_id is not null`,
})
export class FieldServiceOrder {
  [OptionalProps]?: 'status' | 'categoryIds' | 'scheduledDurationHours' | 'createdAt' | 'updatedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ type: 'text' })
  name!: string

  @Property({ type: 'text' })
  status: FieldServiceOrderStatus = 'new'

  @Property({ name: 'location_id', type: 'uuid', nullable: true })
  locationId?: string | null

  @Property({ name: 'location_directions', type: 'text', nullable: true })
  locationDirections?: string | null

  @Property({ name: 'request_early', type: Date, nullable: true })
  requestEarly?: Date | null

  @Property({ name: 'scheduled_start', type: Date, nullable: true })
  scheduledStart?: Date | null

  @Property({ type: 'text', nullable: true })
  notes?: string | null

  @Property({ name: 'category_ids', type: 'jsonb' })
  categoryIds: string[] = []

  @Property({ name: 'scheduled_duration_hours', type: 'float' })
  scheduledDurationHours: number = 0

  @Property({ name: 'sale_order_id', type: 'uuid', nullable: true })
  saleOrderId?: string | null

  /** Set only on orders generated per sales order line. */
  @Property({ name: 'sale_order_line_id', type: 'uuid', nullable: true })
  saleOrderLineId?: string | null

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()
}

@Entity({ tableName: 'field_service_notes' })
@Index({ name: 'field_service_notes_order_idx', properties: ['orderId'] })
export class FieldServiceNote {
  [OptionalProps]?: 'createdAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ name: 'order_id', type: 'uuid' })
  orderId!: string

  @Property({ name: 'author_user_id', type: 'uuid', nullable: true })
  authorUserId?: string | null

  @Property({ type: 'text' })
  body!: string

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()
}
