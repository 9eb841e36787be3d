import { Entity, Index, OptionalProps, PrimaryKey, Property, Unique } from '@mikro-orm/core'

export const SALES_ORDER_STATUSES = ['draft', 'confirmed', 'cancelled'] as const
export type SalesOrderStatus = (typeof SALES_ORDER_STATUSES)[number]

export type SalesDocumentKind = 'order' | 'quote'

@Entity({ tableName: 'sales_orders' })
@Index({ name: 'sales_orders_org_tenant_idx', properties: ['organizationId', 'tenantId'] })
@Index({ name: 'sales_orders_customer_idx', properties: ['customerEntityId', 'organizationId', 'tenantId'] })
@Index({ name: 'sales_orders_status_idx', properties: ['organizationId', 'tenantId', 'status'] })
@Unique({ name: 'sales_orders_number_unique', properties: ['organizationId', 'tenantId', 'orderNumber'] })
export class SalesOrder {
  [OptionalProps]?: 'status' | 'createdAt' | 'updatedAt' | 'deletedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ name: 'order_number', type: 'text' })
  orderNumber!: string

  @Property({ name: 'status', type: 'text' })
  status: SalesOrderStatus = 'draft'

  @Property({ name: 'customer_entity_id', type: 'uuid', nullable: true })
  customerEntityId?: string | null

  /** Partner the goods ship to; derived from the customer on change. */
  @Property({ name: 'shipping_customer_entity_id', type: 'uuid', nullable: true })
  shippingCustomerEntityId?: string | null

  @Property({ name: 'expected_date', type: Date, nullable: true })
  expectedDate?: Date | null

  @Property({ name: 'service_location_id', type: 'uuid', nullable: true })
  serviceLocationId?: string | null

  @Property({ name: 'confirmed_at', type: Date, nullable: true })
  confirmedAt?: Date | null

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()

  @Property({ name: 'deleted_at', type: Date, nullable: true })
  deletedAt?: Date | null
}

@Entity({ tableName: 'sales_order_lines' })
@Index({ name: 'sales_order_lines_order_idx', properties: ['orderId', 'lineNumber'] })
export class SalesOrderLine {
  [OptionalProps]?: 'quantity' | 'createdAt' | 'updatedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ name: 'order_id', type: 'uuid' })
  orderId!: string

  @Property({ name: 'line_number', type: 'integer' })
  lineNumber!: number

  @Property({ name: 'product_id', type: 'uuid', nullable: true })
  productId?: string | null

  @Property({ type: 'text', nullable: true })
  name?: string | null

  @Property({ type: 'float' })
  quantity: number = 1

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()
}

@Entity({ tableName: 'sales_notes' })
@Index({ name: 'sales_notes_scope_idx', properties: ['organizationId', 'tenantId'] })
@Index({ name: 'sales_notes_context_idx', properties: ['contextType', 'contextId'] })
export class SalesNote {
  [OptionalProps]?: 'createdAt' | 'updatedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ name: 'context_type', type: 'text' })
  contextType!: SalesDocumentKind

  @Property({ name: 'context_id', type: 'uuid' })
  contextId!: string

  @Property({ name: 'author_user_id', type: 'uuid', nullable: true })
  authorUserId?: string | null

  @Property({ name: 'body', type: 'text' })
  body!: string

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()
}
