import { Entity, Index, OptionalProps, PrimaryKey, Property } from '@mikro-orm/core'

export type CustomerAddressType = 'contact' | 'delivery' | 'invoice'

@Entity({ tableName: 'customer_entities' })
@Index({ name: 'customer_entities_org_tenant_idx', properties: ['organizationId', 'tenantId'] })
@Index({ name: 'customer_entities_parent_idx', properties: ['parentEntityId', 'addressType'] })
export class CustomerEntity {
  [OptionalProps]?: 'addressType' | 'isCompany' | 'isServiceLocation' | 'createdAt' | 'updatedAt' | 'deletedAt'

  @PrimaryKey({ type: 'uuid', defaultRaw: 'gen_random_uuid()' })
  id!: string

  @Property({ name: 'organization_id', type: 'uuid' })
  organizationId!: string

  @Property({ name: 'tenant_id', type: 'uuid' })
  tenantId!: string

  @Property({ name: 'display_name', type: 'text' })
  displayName!: string

  /** Owning company for contacts and addresses; null on top-level records. */
  @Property({ name: 'parent_entity_id', type: 'uuid', nullable: true })
  parentEntityId?: string | null

  @Property({ name: 'address_type', type: 'text' })
  addressType: CustomerAddressType = 'contact'

  @Property({ name: 'is_company', type: 'boolean' })
  isCompany: boolean = false

  /** The partner itself is a field-service site. */
  @Property({ name: 'is_service_location', type: 'boolean' })
  isServiceLocation: boolean = false

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()

  @Property({ name: 'deleted_at', type: Date, nullable: true })
  deletedAt?: Date | null
}
