import type { RecordRepository } from '@fieldops/shared/lib/data/repository'
import { CustomerEntity } from '../data/entities'

/**
 * Walks up `parentEntityId` to the partner that carries the commercial
 * relationship: the first company, or the top of the chain.
 */
export async function resolveCommercialEntity(
  repo: RecordRepository,
  customer: CustomerEntity,
): Promise<CustomerEntity> {
  const visited = new Set<string>([customer.id])
  let current = customer
  while (!current.isCompany && current.parentEntityId) {
    if (visited.has(current.parentEntityId)) break
    const parent = await repo.findById(CustomerEntity, current.parentEntityId)
    if (!parent) break
    visited.add(parent.id)
    current = parent
  }
  return current
}

async function findDeliveryChild(repo: RecordRepository, parentId: string): Promise<CustomerEntity | null> {
  const [first] = await repo.find(
    CustomerEntity,
    { parentEntityId: parentId, addressType: 'delivery', deletedAt: null },
    { orderBy: { displayName: 'asc', id: 'asc' }, limit: 1 },
  )
  return first ?? null
}

/**
 * Delivery partner for a customer: the customer itself when it is a delivery
 * address, else its own delivery child, else one of its commercial entity,
 * else the customer.
 */
export async function resolveShippingEntity(
  repo: RecordRepository,
  customer: CustomerEntity,
): Promise<CustomerEntity> {
  if (customer.addressType === 'delivery') return customer
  const own = await findDeliveryChild(repo, customer.id)
  if (own) return own
  const commercial = await resolveCommercialEntity(repo, customer)
  if (commercial.id !== customer.id) {
    const inherited = await findDeliveryChild(repo, commercial.id)
    if (inherited) return inherited
  }
  return customer
}
