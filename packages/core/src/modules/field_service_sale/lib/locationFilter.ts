import type { FilterQuery } from '@mikro-orm/core'
import type { FieldServiceLocation } from '@fieldops/core/modules/field_service/data/entities'

export type LocationCandidates = {
  customerId: string
  customerIsServiceLocation: boolean
  shippingEntityId?: string | null
  commercialEntityId?: string | null
}

/**
 * Locations owned by the customer, its shipping partner or its commercial
 * entity. A customer that is itself a service location only matches its own.
 */
export function buildServiceLocationFilter(candidates: LocationCandidates): FilterQuery<FieldServiceLocation> {
  if (candidates.customerIsServiceLocation) {
    return { customerEntityId: candidates.customerId, deletedAt: null }
  }
  const ownerIds = [candidates.customerId, candidates.shippingEntityId, candidates.commercialEntityId].filter(
    (id, index, all): id is string => typeof id === 'string' && id.length > 0 && all.indexOf(id) === index,
  )
  return {
    $or: ownerIds.map((customerEntityId) => ({ customerEntityId })),
    deletedAt: null,
  }
}
