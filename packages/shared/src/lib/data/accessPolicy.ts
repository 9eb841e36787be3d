import type { RecordAccessPolicy, RecordScope } from './repository'

export function hasFeature(granted: readonly string[], required: string): boolean {
  return granted.some((feature) => {
    if (feature === '*' || feature === required) return true
    if (feature.endsWith('.*')) return required.startsWith(feature.slice(0, -1))
    return false
  })
}

export type FeatureAccessPolicyOptions = {
  grantedFeatures: readonly string[]
  /** Entity class name to the feature a `user` write requires. */
  writeFeatures: Record<string, string>
  tenantId?: string | null
}

export function createFeatureAccessPolicy(options: FeatureAccessPolicyOptions): RecordAccessPolicy {
  return {
    canWrite(entityName: string, scope: RecordScope): boolean {
      if (options.tenantId && scope.tenantId && scope.tenantId !== options.tenantId) return false
      const required = options.writeFeatures[entityName]
      if (!required) return true
      return hasFeature(options.grantedFeatures, required)
    },
  }
}
