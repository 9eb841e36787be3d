import type { Module, ModuleInfo } from '@fieldops/shared/modules/registry'
import { features, writeFeatures } from './acl'

export const metadata: ModuleInfo = {
  name: 'field_service',
  title: 'Field Service',
  version: '0.1.0',
  description: 'Service locations, order templates and field service orders.',
  license: 'Proprietary',
}

export { features } from './acl'

export const fieldServiceModule: Module = {
  id: 'field_service',
  info: metadata,
  features,
  writeFeatures,
}

export default fieldServiceModule
