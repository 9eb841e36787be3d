import type { Module, ModuleInfo } from '@fieldops/shared/modules/registry'
import { features, writeFeatures } from './acl'

export const metadata: ModuleInfo = {
  name: 'customers',
  title: 'Customers',
  version: '0.1.0',
  description: 'Partners, their company hierarchy and delivery addresses.',
  license: 'Proprietary',
}

export { features } from './acl'

export const customersModule: Module = {
  id: 'customers',
  info: metadata,
  features,
  writeFeatures,
}

export default customersModule
