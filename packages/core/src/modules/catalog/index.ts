import type { Module, ModuleInfo } from '@fieldops/shared/modules/registry'
import { features, writeFeatures } from './acl'

export const metadata: ModuleInfo = {
  name: 'catalog',
  title: 'Product Catalog',
  version: '0.1.0',
  description: 'Products and their field service tracking settings.',
  license: 'Proprietary',
}

export { features } from './acl'

export const catalogModule: Module = {
  id: 'catalog',
  info: metadata,
  features,
  writeFeatures,
}

export default catalogModule
