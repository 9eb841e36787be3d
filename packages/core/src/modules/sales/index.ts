import type { Module, ModuleInfo } from '@fieldops/shared/modules/registry'
import './commands/orders'
import { features, writeFeatures } from './acl'
import { register } from './di'

export const metadata: ModuleInfo = {
  name: 'sales',
  title: 'Sales Management',
  version: '0.1.0',
  description: 'Sales orders, their lines, notes and confirmation lifecycle.',
  license: 'Proprietary',
}

export { features } from './acl'

export const salesModule: Module = {
  id: 'sales',
  info: metadata,
  features,
  writeFeatures,
  register,
}

export default salesModule
