import type { Module, ModuleInfo } from '@fieldops/shared/modules/registry'
import './commands/orders'
import { features } from './acl'
import { register } from './di'

export const metadata: ModuleInfo = {
  name: 'field_service_sale',
  title: 'Field Service from Sales',
  version: '0.1.0',
  description: 'Generates field service orders when sales orders with service products are confirmed.',
  license: 'Proprietary',
}

export { features } from './acl'

export const fieldServiceSaleModule: Module = {
  id: 'field_service_sale',
  info: metadata,
  features,
  register,
}

export default fieldServiceSaleModule
