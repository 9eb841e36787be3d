import type { Module } from '@fieldops/shared/modules/registry'
import { catalogModule } from './modules/catalog'
import { customersModule } from './modules/customers'
import { fieldServiceModule } from './modules/field_service'
import { fieldServiceSaleModule } from './modules/field_service_sale'
import { salesModule } from './modules/sales'

/** Registration order matters: a module may replace registrations of the ones before it. */
export const modules: Module[] = [
  customersModule,
  catalogModule,
  salesModule,
  fieldServiceModule,
  fieldServiceSaleModule,
]
