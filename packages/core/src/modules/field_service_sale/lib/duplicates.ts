import { UniqueConstraintViolationException } from '@mikro-orm/core'

const SERVICE_ORDER_UNIQUE_CONSTRAINTS = new Set([
  'field_service_orders_sale_order_unique',
  'field_service_orders_sale_line_unique',
])

function readStringProp(value: object, key: string): string | null {
  const prop: unknown = Reflect.get(value, key)
  return typeof prop === 'string' ? prop : null
}

/** True when `error` is the unique index guarding one service order per sales order (or line). */
export function isServiceOrderUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  const uniqueViolation =
    error instanceof UniqueConstraintViolationException || readStringProp(error, 'code') === '23505'
  if (!uniqueViolation) return false
  const constraint = readStringProp(error, 'constraint')
  return constraint !== null && SERVICE_ORDER_UNIQUE_CONSTRAINTS.has(constraint)
}
