type PlainRecord = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function normalize(value: unknown): unknown {
  if (value === undefined) return null
  if (value instanceof Date) return value.getTime()
  return value
}

function sameValue(left: unknown, right: unknown): boolean {
  return normalize(left) === normalize(right)
}

function matchesOperator(value: unknown, operator: string, operand: unknown): boolean {
  switch (operator) {
    case '$eq':
      return sameValue(value, operand)
    case '$ne':
      return !sameValue(value, operand)
    case '$in':
      return Array.isArray(operand) && operand.some((candidate) => sameValue(value, candidate))
    case '$nin':
      return Array.isArray(operand) && !operand.some((candidate) => sameValue(value, candidate))
    default:
      throw new Error(`[data] Unsupported filter operator "${operator}"`)
  }
}

function matchesCondition(value: unknown, condition: unknown): boolean {
  if (Array.isArray(condition)) {
    return condition.some((candidate) => sameValue(value, candidate))
  }
  if (isPlainObject(condition)) {
    return Object.entries(condition).every(([operator, operand]) => matchesOperator(value, operator, operand))
  }
  return sameValue(value, condition)
}

/**
 * Evaluates the subset of MikroORM filter syntax the record repositories
 * accept: field equality (scalar, `null`, array shorthand for `$in`),
 * `$eq`/`$ne`/`$in`/`$nin` and the `$and`/`$or`/`$not` groups.
 */
export function matchesFilter(record: object, filter: unknown): boolean {
  if (filter === undefined || filter === null) return true
  if (!isPlainObject(filter)) {
    throw new Error('[data] Filter must be an object')
  }
  for (const [key, condition] of Object.entries(filter)) {
    if (key === '$or') {
      if (!Array.isArray(condition) || !condition.some((group) => matchesFilter(record, group))) return false
      continue
    }
    if (key === '$and') {
      if (!Array.isArray(condition) || !condition.every((group) => matchesFilter(record, group))) return false
      continue
    }
    if (key === '$not') {
      if (matchesFilter(record, condition)) return false
      continue
    }
    if (key.startsWith('$')) {
      throw new Error(`[data] Unsupported filter group "${key}"`)
    }
    if (!matchesCondition(Reflect.get(record, key), condition)) return false
  }
  return true
}

function compareValues(left: unknown, right: unknown): number {
  const a = normalize(left)
  const b = normalize(right)
  if (a === b) return 0
  // nulls sort last, as postgres does for ascending order
  if (a === null) return 1
  if (b === null) return -1
  if (typeof a === 'number' && typeof b === 'number') return a - b
  return String(a).localeCompare(String(b))
}

function isDescending(direction: unknown): boolean {
  if (typeof direction === 'number') return direction < 0
  return typeof direction === 'string' && direction.toLowerCase().startsWith('desc')
}

export function compareByOrder(left: object, right: object, orderBy: unknown): number {
  if (Array.isArray(orderBy)) {
    for (const entry of orderBy) {
      const result = compareByOrder(left, right, entry)
      if (result !== 0) return result
    }
    return 0
  }
  if (!isPlainObject(orderBy)) return 0
  for (const [field, direction] of Object.entries(orderBy)) {
    const result = compareValues(Reflect.get(left, field), Reflect.get(right, field))
    if (result !== 0) return isDescending(direction) ? -result : result
  }
  return 0
}
