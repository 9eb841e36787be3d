export type CrudErrorBody = {
  error?: string
  code?: string
  [key: string]: unknown
}

export class CrudHttpError extends Error {
  status: number
  body: CrudErrorBody

  constructor(status: number, body?: CrudErrorBody | string) {
    const normalizedBody: CrudErrorBody = typeof body === 'string' ? { error: body } : body ?? {}
    super(typeof body === 'string' ? body : normalizedBody.error ?? 'Request failed')
    this.name = 'CrudHttpError'
    this.status = status
    this.body = normalizedBody
  }
}

export function forbidden(message = 'Forbidden'): CrudHttpError {
  return new CrudHttpError(403, { error: message })
}

export function notFound(message = 'Not found'): CrudHttpError {
  return new CrudHttpError(404, { error: message })
}

export function conflict(message: string, code?: string): CrudHttpError {
  return new CrudHttpError(409, code ? { error: message, code } : { error: message })
}
