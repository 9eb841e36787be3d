import { CrudHttpError } from '@fieldops/shared/lib/crud/errors'

export const MISSING_LOCATION_ERROR_CODE = 'field_service_location_required'

/** Raised when confirming an order with service lines but no service location. */
export class MissingLocationError extends CrudHttpError {
  constructor(message = 'Field service location must be set') {
    super(422, { error: message, code: MISSING_LOCATION_ERROR_CODE })
    this.name = 'MissingLocationError'
  }
}
