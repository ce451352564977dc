/**
 * Error thrown when a schema is requested from no data
 */
export class EmptyInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/**
 * Error thrown when a type description is not a flat object of fields
 */
export class InvalidSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSchemaError';
  }
}

/**
 * Error thrown when a field declares a type TableKit does not model
 */
export class UnsupportedTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedTypeError';
  }
}
