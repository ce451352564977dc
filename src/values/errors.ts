/**
 * Error thrown when a scalar value cannot be constructed from its input
 */
export class InvalidValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidValueError';
  }
}
