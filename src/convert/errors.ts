/**
 * Error thrown when a row's length does not match its schema
 */
export class RowShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowShapeError';
  }
}
