/**
 * Error thrown when a required argument is missing or malformed
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Error thrown when a reader or line source is used after it was closed
 */
export class ReaderClosedError extends Error {
  constructor(message = 'Cannot read from a closed reader') {
    super(message);
    this.name = 'ReaderClosedError';
  }
}
