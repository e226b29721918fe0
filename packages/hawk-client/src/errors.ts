/**
 * Thrown when a request cannot be signed.
 */
export class HawkClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HawkClientError';
  }
}
