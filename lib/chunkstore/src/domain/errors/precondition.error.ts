/**
 * Thrown when a method is called in a way its contract forbids.
 *
 * This signals a defect in the calling code, never bad user input, so it
 * intentionally sits outside the {@link ChunkStoreError} hierarchy: code that
 * catches recoverable chunkstore errors must not swallow it.
 *
 * @example
 * ```ts
 * new CompressorOptions().setBrotli(12);
 * // PreconditionError: Failed precondition of CompressorOptions.setBrotli():
 * //   compression level out of range
 * ```
 */
export class PreconditionError extends Error {
  constructor(
    public readonly method: string,
    public readonly detail: string,
  ) {
    super(`Failed precondition of ${method}: ${detail}`);
    this.name = 'PreconditionError';
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }
}

/**
 * Throws a {@link PreconditionError} unless `condition` holds.
 */
export function checkPrecondition(
  condition: boolean,
  method: string,
  detail: string,
): asserts condition {
  if (!condition) {
    throw new PreconditionError(method, detail);
  }
}
