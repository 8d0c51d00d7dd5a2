/**
 * Base error for recoverable chunkstore failures.
 *
 * All chunkstore errors a caller is expected to handle extend this class.
 * Misuse of the API is reported with {@link PreconditionError} instead, which
 * deliberately does not extend it.
 *
 * @example
 * ```ts
 * try {
 *   options = compressorOptionsFromString(flags.compression);
 * } catch (error) {
 *   if (error instanceof ChunkStoreError) {
 *     // Report the bad flag and exit
 *   }
 * }
 * ```
 */
export class ChunkStoreError extends Error {
  constructor(message: string) {
    super(`[chunkstore] ${message}`);
    this.name = 'ChunkStoreError';
    Object.setPrototypeOf(this, ChunkStoreError.prototype);
  }
}
