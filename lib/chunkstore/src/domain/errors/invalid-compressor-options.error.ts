import { ChunkStoreError } from '../../errors/chunkstore-error';

/**
 * Thrown (or returned) when compressor options text cannot be parsed.
 *
 * `token` is the comma-separated segment that was rejected, or the whole text
 * when the problem is the combination of segments.
 */
export class InvalidCompressorOptionsError extends ChunkStoreError {
  constructor(
    public readonly token: string,
    public readonly reason: string,
  ) {
    super(`Invalid compressor options at '${token}': ${reason}`);
    this.name = 'InvalidCompressorOptionsError';
    Object.setPrototypeOf(this, InvalidCompressorOptionsError.prototype);
  }
}
