/**
 * Parameter bounds of the compression backends.
 *
 * These mirror the limits the Brotli and Zstd encoders accept; options are
 * validated against them before a chunk encoder ever sees them.
 */

/** Inclusive integer range. */
export interface LevelRange {
  readonly min: number;
  readonly max: number;
}

/** Brotli quality levels. Higher is denser but slower. */
export const BROTLI_LEVEL = { min: 0, max: 11, default: 6 } as const;

/** Zstd compression levels. Negative levels trade density for speed. */
export const ZSTD_LEVEL = { min: -131072, max: 22, default: 3 } as const;

/** Brotli LZ77 window log. The encoder uses 22 unless told otherwise. */
export const BROTLI_WINDOW_LOG = { min: 10, max: 30, default: 22 } as const;

/**
 * Zstd LZ77 window log. There is no fixed default: the encoder derives one
 * from the level and the expected chunk size.
 */
export const ZSTD_WINDOW_LOG = { min: 10, max: 31 } as const;

/** Window logs accepted by at least one backend. */
export const WINDOW_LOG: LevelRange = {
  min: Math.min(BROTLI_WINDOW_LOG.min, ZSTD_WINDOW_LOG.min),
  max: Math.max(BROTLI_WINDOW_LOG.max, ZSTD_WINDOW_LOG.max),
};

/**
 * Check that `value` is an integer within `range`.
 */
export function inRange(value: number, range: LevelRange): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}
