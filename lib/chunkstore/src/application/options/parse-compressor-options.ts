/**
 * Compressor options text parsing.
 *
 * Grammar:
 * ```
 * options      ::= option? ("," option?)*
 * option       ::= "uncompressed"
 *                | "brotli" (":" brotli_level)?
 *                | "zstd" (":" zstd_level)?
 *                | "snappy"
 *                | "window_log" ":" window_log
 * brotli_level ::= integer 0..11 (default 6)
 * zstd_level   ::= integer -131072..22 (default 3)
 * window_log   ::= "auto" | integer 10..31
 * ```
 *
 * Options apply left to right and later ones override earlier ones, so
 * `brotli,zstd` means Zstd at level 3. `window_log` is independent of the
 * algorithm options and may appear before or after them. The window log is
 * checked against the final algorithm: Brotli stops at 30, and Uncompressed
 * and Snappy take none.
 */

import { InvalidCompressorOptionsError } from '../../domain/errors/invalid-compressor-options.error';
import type { CompressionAlgorithmName } from '../../domain/tags/compression-algorithm';
import {
  BROTLI_LEVEL,
  BROTLI_WINDOW_LOG,
  WINDOW_LOG,
  ZSTD_LEVEL,
  inRange,
  type LevelRange,
} from '../../domain/value-objects/compression-limits';
import { CompressorOptions } from '../../domain/value-objects/compressor-options';

/**
 * Outcome of {@link parseCompressorOptions}.
 */
export type ParseCompressorOptionsResult =
  | { ok: true; options: CompressorOptions }
  | { ok: false; error: InvalidCompressorOptionsError };

/**
 * Fields accumulated while walking the option segments.
 */
interface ParseState {
  algorithm: CompressionAlgorithmName;
  level: number;
  windowLog: number | undefined;
}

const INTEGER_PATTERN = /^[+-]?[0-9]+$/;

/**
 * Parse compressor options text.
 *
 * Never throws for bad input: malformed or out-of-range text is reported in
 * the result, with the offending segment as the error's `token`. An empty
 * string yields the default options (Brotli, level 6).
 *
 * @example
 * ```ts
 * const result = parseCompressorOptions('zstd:5,window_log:auto');
 * if (!result.ok) {
 *   throw result.error;
 * }
 * result.options.level; // 5
 * ```
 */
export function parseCompressorOptions(text: string): ParseCompressorOptionsResult {
  const state: ParseState = {
    algorithm: 'brotli',
    level: BROTLI_LEVEL.default,
    windowLog: undefined,
  };

  for (const segment of text.split(',')) {
    if (segment === '') {
      continue;
    }
    const error = applySegment(state, segment);
    if (error) {
      return { ok: false, error };
    }
  }

  if (
    state.windowLog !== undefined &&
    (state.algorithm === 'uncompressed' || state.algorithm === 'snappy')
  ) {
    return {
      ok: false,
      error: new InvalidCompressorOptionsError(
        text,
        `window_log is not supported by ${state.algorithm}`,
      ),
    };
  }

  if (
    state.algorithm === 'brotli' &&
    state.windowLog !== undefined &&
    state.windowLog > BROTLI_WINDOW_LOG.max
  ) {
    return {
      ok: false,
      error: new InvalidCompressorOptionsError(
        text,
        `brotli window_log must be between ${BROTLI_WINDOW_LOG.min} and ${BROTLI_WINDOW_LOG.max}`,
      ),
    };
  }

  return {
    ok: true,
    options: CompressorOptions.fromConfig({
      algorithm: state.algorithm,
      level: state.level,
      windowLog: state.windowLog,
    }),
  };
}

/**
 * Parse compressor options text, throwing on bad input.
 * @throws {InvalidCompressorOptionsError} if the text is malformed
 */
export function compressorOptionsFromString(text: string): CompressorOptions {
  const result = parseCompressorOptions(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.options;
}

function applySegment(state: ParseState, segment: string): InvalidCompressorOptionsError | undefined {
  const colon = segment.indexOf(':');
  const key = colon < 0 ? segment : segment.slice(0, colon);
  const value = colon < 0 ? undefined : segment.slice(colon + 1);

  switch (key) {
    case 'uncompressed':
    case 'snappy':
      if (value !== undefined) {
        return new InvalidCompressorOptionsError(segment, `${key} takes no value`);
      }
      state.algorithm = key === 'snappy' ? 'snappy' : 'uncompressed';
      state.level = 0;
      return undefined;

    case 'brotli':
    case 'zstd': {
      const algorithm = key === 'brotli' ? 'brotli' : 'zstd';
      const range = algorithm === 'brotli' ? BROTLI_LEVEL : ZSTD_LEVEL;
      if (value === undefined) {
        state.algorithm = algorithm;
        state.level = range.default;
        return undefined;
      }
      const level = parseBoundedInteger(value, range);
      if (level === undefined) {
        return new InvalidCompressorOptionsError(
          segment,
          `${key} level must be an integer between ${range.min} and ${range.max}`,
        );
      }
      state.algorithm = algorithm;
      state.level = level;
      return undefined;
    }

    case 'window_log': {
      if (value === undefined) {
        return new InvalidCompressorOptionsError(segment, 'window_log requires a value');
      }
      if (value === 'auto') {
        state.windowLog = undefined;
        return undefined;
      }
      const windowLog = parseBoundedInteger(value, WINDOW_LOG);
      if (windowLog === undefined) {
        return new InvalidCompressorOptionsError(
          segment,
          `window_log must be "auto" or an integer between ${WINDOW_LOG.min} and ${WINDOW_LOG.max}`,
        );
      }
      state.windowLog = windowLog;
      return undefined;
    }

    default:
      return new InvalidCompressorOptionsError(segment, `unknown option '${key}'`);
  }
}

function parseBoundedInteger(text: string, range: LevelRange): number | undefined {
  if (!INTEGER_PATTERN.test(text)) {
    return undefined;
  }
  const value = Number(text);
  if (!inRange(value, range)) {
    return undefined;
  }
  // "-0" parses to -0
  return value === 0 ? 0 : value;
}
