import { CompressorOptions } from '../../domain/value-objects/compressor-options';
import { ConsoleLogger } from '../../infrastructure/logging/console-logger';
import type { Logger } from '../../ports/logging/logger';
import { parseCompressorOptions } from './parse-compressor-options';

export interface ResolveCompressorOptionsConfig {
  /** Where to report rejected text (default: ConsoleLogger) */
  logger?: Logger;
  /** Options to use when the text is missing or invalid (default: Brotli level 6) */
  fallback?: CompressorOptions;
}

/**
 * Resolve user-supplied options text, falling back instead of failing.
 *
 * Meant for settings that should never stop a writer from starting, such as
 * an optional flag or config entry. Text with no options in it (`''`, `','`)
 * counts as missing and yields the fallback silently. Rejected text is logged
 * as a warning.
 * The returned options are always a fresh copy, never the fallback itself.
 *
 * @example
 * ```ts
 * const options = resolveCompressorOptions(config.compression, {
 *   logger,
 *   fallback: new CompressorOptions().setZstd(),
 * });
 * ```
 */
export function resolveCompressorOptions(
  text: string | undefined,
  config: ResolveCompressorOptionsConfig = {},
): CompressorOptions {
  const fallback = config.fallback ?? new CompressorOptions();
  if (text === undefined || isBlank(text)) {
    return fallback.clone();
  }

  const result = parseCompressorOptions(text);
  if (result.ok) {
    return result.options;
  }

  const logger = config.logger ?? new ConsoleLogger();
  logger.warn(`${result.error.message}; using '${fallback.toString()}'`);
  return fallback.clone();
}

function isBlank(text: string): boolean {
  return text.split(',').every((segment) => segment === '');
}
