/**
 * Compressor configuration.
 */

import type { CompressionAlgorithmName } from '../domain/tags/compression-algorithm';

/**
 * Plain-object form of compressor options, for configuration files and
 * programmatic setup.
 */
export interface CompressorConfig {
  /** Compression algorithm (default: "brotli"). */
  algorithm: CompressionAlgorithmName;

  /** Compression level. Omit for the algorithm's default. */
  level?: number;

  /** Window log. Omit to let the backend choose. */
  windowLog?: number;
}

/**
 * Creates default compressor configuration.
 */
export function defaultCompressorConfig(): CompressorConfig {
  return {
    algorithm: 'brotli',
  };
}

/**
 * Merges partial config with defaults.
 */
export function mergeCompressorConfig(partial: Partial<CompressorConfig>): CompressorConfig {
  return {
    ...defaultCompressorConfig(),
    ...partial,
  };
}
