// ============================================================
// chunkstore - Compression options and format tags
// ============================================================

// Compressor options value object
export { CompressorOptions } from './domain/value-objects';

// Parsing options text
export {
  parseCompressorOptions,
  compressorOptionsFromString,
  resolveCompressorOptions,
  type ParseCompressorOptionsResult,
  type ResolveCompressorOptionsConfig,
} from './application';

// ============================================================
// Frozen format tags
// ============================================================

export {
  ChunkKind,
  isChunkKind,
  CompressionAlgorithm,
  isCompressionAlgorithm,
  compressionAlgorithmName,
  type CompressionAlgorithmName,
} from './domain/tags';

// ============================================================
// Errors
// ============================================================

// Recoverable errors
export { ChunkStoreError } from './errors';
export { InvalidCompressorOptionsError } from './domain/errors';

// API misuse
export { PreconditionError } from './domain/errors';

// ============================================================
// Configuration and backend limits
// ============================================================

export {
  defaultCompressorConfig,
  mergeCompressorConfig,
  type CompressorConfig,
} from './config';

export {
  BROTLI_LEVEL,
  ZSTD_LEVEL,
  BROTLI_WINDOW_LOG,
  ZSTD_WINDOW_LOG,
  WINDOW_LOG,
  type LevelRange,
} from './domain/value-objects';

// ============================================================
// Logging
// ============================================================

export type { Logger, LogLevel } from './ports';

export { ConsoleLogger, type ConsoleLoggerOptions } from './infrastructure';
