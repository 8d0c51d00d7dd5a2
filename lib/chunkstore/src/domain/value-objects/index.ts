export { CompressorOptions } from './compressor-options';

export {
  BROTLI_LEVEL,
  ZSTD_LEVEL,
  BROTLI_WINDOW_LOG,
  ZSTD_WINDOW_LOG,
  WINDOW_LOG,
  type LevelRange,
} from './compression-limits';
