export {
  defaultCompressorConfig,
  mergeCompressorConfig,
  type CompressorConfig,
} from './compressor-config';
