export {
  parseCompressorOptions,
  compressorOptionsFromString,
  type ParseCompressorOptionsResult,
} from './parse-compressor-options';

export {
  resolveCompressorOptions,
  type ResolveCompressorOptionsConfig,
} from './resolve-compressor-options';
