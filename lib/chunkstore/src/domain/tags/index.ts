export { ChunkKind, isChunkKind } from './chunk-kind';

export {
  CompressionAlgorithm,
  isCompressionAlgorithm,
  compressionAlgorithmName,
  type CompressionAlgorithmName,
} from './compression-algorithm';
