/**
 * Compression algorithm tags.
 *
 * Written into every chunk header to say how its payload was compressed.
 * Frozen in the file format, like {@link ChunkKind}.
 *
 * ```
 * Algorithm  Byte
 * None       0x00
 * Brotli     0x62 'b'
 * Zstd       0x7A 'z'
 * Snappy     0x73 's'
 * ```
 */
export const CompressionAlgorithm = {
  None: 0x00,
  Brotli: 0x62,
  Zstd: 0x7a,
  Snappy: 0x73,
} as const;

export type CompressionAlgorithm = (typeof CompressionAlgorithm)[keyof typeof CompressionAlgorithm];

/**
 * Option keyword for each algorithm, as written in compressor options text.
 */
export type CompressionAlgorithmName = 'uncompressed' | 'brotli' | 'zstd' | 'snappy';

const COMPRESSION_ALGORITHMS: ReadonlySet<number> = new Set(Object.values(CompressionAlgorithm));

/**
 * Check whether a raw header byte names a known compression algorithm.
 */
export function isCompressionAlgorithm(byte: number): byte is CompressionAlgorithm {
  return COMPRESSION_ALGORITHMS.has(byte);
}

/**
 * Get the option keyword for an algorithm.
 */
export function compressionAlgorithmName(algorithm: CompressionAlgorithm): CompressionAlgorithmName {
  switch (algorithm) {
    case CompressionAlgorithm.None:
      return 'uncompressed';
    case CompressionAlgorithm.Brotli:
      return 'brotli';
    case CompressionAlgorithm.Zstd:
      return 'zstd';
    case CompressionAlgorithm.Snappy:
      return 'snappy';
    default: {
      const unreachable: never = algorithm;
      throw new Error(`Unknown compression algorithm: ${String(unreachable)}`);
    }
  }
}
