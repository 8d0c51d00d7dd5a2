/**
 * Chunk kind tags.
 *
 * Every chunk header carries one of these bytes. The values are frozen in the
 * file format: new kinds may be added, existing ones are never renumbered or
 * removed, or previously written files become unreadable.
 *
 * ```
 * Kind           Byte
 * FileSignature  0x73 's'
 * FileMetadata   0x6D 'm'
 * Padding        0x70 'p'
 * Simple         0x72 'r'
 * Transposed     0x74 't'
 * ```
 */
export const ChunkKind = {
  FileSignature: 0x73,
  FileMetadata: 0x6d,
  Padding: 0x70,
  Simple: 0x72,
  Transposed: 0x74,
} as const;

export type ChunkKind = (typeof ChunkKind)[keyof typeof ChunkKind];

const CHUNK_KINDS: ReadonlySet<number> = new Set(Object.values(ChunkKind));

/**
 * Check whether a raw header byte names a known chunk kind.
 */
export function isChunkKind(byte: number): byte is ChunkKind {
  return CHUNK_KINDS.has(byte);
}
