export { ChunkStoreError } from './chunkstore-error';
