export { createDatabase, type Database } from './client.js';
export * as schema from './schema/index.js';
export * from './schema/types.js';
export { DbChunkArchive, chunkToRow, rowToChunk } from './chunk-archive.js';
export {
  WorldRepository,
  rowToLocation,
  locationToRow,
  type WorldDefaults,
} from './world-repository.js';
