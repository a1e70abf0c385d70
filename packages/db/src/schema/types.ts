import type { InferSelectModel, InferInsertModel } from 'drizzle-orm';
import type { terrainChunks } from './world.js';
import type { locations } from './locations.js';

// Chunk types
export type TerrainChunkRow = InferSelectModel<typeof terrainChunks>;
export type NewTerrainChunkRow = InferInsertModel<typeof terrainChunks>;

// Location types
export type LocationRow = InferSelectModel<typeof locations>;
export type NewLocationRow = InferInsertModel<typeof locations>;
