/**
 * Terrain kinds, in ruleset order
 */
export const TERRAIN_KINDS = [
  'plains',
  'forest',
  'hills',
  'foothills',
  'mountain',
  'water',
  'beach',
  'desert',
  'swamp',
  'tundra',
  'volcanic',
  'ruins',
] as const;

export type TerrainKind = (typeof TERRAIN_KINDS)[number];

export function isTerrainKind(value: string): value is TerrainKind {
  return (TERRAIN_KINDS as readonly string[]).includes(value);
}

/**
 * Resolved block of terrain. Immutable once generated.
 */
export interface TerrainChunk {
  chunkX: number;
  chunkY: number;
  size: number;
  tiles: TerrainKind[][]; // [localY][localX], localY grows northward
  seed: bigint;
  version: number;        // Ruleset version the chunk was generated under
  fallbacks: number;      // Contradictions recovered during generation
  theme?: string;         // Region theme whose weight bias was applied
  generatedAt: number;
}

/**
 * Synchronous per-chunk cache consulted on first visit.
 * load() returns null on a miss.
 */
export interface ChunkStore {
  load(chunkX: number, chunkY: number): TerrainChunk | null;
  save(chunk: TerrainChunk): void;
}

/**
 * Bulk chunk persistence used at session start and end
 */
export interface ChunkArchive {
  loadChunks(): Promise<TerrainChunk[]>;
  saveChunks(chunks: TerrainChunk[]): Promise<void>;
}

/**
 * World configuration (singleton)
 */
export interface WorldConfig {
  seed: bigint;
  name: string;
  chunkSize: number;
}

/**
 * Tile modification layered over a generated chunk
 */
export interface ChunkDelta {
  x: number;
  y: number;
  terrain: TerrainKind;
}
