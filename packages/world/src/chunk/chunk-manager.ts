import type {
  ChunkArchive,
  ChunkCoord,
  ChunkDelta,
  ChunkStore,
  PlacedLocation,
  TerrainChunk,
  TerrainKind,
} from '@wayfarer/protocol';
import { DEFAULT_PRELOAD_RADIUS, coordKey } from '@wayfarer/protocol';
import { ChunkGenerator, getChunkSeed, type ChunkGeneratorConfig } from './chunk-generator.js';
import type { BorderConstraints } from '../wfc/solver.js';

export interface ChunkManagerConfig extends ChunkGeneratorConfig {
  worldSeed: bigint;
  store?: ChunkStore;
  regionTheme?: string;
}

export interface ChunkManagerStats {
  chunks: number;
  generated: number;
  storeLoads: number;
  storeErrors: number;
  fallbacks: number;
  overrides: number;
  pendingFlush: number;
}

/**
 * Lazily generated, stitched terrain.
 *
 * Chunks live in memory for the life of the manager and are never
 * regenerated; a chunk only reads the edges of neighbours that already
 * exist, so generation order does not matter.
 */
export class ChunkManager {
  private chunks: Map<string, TerrainChunk> = new Map();
  private generating: Set<string> = new Set();
  private unflushed: Set<string> = new Set();
  private overrides: Map<string, ChunkDelta> = new Map();
  private generator: ChunkGenerator;
  private store: ChunkStore | null;
  private chunkSize: number;
  private regionTheme: string | null;

  private generatedCount = 0;
  private storeLoads = 0;
  private storeErrors = 0;
  private fallbackCount = 0;

  constructor(config: ChunkManagerConfig) {
    this.generator = new ChunkGenerator(config.worldSeed, config);
    this.store = config.store ?? null;
    this.chunkSize = this.generator.getChunkSize();
    this.regionTheme = null;
    if (config.regionTheme !== undefined) this.setRegionTheme(config.regionTheme);
  }

  private getKey(chunkX: number, chunkY: number): string {
    return `${chunkX},${chunkY}`;
  }

  /**
   * Chunk coordinate and local offset for a world coordinate
   */
  locate(worldX: number, worldY: number): ChunkCoord & { localX: number; localY: number } {
    const size = this.chunkSize;
    return {
      chunkX: Math.floor(worldX / size),
      chunkY: Math.floor(worldY / size),
      localX: ((worldX % size) + size) % size,
      localY: ((worldY % size) + size) % size,
    };
  }

  /**
   * Get tile at world coordinates, generating its chunk on first touch
   */
  getTileAt(worldX: number, worldY: number): TerrainKind {
    const override = this.overrides.get(coordKey(worldX, worldY));
    if (override) return override.terrain;

    const { chunkX, chunkY, localX, localY } = this.locate(worldX, worldY);
    return this.readTile(this.getChunk(chunkX, chunkY), localX, localY);
  }

  /**
   * Tile at world coordinates if its chunk exists, without generating.
   * null means the coordinate is unexplored.
   */
  peekTileAt(worldX: number, worldY: number): TerrainKind | null {
    const { chunkX, chunkY, localX, localY } = this.locate(worldX, worldY);
    const chunk = this.findChunk(chunkX, chunkY);
    if (!chunk) return null;

    const override = this.overrides.get(coordKey(worldX, worldY));
    return override ? override.terrain : this.readTile(chunk, localX, localY);
  }

  /**
   * Get chunk, generating if neither memory nor the store has it
   */
  getChunk(chunkX: number, chunkY: number): TerrainChunk {
    const existing = this.findChunk(chunkX, chunkY);
    if (existing) return existing;

    const key = this.getKey(chunkX, chunkY);
    if (this.generating.has(key)) {
      throw new Error(`[Chunks] Re-entrant generation of chunk (${chunkX}, ${chunkY})`);
    }

    const chunk = this.generateOnce(key, chunkX, chunkY);
    this.chunks.set(key, chunk);
    this.unflushed.add(key);
    this.generatedCount++;
    this.fallbackCount += chunk.fallbacks;

    if (chunk.fallbacks > 0) {
      console.warn(`[Chunks] Chunk (${chunkX}, ${chunkY}) resolved with ${chunk.fallbacks} fallback tile(s)`);
    }

    this.saveToStore(chunk);
    return chunk;
  }

  /**
   * Chunk from memory or the store, without generating
   */
  peekChunk(chunkX: number, chunkY: number): TerrainChunk | null {
    return this.findChunk(chunkX, chunkY);
  }

  hasChunk(chunkX: number, chunkY: number): boolean {
    return this.chunks.has(this.getKey(chunkX, chunkY));
  }

  /**
   * Get chunks needed to fill a viewport
   */
  getChunksForViewport(
    viewportX: number,
    viewportY: number,
    viewportWidth: number,
    viewportHeight: number
  ): TerrainChunk[] {
    const chunks: TerrainChunk[] = [];

    const minChunkX = Math.floor(viewportX / this.chunkSize);
    const maxChunkX = Math.floor((viewportX + viewportWidth - 1) / this.chunkSize);
    const minChunkY = Math.floor(viewportY / this.chunkSize);
    const maxChunkY = Math.floor((viewportY + viewportHeight - 1) / this.chunkSize);

    for (let cy = minChunkY; cy <= maxChunkY; cy++) {
      for (let cx = minChunkX; cx <= maxChunkX; cx++) {
        chunks.push(this.getChunk(cx, cy));
      }
    }

    return chunks;
  }

  /**
   * Preload chunks around a position
   */
  preloadAround(centerX: number, centerY: number, radius: number = DEFAULT_PRELOAD_RADIUS): void {
    const { chunkX: centerChunkX, chunkY: centerChunkY } = this.locate(centerX, centerY);

    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        this.getChunk(centerChunkX + dx, centerChunkY + dy);
      }
    }
  }

  /**
   * Bias chunks generated from now on toward a region theme; null clears it.
   * Chunks that already exist keep their tiles.
   */
  setRegionTheme(theme: string | null): void {
    if (theme !== null && !this.generator.getModel().hasTheme(theme)) {
      console.warn(`[Chunks] Unknown region theme '${theme}', using base weights`);
    }
    this.regionTheme = theme;
  }

  getRegionTheme(): string | null {
    return this.regionTheme;
  }

  /**
   * Layer a terrain value over the generated chunk at a world coordinate
   */
  setTileOverride(worldX: number, worldY: number, terrain: TerrainKind): void {
    if (!this.generator.getModel().hasKind(terrain)) {
      throw new Error(`Unknown terrain kind '${terrain}'`);
    }
    this.overrides.set(coordKey(worldX, worldY), { x: worldX, y: worldY, terrain });
  }

  clearTileOverride(worldX: number, worldY: number): boolean {
    return this.overrides.delete(coordKey(worldX, worldY));
  }

  getOverrides(): ChunkDelta[] {
    return Array.from(this.overrides.values());
  }

  /**
   * Make terrain under placed locations match them. Locations without a
   * terrain of their own take defaultKind when given and are skipped otherwise.
   */
  syncWithLocations(locations: Iterable<PlacedLocation>, defaultKind?: TerrainKind): number {
    let synced = 0;

    for (const location of locations) {
      const terrain = location.terrain ?? defaultKind;
      if (terrain === undefined) continue;

      const { x, y } = location.coordinates;
      this.setTileOverride(x, y, terrain);
      synced++;
    }

    return synced;
  }

  /**
   * Load archived chunks into memory. Chunks from another world seed,
   * ruleset version or chunk size are skipped and regenerated on demand.
   */
  async hydrate(archive: ChunkArchive): Promise<number> {
    let archived: TerrainChunk[];
    try {
      archived = await archive.loadChunks();
    } catch (error) {
      console.error('[Chunks] Failed to load chunk archive:', error);
      return 0;
    }

    let loaded = 0;
    for (const chunk of archived) {
      const key = this.getKey(chunk.chunkX, chunk.chunkY);
      if (this.chunks.has(key) || !this.isUsable(chunk)) continue;
      this.chunks.set(key, chunk);
      loaded++;
    }

    console.log(`[Chunks] Hydrated ${loaded} of ${archived.length} archived chunks`);
    return loaded;
  }

  /**
   * Write chunks generated since the last flush. Returns how many were written;
   * a failed write leaves them pending for the next flush.
   */
  async flush(archive: ChunkArchive): Promise<number> {
    const keys = Array.from(this.unflushed);
    const pending: TerrainChunk[] = [];
    for (const key of keys) {
      const chunk = this.chunks.get(key);
      if (chunk) pending.push(chunk);
    }

    if (pending.length === 0) return 0;

    try {
      await archive.saveChunks(pending);
    } catch (error) {
      console.error(`[Chunks] Failed to flush ${pending.length} chunks:`, error);
      return 0;
    }

    for (const key of keys) {
      this.unflushed.delete(key);
    }

    console.log(`[Chunks] Flushed ${pending.length} chunks`);
    return pending.length;
  }

  /**
   * Get cache stats
   */
  getStats(): ChunkManagerStats {
    return {
      chunks: this.chunks.size,
      generated: this.generatedCount,
      storeLoads: this.storeLoads,
      storeErrors: this.storeErrors,
      fallbacks: this.fallbackCount,
      overrides: this.overrides.size,
      pendingFlush: this.unflushed.size,
    };
  }

  /**
   * Drop every in-memory chunk and override. The store is left untouched.
   */
  clear(): void {
    this.chunks.clear();
    this.unflushed.clear();
    this.overrides.clear();
  }

  /**
   * Get the underlying generator
   */
  getGenerator(): ChunkGenerator {
    return this.generator;
  }

  private generateOnce(key: string, chunkX: number, chunkY: number): TerrainChunk {
    this.generating.add(key);
    try {
      return this.generator.generateChunk(
        chunkX,
        chunkY,
        this.collectBorders(chunkX, chunkY),
        this.regionTheme ?? undefined
      );
    } finally {
      this.generating.delete(key);
    }
  }

  private findChunk(chunkX: number, chunkY: number): TerrainChunk | null {
    const key = this.getKey(chunkX, chunkY);
    const cached = this.chunks.get(key);
    if (cached) return cached;

    const stored = this.loadFromStore(chunkX, chunkY);
    if (stored) {
      this.chunks.set(key, stored);
    }
    return stored;
  }

  private loadFromStore(chunkX: number, chunkY: number): TerrainChunk | null {
    if (!this.store) return null;

    let stored: TerrainChunk | null;
    try {
      stored = this.store.load(chunkX, chunkY);
    } catch (error) {
      this.storeErrors++;
      console.warn(`[Chunks] Store read failed for chunk (${chunkX}, ${chunkY}), regenerating:`, error);
      return null;
    }

    if (!stored) return null;
    if (stored.chunkX !== chunkX || stored.chunkY !== chunkY || !this.isUsable(stored)) {
      console.warn(`[Chunks] Ignoring stale stored chunk (${chunkX}, ${chunkY})`);
      return null;
    }

    this.storeLoads++;
    return stored;
  }

  private saveToStore(chunk: TerrainChunk): void {
    if (!this.store) return;

    try {
      this.store.save(chunk);
    } catch (error) {
      this.storeErrors++;
      console.error(`[Chunks] Store write failed for chunk (${chunk.chunkX}, ${chunk.chunkY}):`, error);
    }
  }

  private isUsable(chunk: TerrainChunk): boolean {
    return (
      chunk.seed === getChunkSeed(this.generator.getSeed(), chunk.chunkX, chunk.chunkY) &&
      chunk.size === this.chunkSize &&
      chunk.version === this.generator.getModel().version &&
      chunk.tiles.length === this.chunkSize &&
      chunk.tiles.every((row) => row.length === this.chunkSize)
    );
  }

  /**
   * Edge tiles of already-generated neighbours facing this chunk
   */
  private collectBorders(chunkX: number, chunkY: number): BorderConstraints {
    const last = this.chunkSize - 1;
    const borders: BorderConstraints = {};

    const west = this.findChunk(chunkX - 1, chunkY);
    if (west) borders.west = this.column(west, last);

    const east = this.findChunk(chunkX + 1, chunkY);
    if (east) borders.east = this.column(east, 0);

    const south = this.findChunk(chunkX, chunkY - 1);
    if (south) borders.south = this.row(south, last);

    const north = this.findChunk(chunkX, chunkY + 1);
    if (north) borders.north = this.row(north, 0);

    return borders;
  }

  private column(chunk: TerrainChunk, localX: number): TerrainKind[] {
    const column: TerrainKind[] = [];
    for (let localY = 0; localY < this.chunkSize; localY++) {
      column.push(this.readTile(chunk, localX, localY));
    }
    return column;
  }

  private row(chunk: TerrainChunk, localY: number): TerrainKind[] {
    const row: TerrainKind[] = [];
    for (let localX = 0; localX < this.chunkSize; localX++) {
      row.push(this.readTile(chunk, localX, localY));
    }
    return row;
  }

  private readTile(chunk: TerrainChunk, localX: number, localY: number): TerrainKind {
    const tile = chunk.tiles[localY]?.[localX];
    if (tile === undefined) {
      throw new Error(`Tile (${localX}, ${localY}) outside chunk (${chunk.chunkX}, ${chunk.chunkY})`);
    }
    return tile;
  }
}
