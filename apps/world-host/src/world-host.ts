import type { ChunkStore, LocationRecord } from '@wayfarer/protocol';
import {
  ChunkManager,
  TileCompatibilityModel,
  WorldGrid,
  WorldMap,
} from '@wayfarer/world';
import type { WorldPersistence } from './persistence.js';

export interface WorldHostConfig {
  worldName: string;
  worldSeed?: bigint;
  chunkSize: number;
  preloadRadius: number;
  regionTheme?: string;
  store?: ChunkStore;
  model?: TileCompatibilityModel;
}

/**
 * Random seed for a brand-new world
 */
export function randomWorldSeed(): bigint {
  return BigInt(Math.floor(Math.random() * Number.MAX_SAFE_INTEGER));
}

/**
 * Owns one world for the life of a session: restores it on start,
 * writes it back on stop
 */
export class WorldHost {
  private config: WorldHostConfig;
  private persistence: WorldPersistence;
  private map: WorldMap | null = null;

  constructor(config: WorldHostConfig, persistence: WorldPersistence) {
    this.config = config;
    this.persistence = persistence;
  }

  async start(): Promise<WorldMap> {
    if (this.map) return this.map;

    const model = this.config.model ?? TileCompatibilityModel.fromDefaultRuleset();
    const world = await this.persistence.resolveWorld({
      seed: this.config.worldSeed ?? randomWorldSeed(),
      name: this.config.worldName,
      chunkSize: this.config.chunkSize,
      rulesetVersion: model.version,
    });

    if (world.chunkSize !== this.config.chunkSize) {
      console.warn(
        `[Host] World '${world.name}' uses ${world.chunkSize}-tile chunks, ignoring configured ${this.config.chunkSize}`
      );
    }
    console.log(`[Host] Using world '${world.name}' with seed ${world.seed}`);

    const chunks = new ChunkManager({
      worldSeed: world.seed,
      chunkSize: world.chunkSize,
      store: this.config.store,
      model,
      regionTheme: this.config.regionTheme,
    });

    if (this.persistence.archive) {
      await chunks.hydrate(this.persistence.archive);
    }

    const records = await this.persistence.loadLocations();
    const grid = WorldGrid.fromSnapshot({ locations: records });
    const synced = chunks.syncWithLocations(grid.locations());
    console.log(`[Host] Restored ${grid.size} locations (${synced} terrain overrides)`);

    chunks.preloadAround(0, 0, this.config.preloadRadius);

    const unreachable = grid.findUnreachableExits().length;
    if (unreachable > 0) {
      console.log(`[World] ${unreachable} exits lead to unexplored coordinates`);
    }

    this.map = new WorldMap(chunks, grid);
    return this.map;
  }

  /**
   * Flush generated chunks and placed locations. The host can be started again afterwards.
   */
  async stop(): Promise<void> {
    const map = this.map;
    if (!map) return;
    this.map = null;

    if (this.persistence.archive) {
      await map.getChunks().flush(this.persistence.archive);
    }

    const records: LocationRecord[] = map.getGrid().toSnapshot().locations;
    await this.persistence.saveLocations(records);
    console.log(`[Host] Saved ${records.length} locations`);
  }

  getMap(): WorldMap | null {
    return this.map;
  }
}
