import type { ChunkArchive, LocationRecord, WorldConfig } from '@wayfarer/protocol';
import {
  createDatabase,
  DbChunkArchive,
  WorldRepository,
  type WorldDefaults,
} from '@wayfarer/db';

/**
 * Everything the host keeps across restarts: the world seed, the placed
 * locations and optionally an archive of generated chunks
 */
export interface WorldPersistence {
  readonly archive: ChunkArchive | null;
  resolveWorld(defaults: WorldDefaults): Promise<WorldConfig>;
  loadLocations(): Promise<LocationRecord[]>;
  saveLocations(records: LocationRecord[]): Promise<void>;
  close(): Promise<void>;
}

/**
 * Postgres-backed persistence
 */
export class DatabasePersistence implements WorldPersistence {
  readonly archive: ChunkArchive;
  private repository: WorldRepository;
  private closeDatabase: () => Promise<void>;

  constructor(connectionString: string) {
    const { db, pool } = createDatabase(connectionString);
    this.archive = new DbChunkArchive(db);
    this.repository = new WorldRepository(db);
    this.closeDatabase = () => pool.end();
  }

  resolveWorld(defaults: WorldDefaults): Promise<WorldConfig> {
    return this.repository.getOrCreateWorld(defaults);
  }

  loadLocations(): Promise<LocationRecord[]> {
    return this.repository.loadLocations();
  }

  saveLocations(records: LocationRecord[]): Promise<void> {
    return this.repository.saveLocations(records);
  }

  close(): Promise<void> {
    return this.closeDatabase();
  }
}

/**
 * Process-lifetime persistence, used when no database is configured.
 * The world and its locations last until the process exits.
 */
export class InMemoryPersistence implements WorldPersistence {
  readonly archive: ChunkArchive | null = null;
  private world: WorldConfig | null = null;
  private records: LocationRecord[] = [];

  async resolveWorld(defaults: WorldDefaults): Promise<WorldConfig> {
    if (!this.world) {
      this.world = { seed: defaults.seed, name: defaults.name, chunkSize: defaults.chunkSize };
    }
    return this.world;
  }

  async loadLocations(): Promise<LocationRecord[]> {
    return this.records.map((record) => ({ ...record }));
  }

  async saveLocations(records: LocationRecord[]): Promise<void> {
    this.records = records.map((record) => ({ ...record }));
  }

  async close(): Promise<void> {}
}
