import { eq, sql } from 'drizzle-orm';
import type { LocationRecord, WorldConfig } from '@wayfarer/protocol';
import { isTerrainKind } from '@wayfarer/protocol';
import type { Database } from './client.js';
import { world } from './schema/world.js';
import { locations } from './schema/locations.js';
import type { LocationRow, NewLocationRow } from './schema/types.js';

export interface WorldDefaults {
  seed: bigint;
  name: string;
  chunkSize: number;
  rulesetVersion: number;
}

export function rowToLocation(row: LocationRow): LocationRecord {
  const record: LocationRecord = {
    name: row.name,
    category: row.category,
    x: row.x,
    y: row.y,
    connections: row.connections,
    flags: row.flags,
  };

  if (row.description !== null) record.description = row.description;
  if (row.terrain !== null) {
    if (isTerrainKind(row.terrain)) {
      record.terrain = row.terrain;
    } else {
      console.warn(`[DB] Location '${row.name}' has unknown terrain '${row.terrain}', ignoring`);
    }
  }

  return record;
}

export function locationToRow(record: LocationRecord): NewLocationRow {
  return {
    name: record.name,
    category: record.category,
    description: record.description ?? null,
    terrain: record.terrain ?? null,
    x: record.x,
    y: record.y,
    connections: record.connections,
    flags: record.flags,
  };
}

/**
 * World row and placed locations
 */
export class WorldRepository {
  constructor(private db: Database) {}

  /**
   * Existing world config, or a new world row built from the defaults
   */
  async getOrCreateWorld(defaults: WorldDefaults): Promise<WorldConfig> {
    const existing = await this.db.query.world.findFirst();

    if (existing) {
      if (existing.rulesetVersion !== defaults.rulesetVersion) {
        console.warn(
          `[DB] World was generated under ruleset v${existing.rulesetVersion}, now v${defaults.rulesetVersion}`
        );
        await this.db
          .update(world)
          .set({ rulesetVersion: defaults.rulesetVersion, updatedAt: new Date() })
          .where(eq(world.id, existing.id));
      }
      return { seed: existing.seed, name: existing.name, chunkSize: existing.chunkSizeTiles };
    }

    await this.db.insert(world).values({
      seed: defaults.seed,
      name: defaults.name,
      chunkSizeTiles: defaults.chunkSize,
      rulesetVersion: defaults.rulesetVersion,
    });
    console.log(`[DB] Created world '${defaults.name}' with seed ${defaults.seed}`);

    return { seed: defaults.seed, name: defaults.name, chunkSize: defaults.chunkSize };
  }

  async loadLocations(): Promise<LocationRecord[]> {
    const rows = await this.db.select().from(locations).orderBy(locations.createdAt);
    return rows.map(rowToLocation);
  }

  /**
   * Upsert every location. Connections change as neighbours are placed,
   * so existing rows take the new links.
   */
  async saveLocations(records: LocationRecord[]): Promise<void> {
    if (records.length === 0) return;

    await this.db
      .insert(locations)
      .values(records.map(locationToRow))
      .onConflictDoUpdate({
        target: locations.name,
        set: {
          category: sql`excluded.category`,
          description: sql`excluded.description`,
          terrain: sql`excluded.terrain`,
          connections: sql`excluded.connections`,
          flags: sql`excluded.flags`,
          updatedAt: new Date(),
        },
      });
  }
}
