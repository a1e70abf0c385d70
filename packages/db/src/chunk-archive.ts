import { sql } from 'drizzle-orm';
import { z } from 'zod';
import type { ChunkArchive, TerrainChunk } from '@wayfarer/protocol';
import { TERRAIN_KINDS } from '@wayfarer/protocol';
import type { Database } from './client.js';
import { terrainChunks } from './schema/world.js';
import type { NewTerrainChunkRow, TerrainChunkRow } from './schema/types.js';

const TilesSchema = z.array(z.array(z.enum(TERRAIN_KINDS)));

// Rows per INSERT statement
const SAVE_BATCH_SIZE = 200;

/**
 * Map a chunk to its table row. The seed is kept as decimal text since it
 * can exceed the signed 64-bit range.
 */
export function chunkToRow(chunk: TerrainChunk): NewTerrainChunkRow {
  return {
    chunkX: chunk.chunkX,
    chunkY: chunk.chunkY,
    size: chunk.size,
    tiles: chunk.tiles,
    seed: chunk.seed.toString(),
    version: chunk.version,
    fallbacks: chunk.fallbacks,
    theme: chunk.theme ?? null,
    generatedAt: new Date(chunk.generatedAt),
  };
}

/**
 * Map a stored row back to a chunk. Returns null for rows whose tiles or
 * seed no longer parse.
 */
export function rowToChunk(row: TerrainChunkRow): TerrainChunk | null {
  const tiles = TilesSchema.safeParse(row.tiles);
  if (!tiles.success) {
    console.warn(`[DB] Skipping chunk (${row.chunkX}, ${row.chunkY}): invalid tiles`);
    return null;
  }

  if (!/^\d+$/.test(row.seed)) {
    console.warn(`[DB] Skipping chunk (${row.chunkX}, ${row.chunkY}): invalid seed '${row.seed}'`);
    return null;
  }

  const chunk: TerrainChunk = {
    chunkX: row.chunkX,
    chunkY: row.chunkY,
    size: row.size,
    tiles: tiles.data,
    seed: BigInt(row.seed),
    version: row.version,
    fallbacks: row.fallbacks,
    generatedAt: row.generatedAt.getTime(),
  };
  if (row.theme !== null) chunk.theme = row.theme;
  return chunk;
}

/**
 * Chunk archive in the terrain_chunks table
 */
export class DbChunkArchive implements ChunkArchive {
  constructor(private db: Database) {}

  async loadChunks(): Promise<TerrainChunk[]> {
    const rows = await this.db.select().from(terrainChunks);

    const chunks: TerrainChunk[] = [];
    for (const row of rows) {
      const chunk = rowToChunk(row);
      if (chunk) chunks.push(chunk);
    }
    return chunks;
  }

  async saveChunks(chunks: TerrainChunk[]): Promise<void> {
    for (let i = 0; i < chunks.length; i += SAVE_BATCH_SIZE) {
      const rows = chunks.slice(i, i + SAVE_BATCH_SIZE).map(chunkToRow);

      await this.db
        .insert(terrainChunks)
        .values(rows)
        .onConflictDoUpdate({
          target: [terrainChunks.chunkX, terrainChunks.chunkY],
          set: {
            size: sql`excluded.size`,
            tiles: sql`excluded.tiles`,
            seed: sql`excluded.seed`,
            version: sql`excluded.version`,
            fallbacks: sql`excluded.fallbacks`,
            theme: sql`excluded.theme`,
            generatedAt: sql`excluded.generated_at`,
          },
        });
    }
  }
}
