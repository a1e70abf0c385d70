import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  integer,
  bigint,
  jsonb,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import type { TerrainKind } from '@wayfarer/protocol';

/**
 * World configuration - singleton table
 */
export const world = pgTable('world', {
  id: integer('id').primaryKey().default(1),
  seed: bigint('seed', { mode: 'bigint' }).notNull(),
  name: varchar('name', { length: 128 }).notNull().default('Wayfarer'),
  chunkSizeTiles: integer('chunk_size_tiles').notNull().default(16), // Tiles per chunk side
  rulesetVersion: integer('ruleset_version').notNull().default(1),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Terrain chunks - resolved WFC output, one row per chunk coordinate.
 * Only an acceleration: every chunk can be rebuilt from the world seed.
 */
export const terrainChunks = pgTable('terrain_chunks', {
  id: uuid('id').primaryKey().defaultRandom(),
  chunkX: integer('chunk_x').notNull(),
  chunkY: integer('chunk_y').notNull(),
  size: integer('size').notNull(),
  // 2D array of terrain kinds [y][x]
  tiles: jsonb('tiles').$type<TerrainKind[][]>().notNull(),
  // Unsigned 64-bit chunk seed, kept as decimal text
  seed: varchar('seed', { length: 20 }).notNull(),
  version: integer('version').notNull(),
  fallbacks: integer('fallbacks').notNull().default(0),
  theme: varchar('theme', { length: 64 }), // Region theme bias, null when unbiased
  generatedAt: timestamp('generated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  chunkIdx: uniqueIndex('idx_terrain_chunks_coords').on(table.chunkX, table.chunkY),
}));
