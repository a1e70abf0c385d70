import {
  pgTable,
  varchar,
  text,
  timestamp,
  integer,
  jsonb,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import type { LocationConnections, LocationFlags } from '@wayfarer/protocol';

/**
 * Placed locations - one per coordinate, keyed by name
 */
export const locations = pgTable('locations', {
  name: varchar('name', { length: 50 }).primaryKey(),
  category: varchar('category', { length: 64 }).notNull(),
  description: text('description'),
  terrain: varchar('terrain', { length: 32 }),

  // Grid position
  x: integer('x').notNull(),
  y: integer('y').notNull(),

  // Direction -> target name (null = open exit)
  connections: jsonb('connections').$type<LocationConnections>().notNull().default({}),
  flags: jsonb('flags').$type<LocationFlags>().notNull().default({}),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  // Unique constraint on position - only one location per coordinate
  positionIdx: uniqueIndex('idx_locations_position').on(table.x, table.y),
}));
