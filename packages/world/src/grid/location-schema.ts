import { z } from 'zod';
import {
  LOCATION_DESCRIPTION_MAX_LENGTH,
  LOCATION_NAME_MAX_LENGTH,
  LOCATION_NAME_MIN_LENGTH,
} from '@wayfarer/protocol';
import { TerrainKindSchema } from '../tiles/ruleset.js';

const LocationNameSchema = z
  .string()
  .trim()
  .min(LOCATION_NAME_MIN_LENGTH)
  .max(LOCATION_NAME_MAX_LENGTH);

/**
 * Target per direction: a location name, or null for an open exit
 */
export const LocationConnectionsSchema = z
  .object({
    north: LocationNameSchema.nullable(),
    east: LocationNameSchema.nullable(),
    south: LocationNameSchema.nullable(),
    west: LocationNameSchema.nullable(),
  })
  .partial()
  .strict();

export const LocationFlagsSchema = z.object({
  named: z.boolean().optional(),
  safeZone: z.boolean().optional(),
});

/**
 * Location handed to the grid by a content generator
 */
export const LocationDraftSchema = z.object({
  name: LocationNameSchema,
  category: z.string().trim().min(1),
  description: z.string().trim().min(1).max(LOCATION_DESCRIPTION_MAX_LENGTH).optional(),
  terrain: TerrainKindSchema.optional(),
  connections: LocationConnectionsSchema.default({}),
  flags: LocationFlagsSchema.default({}),
});

/**
 * Serialized grid: placed locations with their coordinates and links
 */
export const WorldGridSnapshotSchema = z.object({
  locations: z.array(
    LocationDraftSchema.extend({
      x: z.number().int(),
      y: z.number().int(),
    })
  ),
});

export type WorldGridSnapshot = z.infer<typeof WorldGridSnapshotSchema>;
