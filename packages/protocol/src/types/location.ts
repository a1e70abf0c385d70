import type { Direction, WorldCoord } from './position.js';
import type { TerrainKind } from './world.js';

/**
 * Connection target per direction.
 * A name binds the exit to that location; null is an open exit whose
 * occupant has not been decided yet.
 */
export type LocationConnections = Partial<Record<Direction, string | null>>;

export interface LocationFlags {
  named?: boolean;
  safeZone?: boolean;
}

/**
 * Location as produced by a content generator, before placement
 */
export interface LocationDraft {
  name: string;
  category: string;
  description?: string;
  terrain?: TerrainKind;
  connections?: LocationConnections;
  flags?: LocationFlags;
}

/**
 * Location indexed by the world grid. Connections are only
 * mutated by grid insertion.
 */
export interface PlacedLocation {
  readonly name: string;
  readonly category: string;
  readonly description?: string;
  readonly terrain?: TerrainKind;
  readonly coordinates: Readonly<WorldCoord>;
  readonly connections: Readonly<LocationConnections>;
  readonly flags: Readonly<LocationFlags>;
}

export type PlacementConflictReason =
  | 'invalid_location'
  | 'coordinate_occupied'
  | 'duplicate_name'
  | 'connection_mismatch'
  | 'asymmetric_connection'
  | 'reserved_coordinate';

export interface PlacementConflict {
  reason: PlacementConflictReason;
  message: string;
  x: number;
  y: number;
  direction?: Direction;
  existing?: string;
}

export type PlacementResult =
  | { success: true; location: PlacedLocation; created: boolean }
  | { success: false; conflict: PlacementConflict };

/**
 * Exit whose target coordinate holds no location
 */
export interface UnreachableExit {
  location: PlacedLocation;
  direction: Direction;
  target: WorldCoord;
}

/**
 * Placed location flattened for storage
 */
export interface LocationRecord {
  name: string;
  category: string;
  description?: string;
  terrain?: TerrainKind;
  x: number;
  y: number;
  connections: LocationConnections;
  flags: LocationFlags;
}
