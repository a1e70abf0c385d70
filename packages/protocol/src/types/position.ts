/**
 * World coordinates (absolute position in the game world)
 * x grows east, y grows north
 */
export interface WorldCoord {
  x: number;
  y: number;
}

/**
 * Chunk coordinates
 */
export interface ChunkCoord {
  chunkX: number;
  chunkY: number;
}

/**
 * Cardinal directions
 */
export const DIRECTIONS = ['north', 'east', 'south', 'west'] as const;

export type Direction = (typeof DIRECTIONS)[number];

/**
 * Direction vectors for movement
 */
export const DIRECTION_VECTORS: Record<Direction, WorldCoord> = {
  north: { x: 0, y: 1 },
  east: { x: 1, y: 0 },
  south: { x: 0, y: -1 },
  west: { x: -1, y: 0 },
};

export const OPPOSITE_DIRECTIONS: Record<Direction, Direction> = {
  north: 'south',
  east: 'west',
  south: 'north',
  west: 'east',
};

export function isDirection(value: string): value is Direction {
  return (DIRECTIONS as readonly string[]).includes(value);
}

/**
 * Coordinate one step away in the given direction
 */
export function stepCoord(x: number, y: number, direction: Direction): WorldCoord {
  const vector = DIRECTION_VECTORS[direction];
  return { x: x + vector.x, y: y + vector.y };
}

/**
 * Map key for a coordinate pair
 */
export function coordKey(x: number, y: number): string {
  return `${x},${y}`;
}
