import type {
  Direction,
  LocationConnections,
  LocationDraft,
  LocationFlags,
  PlacedLocation,
  PlacementConflict,
  PlacementConflictReason,
  PlacementResult,
  TerrainKind,
  UnreachableExit,
  WorldCoord,
} from '@wayfarer/protocol';
import { DIRECTIONS, OPPOSITE_DIRECTIONS, coordKey, isDirection, stepCoord } from '@wayfarer/protocol';
import {
  LocationDraftSchema,
  WorldGridSnapshotSchema,
  type WorldGridSnapshot,
} from './location-schema.js';

/**
 * Grid-owned location record. Callers only ever see it as PlacedLocation.
 */
interface GridLocation {
  name: string;
  category: string;
  description?: string;
  terrain?: TerrainKind;
  coordinates: WorldCoord;
  connections: LocationConnections;
  flags: LocationFlags;
}

interface LinkUpdate {
  location: GridLocation;
  direction: Direction;
  target: string;
}

/**
 * A name promised to an empty coordinate by a neighbour's exit
 */
interface Reservation {
  x: number;
  y: number;
  by: string;
  direction: Direction;
}

type PlacementPlan =
  | { kind: 'conflict'; conflict: PlacementConflict }
  | { kind: 'existing'; location: GridLocation }
  | { kind: 'insert'; location: GridLocation; links: LinkUpdate[] };

export interface AsymmetricConnection {
  location: PlacedLocation;
  direction: Direction;
}

function conflict(
  reason: PlacementConflictReason,
  message: string,
  x: number,
  y: number,
  extra: { direction?: Direction; existing?: string } = {}
): PlacementPlan {
  return { kind: 'conflict', conflict: { reason, message, x, y, ...extra } };
}

/**
 * Sparse coordinate-indexed world graph.
 *
 * Two indexes (coordinate and name) are kept in step. Connection symmetry
 * is enforced when a location is inserted: links towards an occupied
 * neighbour get their reverse installed, and anything that would overwrite
 * an existing different link is rejected before the grid changes.
 * Exits naming an empty coordinate reserve that name for it until filled.
 */
export class WorldGrid {
  private byCoord: Map<string, GridLocation> = new Map();
  private byName: Map<string, GridLocation> = new Map();
  // name -> `${by}:${direction}` -> reservation
  private reservations: Map<string, Map<string, Reservation>> = new Map();

  /**
   * Place a location. Returns a structured conflict instead of overwriting.
   * Placing the same name at the same coordinate again is a no-op.
   */
  addLocation(draft: LocationDraft, x: number, y: number): PlacementResult {
    const plan = this.plan(draft, x, y);
    if (plan.kind === 'conflict') {
      return { success: false, conflict: plan.conflict };
    }
    if (plan.kind === 'existing') {
      return { success: true, location: plan.location, created: false };
    }

    const { location, links } = plan;
    this.byCoord.set(coordKey(x, y), location);
    this.byName.set(location.name, location);

    for (const link of links) {
      link.location.connections[link.direction] = link.target;
      this.release(location.name, link.location.name, link.direction);
    }
    this.reserveExits(location);

    return { success: true, location, created: true };
  }

  /**
   * Dry run of addLocation. The grid is not modified.
   */
  canPlace(draft: LocationDraft, x: number, y: number): PlacementResult {
    const plan = this.plan(draft, x, y);

    switch (plan.kind) {
      case 'conflict':
        return { success: false, conflict: plan.conflict };
      case 'existing':
        return { success: true, location: plan.location, created: false };
      case 'insert':
        return { success: true, location: plan.location, created: true };
    }
  }

  private plan(draft: LocationDraft, x: number, y: number): PlacementPlan {
    if (!Number.isInteger(x) || !Number.isInteger(y)) {
      return conflict('invalid_location', `Coordinates (${x}, ${y}) must be integers`, x, y);
    }

    const parsed = LocationDraftSchema.safeParse(draft);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'location'}: ${issue.message}`)
        .join('; ');
      return conflict('invalid_location', `Invalid location: ${detail}`, x, y);
    }

    const data = parsed.data;
    const occupant = this.byCoord.get(coordKey(x, y));
    if (occupant) {
      if (occupant.name === data.name) {
        return { kind: 'existing', location: occupant };
      }
      return conflict(
        'coordinate_occupied',
        `Coordinates (${x}, ${y}) already occupied by '${occupant.name}'`,
        x,
        y,
        { existing: occupant.name }
      );
    }

    const sameName = this.byName.get(data.name);
    if (sameName) {
      const at = sameName.coordinates;
      return conflict(
        'duplicate_name',
        `Location '${data.name}' already exists at (${at.x}, ${at.y})`,
        x,
        y,
        { existing: data.name }
      );
    }

    const promised = Array.from(this.reservations.get(data.name)?.values() ?? []);
    const [elsewhere] = promised;
    if (elsewhere && !promised.some((reservation) => reservation.x === x && reservation.y === y)) {
      return conflict(
        'reserved_coordinate',
        `'${elsewhere.by}' expects '${data.name}' at (${elsewhere.x}, ${elsewhere.y})`,
        x,
        y,
        { direction: elsewhere.direction, existing: elsewhere.by }
      );
    }

    const location: GridLocation = {
      name: data.name,
      category: data.category,
      description: data.description,
      terrain: data.terrain,
      coordinates: { x, y },
      connections: { ...data.connections },
      flags: { ...data.flags },
    };

    const links: LinkUpdate[] = [];

    for (const direction of DIRECTIONS) {
      const target = stepCoord(x, y, direction);
      const neighbor = this.byCoord.get(coordKey(target.x, target.y));
      if (!neighbor) continue;

      const opposite = OPPOSITE_DIRECTIONS[direction];
      const declared = location.connections[direction];
      const back = neighbor.connections[opposite];

      if (declared !== undefined) {
        if (declared !== null && declared !== neighbor.name) {
          return conflict(
            'connection_mismatch',
            `'${data.name}' connects ${direction} to '${declared}' but '${neighbor.name}' is there`,
            x,
            y,
            { direction, existing: neighbor.name }
          );
        }
        if (back !== undefined && back !== null && back !== data.name) {
          return conflict(
            'asymmetric_connection',
            `'${neighbor.name}' already connects ${opposite} to '${back}'`,
            x,
            y,
            { direction, existing: back }
          );
        }
      } else if (back !== undefined) {
        if (back !== null && back !== data.name) {
          return conflict(
            'reserved_coordinate',
            `'${neighbor.name}' expects '${back}' at (${x}, ${y})`,
            x,
            y,
            { direction, existing: back }
          );
        }
      } else {
        continue;
      }

      // Bind both ends; an open exit on either side takes the other's name
      location.connections[direction] = neighbor.name;
      links.push({ location: neighbor, direction: opposite, target: data.name });
    }

    return { kind: 'insert', location, links };
  }

  /**
   * Record the exits of a placed location that name an empty coordinate
   */
  private reserveExits(location: GridLocation): void {
    const { x, y } = location.coordinates;
    for (const direction of DIRECTIONS) {
      const name = location.connections[direction];
      if (typeof name !== 'string') continue;

      const target = stepCoord(x, y, direction);
      if (this.byCoord.has(coordKey(target.x, target.y))) continue;

      let byExit = this.reservations.get(name);
      if (!byExit) {
        byExit = new Map();
        this.reservations.set(name, byExit);
      }
      byExit.set(`${location.name}:${direction}`, { ...target, by: location.name, direction });
    }
  }

  private release(name: string, by: string, direction: Direction): void {
    const byExit = this.reservations.get(name);
    if (!byExit) return;

    byExit.delete(`${by}:${direction}`);
    if (byExit.size === 0) this.reservations.delete(name);
  }

  /**
   * Get location at specific coordinates
   */
  getByCoordinates(x: number, y: number): PlacedLocation | null {
    return this.byCoord.get(coordKey(x, y)) ?? null;
  }

  /**
   * Get location by name
   */
  getByName(name: string): PlacedLocation | null {
    return this.byName.get(name) ?? null;
  }

  /**
   * Get the location one step away in a direction
   */
  getNeighbor(x: number, y: number, direction: string): PlacedLocation | null {
    if (!isDirection(direction)) return null;

    const target = stepCoord(x, y, direction);
    return this.getByCoordinates(target.x, target.y);
  }

  /**
   * Every exit whose target coordinate holds no location,
   * in insertion order then north, east, south, west
   */
  findUnreachableExits(): UnreachableExit[] {
    const exits: UnreachableExit[] = [];

    for (const location of this.byName.values()) {
      const { x, y } = location.coordinates;
      for (const direction of DIRECTIONS) {
        if (location.connections[direction] === undefined) continue;

        const target = stepCoord(x, y, direction);
        if (!this.byCoord.has(coordKey(target.x, target.y))) {
          exits.push({ location, direction, target });
        }
      }
    }

    return exits;
  }

  /**
   * True when no exit leads to an empty coordinate
   */
  validateBorderClosure(): boolean {
    return this.findUnreachableExits().length === 0;
  }

  /**
   * Locations with at least one unreachable exit
   */
  getFrontierLocations(): PlacedLocation[] {
    const frontier = new Set<PlacedLocation>();
    for (const exit of this.findUnreachableExits()) {
      frontier.add(exit.location);
    }
    return Array.from(frontier);
  }

  /**
   * Links that point at an occupied coordinate without a matching link back
   */
  findAsymmetricConnections(): AsymmetricConnection[] {
    const broken: AsymmetricConnection[] = [];

    for (const location of this.byName.values()) {
      const { x, y } = location.coordinates;
      for (const direction of DIRECTIONS) {
        const declared = location.connections[direction];
        if (declared === undefined) continue;

        const target = stepCoord(x, y, direction);
        const neighbor = this.byCoord.get(coordKey(target.x, target.y));
        if (!neighbor) continue;

        const back = neighbor.connections[OPPOSITE_DIRECTIONS[direction]];
        if (declared !== neighbor.name || back !== location.name) {
          broken.push({ location, direction });
        }
      }
    }

    return broken;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get size(): number {
    return this.byName.size;
  }

  locations(): IterableIterator<PlacedLocation> {
    return this.byName.values();
  }

  toSnapshot(): WorldGridSnapshot {
    return {
      locations: Array.from(this.byName.values(), (location) => ({
        name: location.name,
        category: location.category,
        description: location.description,
        terrain: location.terrain,
        connections: { ...location.connections },
        flags: { ...location.flags },
        x: location.coordinates.x,
        y: location.coordinates.y,
      })),
    };
  }

  /**
   * Rebuild a grid from a snapshot, keeping stored connections as they are
   */
  static fromSnapshot(input: unknown): WorldGrid {
    const snapshot = WorldGridSnapshotSchema.parse(input);
    const grid = new WorldGrid();

    for (const entry of snapshot.locations) {
      const key = coordKey(entry.x, entry.y);
      if (grid.byCoord.has(key)) {
        throw new Error(`Snapshot places two locations at (${entry.x}, ${entry.y})`);
      }
      if (grid.byName.has(entry.name)) {
        throw new Error(`Snapshot contains '${entry.name}' twice`);
      }

      const location: GridLocation = {
        name: entry.name,
        category: entry.category,
        description: entry.description,
        terrain: entry.terrain,
        coordinates: { x: entry.x, y: entry.y },
        connections: { ...entry.connections },
        flags: { ...entry.flags },
      };
      grid.byCoord.set(key, location);
      grid.byName.set(location.name, location);
    }

    for (const location of grid.byName.values()) {
      grid.reserveExits(location);
    }

    return grid;
  }
}
