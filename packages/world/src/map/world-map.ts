import type { LocationDraft, PlacedLocation, PlacementResult, TerrainKind } from '@wayfarer/protocol';
import type { ChunkManager } from '../chunk/chunk-manager.js';
import type { WorldGrid } from '../grid/world-grid.js';
import type { TileCompatibilityModel } from '../tiles/compatibility.js';

/**
 * What a collaborator sees at one coordinate
 */
export interface MapCell {
  x: number;
  y: number;
  terrain: TerrainKind;
  passable: boolean;
  location: PlacedLocation | null;
}

/**
 * Terrain plus placed locations, as read by content, expansion and
 * map-rendering layers
 */
export class WorldMap {
  constructor(
    private readonly chunks: ChunkManager,
    private readonly grid: WorldGrid
  ) {}

  /**
   * Terrain, passability and location at a coordinate (generates terrain)
   */
  describe(x: number, y: number): MapCell {
    const terrain = this.chunks.getTileAt(x, y);
    return {
      x,
      y,
      terrain,
      passable: this.model().isPassable(terrain),
      location: this.grid.getByCoordinates(x, y),
    };
  }

  /**
   * Like describe(), but null for coordinates whose terrain was never generated
   */
  peek(x: number, y: number): MapCell | null {
    const terrain = this.chunks.peekTileAt(x, y);
    if (terrain === null) return null;

    return {
      x,
      y,
      terrain,
      passable: this.model().isPassable(terrain),
      location: this.grid.getByCoordinates(x, y),
    };
  }

  /**
   * Rows of cells covering a rectangle, southmost row first
   */
  sampleArea(
    minX: number,
    minY: number,
    width: number,
    height: number,
    generate: boolean = true
  ): Array<Array<MapCell | null>> {
    const rows: Array<Array<MapCell | null>> = [];

    for (let y = minY; y < minY + height; y++) {
      const row: Array<MapCell | null> = [];
      for (let x = minX; x < minX + width; x++) {
        row.push(generate ? this.describe(x, y) : this.peek(x, y));
      }
      rows.push(row);
    }

    return rows;
  }

  /**
   * Location category that fits the terrain at a coordinate
   */
  suggestCategory(x: number, y: number): string {
    return this.model().categoryOf(this.chunks.getTileAt(x, y));
  }

  locationTypesAt(x: number, y: number): readonly string[] {
    return this.model().locationTypesFor(this.chunks.getTileAt(x, y));
  }

  /**
   * Place a location; on success its terrain (if any) overrides the generated tile
   */
  placeLocation(draft: LocationDraft, x: number, y: number): PlacementResult {
    const result = this.grid.addLocation(draft, x, y);

    if (result.success && result.created && result.location.terrain) {
      this.chunks.setTileOverride(x, y, result.location.terrain);
    }

    return result;
  }

  getChunks(): ChunkManager {
    return this.chunks;
  }

  getGrid(): WorldGrid {
    return this.grid;
  }

  private model(): TileCompatibilityModel {
    return this.chunks.getGenerator().getModel();
  }
}
