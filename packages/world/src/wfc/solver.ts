import type { Direction, TerrainKind } from '@wayfarer/protocol';
import { DIRECTIONS } from '@wayfarer/protocol';
import { SeededRandom } from '../random/seeded-random.js';
import type { TileCompatibilityModel } from '../tiles/compatibility.js';

/**
 * Resolved tiles of already-generated neighbours, one list per side.
 * north/south are indexed by x (length = width), east/west by y
 * (length = height). Missing entries impose no constraint.
 */
export interface BorderConstraints {
  north?: readonly TerrainKind[];
  south?: readonly TerrainKind[];
  east?: readonly TerrainKind[];
  west?: readonly TerrainKind[];
}

export interface SolveRequest {
  width: number;
  height: number;
  seed: bigint;
  borders?: BorderConstraints;
  weights?: readonly number[]; // Per kind index; replaces the model's weights
  label?: string; // Included in log lines
}

export interface Contradiction {
  x: number;
  y: number;
  fallback: TerrainKind;
}

export interface SolveResult {
  tiles: TerrainKind[][]; // [y][x]
  contradictions: Contradiction[];
}

export interface WfcSolverConfig {
  fallbackKind?: TerrainKind;
}

// Cell states; halo cells with no supplied tile stay 0 and take no part
const FREE = 1;
const RESOLVED = 2;

function popcount(mask: number): number {
  let count = 0;
  let m = mask;
  while (m !== 0) {
    m &= m - 1;
    count++;
  }
  return count;
}

/**
 * Cell grid with a one-cell halo holding the neighbours' edge tiles.
 * Interior (x, y) lives at ((y + 1) * stride + (x + 1)).
 */
class CellGrid {
  readonly stride: number;
  readonly rows: number;
  readonly domains: number[];
  readonly states: Uint8Array;

  constructor(readonly width: number, readonly height: number) {
    this.stride = width + 2;
    this.rows = height + 2;
    this.domains = new Array<number>(this.stride * this.rows).fill(0);
    this.states = new Uint8Array(this.stride * this.rows);
  }

  index(x: number, y: number): number {
    return (y + 1) * this.stride + (x + 1);
  }

  xOf(index: number): number {
    return (index % this.stride) - 1;
  }

  yOf(index: number): number {
    return Math.floor(index / this.stride) - 1;
  }

  /**
   * Index of the cell one step in `direction`, or -1 past the halo
   */
  neighbor(index: number, direction: Direction): number {
    const col = index % this.stride;
    const row = Math.floor(index / this.stride);
    switch (direction) {
      case 'north':
        return row + 1 < this.rows ? index + this.stride : -1;
      case 'south':
        return row > 0 ? index - this.stride : -1;
      case 'east':
        return col + 1 < this.stride ? index + 1 : -1;
      case 'west':
        return col > 0 ? index - 1 : -1;
    }
  }
}

/**
 * Wave Function Collapse over one chunk.
 *
 * Contradictions are not backtracked: an emptied cell takes the fallback
 * kind and propagation continues from it, so solve() always terminates
 * with every cell resolved.
 */
export class WfcSolver {
  private model: TileCompatibilityModel;
  private fallbackKind: TerrainKind;

  constructor(model: TileCompatibilityModel, config: WfcSolverConfig = {}) {
    this.model = model;
    this.fallbackKind = config.fallbackKind ?? model.fallbackKind;
    // Fail fast on a fallback the model does not know
    model.indexOf(this.fallbackKind);
  }

  solve(request: SolveRequest): SolveResult {
    const { width, height } = request;
    const kindCount = this.model.getKinds().length;
    const kindWeights = request.weights;
    if (kindWeights && kindWeights.length !== kindCount) {
      throw new Error(`Expected ${kindCount} weights, got ${kindWeights.length}`);
    }

    const rng = new SeededRandom(request.seed);
    const grid = new CellGrid(width, height);
    const run = new PropagationRun(grid, this.model, this.fallbackKind, request.label);

    const full = this.model.fullMask();
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const index = grid.index(x, y);
        grid.domains[index] = full;
        grid.states[index] = FREE;
      }
    }

    this.applyBorders(grid, run, request.borders ?? {});
    run.propagate();

    const weights: number[] = [];
    const options: number[] = [];

    for (;;) {
      const candidates = this.lowestDomainCells(grid);
      if (candidates.length === 0) break;

      const chosen = candidates[rng.nextInt(0, candidates.length - 1)] ?? candidates[0];
      if (chosen === undefined) break;

      const domain = grid.domains[chosen] ?? 0;
      weights.length = 0;
      options.length = 0;
      for (let k = 0; k < kindCount; k++) {
        if ((domain & (1 << k)) !== 0) {
          options.push(k);
          weights.push(kindWeights ? (kindWeights[k] ?? 0) : this.model.weightAt(k));
        }
      }

      const picked = options[rng.pickWeighted(weights)] ?? options[0] ?? 0;
      grid.domains[chosen] = 1 << picked;
      grid.states[chosen] = RESOLVED;
      run.enqueue(chosen);
      run.propagate();
    }

    return {
      tiles: this.readTiles(grid),
      contradictions: run.contradictions,
    };
  }

  private applyBorders(grid: CellGrid, run: PropagationRun, borders: BorderConstraints): void {
    const fix = (x: number, y: number, kind: TerrainKind | undefined): void => {
      if (kind === undefined) return;
      const index = grid.index(x, y);
      grid.domains[index] = this.model.maskOf(kind);
      grid.states[index] = RESOLVED;
      run.enqueue(index);
    };

    for (let x = 0; x < grid.width; x++) {
      fix(x, grid.height, borders.north?.[x]);
      fix(x, -1, borders.south?.[x]);
    }
    for (let y = 0; y < grid.height; y++) {
      fix(grid.width, y, borders.east?.[y]);
      fix(-1, y, borders.west?.[y]);
    }
  }

  /**
   * Free cells sharing the smallest domain size above one, in scan order
   */
  private lowestDomainCells(grid: CellGrid): number[] {
    let best = Infinity;
    let candidates: number[] = [];

    for (let y = 0; y < grid.height; y++) {
      for (let x = 0; x < grid.width; x++) {
        const index = grid.index(x, y);
        if (grid.states[index] !== FREE) continue;

        const size = popcount(grid.domains[index] ?? 0);
        if (size <= 1) continue;

        if (size < best) {
          best = size;
          candidates = [index];
        } else if (size === best) {
          candidates.push(index);
        }
      }
    }

    return candidates;
  }

  private readTiles(grid: CellGrid): TerrainKind[][] {
    const tiles: TerrainKind[][] = [];

    for (let y = 0; y < grid.height; y++) {
      const row: TerrainKind[] = [];
      for (let x = 0; x < grid.width; x++) {
        // Every interior domain is a singleton here; take its lowest bit
        const domain = grid.domains[grid.index(x, y)] ?? 0;
        row.push(this.model.kindAt(31 - Math.clz32(domain & -domain)));
      }
      tiles.push(row);
    }

    return tiles;
  }
}

/**
 * Worklist arc-consistency state for a single solve
 */
class PropagationRun {
  readonly contradictions: Contradiction[] = [];
  private queue: number[] = [];
  private head = 0;
  private queued: Uint8Array;
  private fallbackMask: number;

  constructor(
    private grid: CellGrid,
    private model: TileCompatibilityModel,
    private fallbackKind: TerrainKind,
    private label: string | undefined
  ) {
    this.queued = new Uint8Array(grid.domains.length);
    this.fallbackMask = model.maskOf(fallbackKind);
  }

  enqueue(index: number): void {
    if (this.queued[index] === 1) return;
    this.queued[index] = 1;
    this.queue.push(index);
  }

  propagate(): void {
    const kindCount = this.model.getKinds().length;

    while (this.head < this.queue.length) {
      const current = this.queue[this.head++] ?? -1;
      if (current < 0) continue;
      this.queued[current] = 0;

      const domain = this.grid.domains[current] ?? 0;

      for (const direction of DIRECTIONS) {
        const next = this.grid.neighbor(current, direction);
        if (next < 0 || this.grid.states[next] !== FREE) continue;

        let allowed = 0;
        for (let k = 0; k < kindCount; k++) {
          if ((domain & (1 << k)) !== 0) {
            allowed |= this.model.supportMask(k, direction);
          }
        }

        const before = this.grid.domains[next] ?? 0;
        const after = before & allowed;
        if (after === before) continue;

        if (after === 0) {
          this.fallback(next);
        } else {
          this.grid.domains[next] = after;
          this.enqueue(next);
        }
      }
    }

    this.queue = [];
    this.head = 0;
  }

  fallback(index: number): void {
    const x = this.grid.xOf(index);
    const y = this.grid.yOf(index);
    const where = this.label ? ` in ${this.label}` : '';
    console.warn(`[WFC] Contradiction at (${x}, ${y})${where}, falling back to ${this.fallbackKind}`);

    this.grid.domains[index] = this.fallbackMask;
    this.grid.states[index] = RESOLVED;
    this.contradictions.push({ x, y, fallback: this.fallbackKind });
    this.enqueue(index);
  }
}
