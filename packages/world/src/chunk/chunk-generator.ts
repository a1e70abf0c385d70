import type { TerrainChunk } from '@wayfarer/protocol';
import { CHUNK_SIZE, CHUNK_SEED_PRIME_X, CHUNK_SEED_PRIME_Y } from './constants.js';
import { TileCompatibilityModel } from '../tiles/compatibility.js';
import { WfcSolver, type BorderConstraints } from '../wfc/solver.js';

export interface ChunkGeneratorConfig {
  chunkSize?: number;
  model?: TileCompatibilityModel;
}

/**
 * Generate chunk seed from world seed and chunk coordinates
 */
export function getChunkSeed(worldSeed: bigint, chunkX: number, chunkY: number): bigint {
  return (
    (worldSeed ^ (BigInt(chunkX) * CHUNK_SEED_PRIME_X) ^ (BigInt(chunkY) * CHUNK_SEED_PRIME_Y)) &
    0xffffffffffffffffn
  );
}

/**
 * Deterministic chunk generator.
 * Same world seed, coordinates, borders, ruleset and region theme give the same tiles.
 */
export class ChunkGenerator {
  private worldSeed: bigint;
  private chunkSize: number;
  private model: TileCompatibilityModel;
  private solver: WfcSolver;

  constructor(worldSeed: bigint, config: ChunkGeneratorConfig = {}) {
    this.worldSeed = worldSeed;
    this.chunkSize = config.chunkSize ?? CHUNK_SIZE;
    this.model = config.model ?? TileCompatibilityModel.fromDefaultRuleset();
    this.solver = new WfcSolver(this.model);

    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new Error(`Invalid chunk size: ${this.chunkSize}`);
    }
  }

  /**
   * Generate a single chunk at the given chunk coordinates, biasing
   * weights by a region theme when one is given
   */
  generateChunk(
    chunkX: number,
    chunkY: number,
    borders: BorderConstraints = {},
    theme?: string
  ): TerrainChunk {
    const seed = getChunkSeed(this.worldSeed, chunkX, chunkY);

    const { tiles, contradictions } = this.solver.solve({
      width: this.chunkSize,
      height: this.chunkSize,
      seed,
      borders,
      weights: theme === undefined ? undefined : this.model.weightsFor(theme),
      label: `chunk (${chunkX}, ${chunkY})`,
    });

    const chunk: TerrainChunk = {
      chunkX,
      chunkY,
      size: this.chunkSize,
      tiles,
      seed,
      version: this.model.version,
      fallbacks: contradictions.length,
      generatedAt: Date.now(),
    };
    if (theme !== undefined) chunk.theme = theme;
    return chunk;
  }

  /**
   * Get the world seed
   */
  getSeed(): bigint {
    return this.worldSeed;
  }

  getChunkSize(): number {
    return this.chunkSize;
  }

  getModel(): TileCompatibilityModel {
    return this.model;
  }
}
