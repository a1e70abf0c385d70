/**
 * Terrain chunk storage on disk
 *
 * One JSON file per chunk, read on first visit and written right after
 * generation. Reads and writes are synchronous.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ChunkStore, TerrainChunk } from '@wayfarer/protocol';
import { TERRAIN_KINDS } from '@wayfarer/protocol';

const StoredChunkSchema = z.object({
  chunkX: z.number().int(),
  chunkY: z.number().int(),
  size: z.number().int().positive(),
  tiles: z.array(z.array(z.enum(TERRAIN_KINDS))),
  seed: z.string().regex(/^\d+$/),
  version: z.number().int(),
  fallbacks: z.number().int().nonnegative(),
  theme: z.string().optional(),
  generatedAt: z.number(),
});

type StoredChunk = z.infer<typeof StoredChunkSchema>;

export class FileChunkStore implements ChunkStore {
  constructor(private readonly dir: string) {}

  /**
   * Get path for a chunk file
   */
  getChunkPath(chunkX: number, chunkY: number): string {
    return path.join(this.dir, `${chunkX}_${chunkY}.json`);
  }

  /**
   * Load a chunk. Returns null if it was never saved; throws on a
   * file that does not parse.
   */
  load(chunkX: number, chunkY: number): TerrainChunk | null {
    const filePath = this.getChunkPath(chunkX, chunkY);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    const content: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const parsed = StoredChunkSchema.safeParse(content);
    if (!parsed.success) {
      throw new Error(`[Store] Malformed chunk file ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const stored = parsed.data;
    return { ...stored, seed: BigInt(stored.seed) };
  }

  /**
   * Save a chunk, replacing the file in one rename
   */
  save(chunk: TerrainChunk): void {
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }

    const stored: StoredChunk = { ...chunk, seed: chunk.seed.toString() };
    const filePath = this.getChunkPath(chunk.chunkX, chunk.chunkY);
    const tmpPath = `${filePath}.tmp`;

    fs.writeFileSync(tmpPath, JSON.stringify(stored));
    fs.renameSync(tmpPath, filePath);
  }

  /**
   * Number of chunk files on disk
   */
  count(): number {
    if (!fs.existsSync(this.dir)) return 0;
    return fs.readdirSync(this.dir).filter((name) => name.endsWith('.json')).length;
  }
}
