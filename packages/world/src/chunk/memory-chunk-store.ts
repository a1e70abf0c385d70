import type { ChunkStore, TerrainChunk } from '@wayfarer/protocol';

/**
 * ChunkStore backed by a Map. Survives ChunkManager instances that share it.
 */
export class MemoryChunkStore implements ChunkStore {
  private chunks: Map<string, TerrainChunk> = new Map();

  load(chunkX: number, chunkY: number): TerrainChunk | null {
    return this.chunks.get(`${chunkX},${chunkY}`) ?? null;
  }

  save(chunk: TerrainChunk): void {
    this.chunks.set(`${chunk.chunkX},${chunk.chunkY}`, chunk);
  }

  get size(): number {
    return this.chunks.size;
  }

  clear(): void {
    this.chunks.clear();
  }
}
