import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ChunkArchive, ChunkStore, PlacedLocation, TerrainChunk } from '@wayfarer/protocol';
import { ChunkManager } from '../src/chunk/chunk-manager.js';
import { getChunkSeed } from '../src/chunk/chunk-generator.js';
import { MemoryChunkStore } from '../src/chunk/memory-chunk-store.js';
import { TileCompatibilityModel } from '../src/tiles/compatibility.js';

class MemoryArchive implements ChunkArchive {
  chunks: TerrainChunk[] = [];

  async loadChunks(): Promise<TerrainChunk[]> {
    return [...this.chunks];
  }

  async saveChunks(chunks: TerrainChunk[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks = this.chunks.filter((c) => c.chunkX !== chunk.chunkX || c.chunkY !== chunk.chunkY);
      this.chunks.push(chunk);
    }
  }
}

function expectChunkCompatible(model: TileCompatibilityModel, chunk: TerrainChunk): void {
  chunk.tiles.forEach((row, y) => {
    row.forEach((kind, x) => {
      const east = row[x + 1];
      if (east !== undefined) expect(model.compatible(kind, east, 'east')).toBe(true);
      const north = chunk.tiles[y + 1]?.[x];
      if (north !== undefined) expect(model.compatible(kind, north, 'north')).toBe(true);
    });
  });
}

function countKinds(chunk: TerrainChunk, kinds: readonly string[]): number {
  return chunk.tiles.flat().filter((kind) => kinds.includes(kind)).length;
}

function placed(name: string, x: number, y: number, terrain?: PlacedLocation['terrain']): PlacedLocation {
  return { name, category: 'town', terrain, coordinates: { x, y }, connections: {}, flags: {} };
}

describe('ChunkManager', () => {
  const model = TileCompatibilityModel.fromDefaultRuleset();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getChunkSeed()', () => {
    it('mixes chunk coordinates into the world seed', () => {
      expect(getChunkSeed(42n, 0, 0)).toBe(42n);
      expect(getChunkSeed(0n, 1, 0)).toBe(73856093n);
      expect(getChunkSeed(0n, 0, 1)).toBe(19349669n);
    });

    it('wraps negative coordinates into 64 bits', () => {
      expect(getChunkSeed(0n, -1, 0)).toBe((1n << 64n) - 73856093n);
    });
  });

  describe('stitching', () => {
    it('keeps the shared column of chunks (0, 0) and (1, 0) compatible', () => {
      const manager = new ChunkManager({ worldSeed: 42n, chunkSize: 16, model });
      const left = manager.getChunk(0, 0);
      const right = manager.getChunk(1, 0);

      expect(left.size).toBe(16);
      expect(right.fallbacks).toBe(0);
      for (let y = 0; y < 16; y++) {
        const a = left.tiles[y]?.[15];
        const b = right.tiles[y]?.[0];
        expect(a).toBeDefined();
        expect(b).toBeDefined();
        if (a && b) expect(model.compatible(a, b, 'east')).toBe(true);
      }
    });

    it('keeps the shared row of vertically adjacent chunks compatible', () => {
      const manager = new ChunkManager({ worldSeed: 42n, chunkSize: 16, model });
      const south = manager.getChunk(0, 0);
      const north = manager.getChunk(0, 1);

      for (let x = 0; x < 16; x++) {
        const a = south.tiles[15]?.[x];
        const b = north.tiles[0]?.[x];
        if (a && b) expect(model.compatible(a, b, 'north')).toBe(true);
      }
    });

    it('stitches a chunk generated between two existing ones', () => {
      const manager = new ChunkManager({ worldSeed: 7n, chunkSize: 8, model });
      const west = manager.getChunk(-1, 0);
      const east = manager.getChunk(1, 0);
      const middle = manager.getChunk(0, 0);

      for (let y = 0; y < 8; y++) {
        const w = west.tiles[y]?.[7];
        const m0 = middle.tiles[y]?.[0];
        const m7 = middle.tiles[y]?.[7];
        const e = east.tiles[y]?.[0];
        if (w && m0) expect(model.compatible(w, m0, 'east')).toBe(true);
        if (m7 && e) expect(model.compatible(m7, e, 'east')).toBe(true);
      }
    });
  });

  describe('lookups', () => {
    it('returns the same chunk on repeated requests', () => {
      const manager = new ChunkManager({ worldSeed: 42n, model });
      const first = manager.getChunk(2, -3);
      expect(manager.getChunk(2, -3)).toBe(first);
      expect(manager.getStats().generated).toBe(1);
    });

    it('generates the same first chunk for the same seed', () => {
      const a = new ChunkManager({ worldSeed: 42n, model }).getChunk(0, 0);
      const b = new ChunkManager({ worldSeed: 42n, model }).getChunk(0, 0);
      expect(b.tiles).toEqual(a.tiles);
      expect(b.seed).toBe(a.seed);
    });

    it('locates negative world coordinates', () => {
      const manager = new ChunkManager({ worldSeed: 1n, model });
      expect(manager.locate(-1, -1)).toEqual({ chunkX: -1, chunkY: -1, localX: 15, localY: 15 });
      expect(manager.locate(-16, 16)).toEqual({ chunkX: -1, chunkY: 1, localX: 0, localY: 0 });
      expect(manager.locate(17, 3)).toEqual({ chunkX: 1, chunkY: 0, localX: 1, localY: 3 });
    });

    it('reads tiles at negative coordinates from the right chunk', () => {
      const manager = new ChunkManager({ worldSeed: 1n, model });
      const tile = manager.getTileAt(-1, -1);
      expect(tile).toBe(manager.getChunk(-1, -1).tiles[15]?.[15]);
      expect(manager.getTileAt(-1, -1)).toBe(tile);
    });

    it('peeks without generating', () => {
      const manager = new ChunkManager({ worldSeed: 1n, model });
      expect(manager.peekTileAt(5, 5)).toBeNull();
      expect(manager.peekChunk(0, 0)).toBeNull();
      expect(manager.hasChunk(0, 0)).toBe(false);

      const tile = manager.getTileAt(5, 5);
      expect(manager.peekTileAt(5, 5)).toBe(tile);
      expect(manager.hasChunk(0, 0)).toBe(true);
    });

    it('collects the chunks under a viewport', () => {
      const manager = new ChunkManager({ worldSeed: 1n, model });
      const chunks = manager.getChunksForViewport(0, 0, 20, 10);
      expect(chunks.map((c) => [c.chunkX, c.chunkY])).toEqual([[0, 0], [1, 0]]);
    });

    it('preloads a square of chunks', () => {
      const manager = new ChunkManager({ worldSeed: 1n, chunkSize: 8, model });
      manager.preloadAround(0, 0, 1);
      expect(manager.getStats().chunks).toBe(9);
      expect(manager.hasChunk(-1, -1)).toBe(true);
      expect(manager.hasChunk(1, 1)).toBe(true);
    });

    it('honours the configured chunk size', () => {
      const chunk = new ChunkManager({ worldSeed: 1n, chunkSize: 8, model }).getChunk(0, 0);
      expect(chunk.size).toBe(8);
      expect(chunk.tiles).toHaveLength(8);
      expect(chunk.version).toBe(model.version);
    });

    it('rejects an invalid chunk size', () => {
      expect(() => new ChunkManager({ worldSeed: 1n, chunkSize: 0, model })).toThrow('Invalid chunk size: 0');
    });

    it('forgets chunks on clear()', () => {
      const manager = new ChunkManager({ worldSeed: 1n, model });
      manager.getChunk(0, 0);
      manager.clear();
      expect(manager.getStats().chunks).toBe(0);
      expect(manager.hasChunk(0, 0)).toBe(false);
    });
  });

  describe('chunk store', () => {
    it('reloads stored chunks after a restart instead of regenerating', () => {
      const store = new MemoryChunkStore();
      const first = new ChunkManager({ worldSeed: 42n, store, model });
      const original = first.getChunk(0, 0);
      first.getChunk(1, 0);
      expect(store.size).toBe(2);

      const second = new ChunkManager({ worldSeed: 42n, store, model });
      expect(second.getChunk(0, 0).tiles).toEqual(original.tiles);
      expect(second.getStats().storeLoads).toBe(1);
      expect(second.getStats().generated).toBe(0);
    });

    it('regenerates when the store cannot be read', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const saved: TerrainChunk[] = [];
      const store: ChunkStore = {
        load: () => {
          throw new Error('disk unavailable');
        },
        save: (chunk) => {
          saved.push(chunk);
        },
      };

      const manager = new ChunkManager({ worldSeed: 42n, store, model });
      const chunk = manager.getChunk(0, 0);

      expect(chunk.tiles).toHaveLength(16);
      expect(saved).toEqual([chunk]);
      // One failed read for the chunk, one per neighbour checked for borders
      expect(manager.getStats().storeErrors).toBe(5);
    });

    it('keeps the generated chunk when the store cannot be written', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const store: ChunkStore = {
        load: () => null,
        save: () => {
          throw new Error('disk full');
        },
      };

      const manager = new ChunkManager({ worldSeed: 42n, store, model });
      const chunk = manager.getChunk(0, 0);

      expect(manager.getChunk(0, 0)).toBe(chunk);
      expect(manager.getStats().storeErrors).toBe(1);
      expect(error).toHaveBeenCalledTimes(1);
    });

    it('ignores stored chunks from another ruleset version', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const stale: TerrainChunk = {
        chunkX: 0,
        chunkY: 0,
        size: 16,
        tiles: Array.from({ length: 16 }, () => Array.from({ length: 16 }, () => 'ruins' as const)),
        seed: 42n,
        version: 99,
        fallbacks: 0,
        generatedAt: 0,
      };
      const store: ChunkStore = {
        load: (chunkX, chunkY) => (chunkX === 0 && chunkY === 0 ? stale : null),
        save: () => {},
      };

      const manager = new ChunkManager({ worldSeed: 42n, store, model });
      const chunk = manager.getChunk(0, 0);

      expect(chunk.version).toBe(model.version);
      expect(manager.getStats().generated).toBe(1);
      expect(warn).toHaveBeenCalledWith('[Chunks] Ignoring stale stored chunk (0, 0)');
    });

    it('ignores stored chunks generated under another world seed', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const store = new MemoryChunkStore();
      new ChunkManager({ worldSeed: 1n, store, model }).getChunk(0, 0);

      const manager = new ChunkManager({ worldSeed: 999n, store, model });
      const chunk = manager.getChunk(0, 0);

      expect(chunk.seed).toBe(getChunkSeed(999n, 0, 0));
      expect(manager.getStats().storeLoads).toBe(0);
      expect(manager.getStats().generated).toBe(1);
      expect(warn).toHaveBeenCalledWith('[Chunks] Ignoring stale stored chunk (0, 0)');
    });

    it('refuses to generate a chunk that is already being generated', () => {
      let manager: ChunkManager | null = null;
      let reentry: unknown = null;
      const store: ChunkStore = {
        load: (chunkX, chunkY) => {
          // Looking up the east neighbour of (0, 0) asks for (0, 0) again
          if (chunkX === 1 && chunkY === 0 && manager) {
            try {
              manager.getChunk(0, 0);
            } catch (error) {
              reentry = error;
            }
          }
          return null;
        },
        save: () => {},
      };

      manager = new ChunkManager({ worldSeed: 42n, store, model });
      manager.getChunk(0, 0);

      expect(reentry).toBeInstanceOf(Error);
      expect(String(reentry)).toContain('Re-entrant generation of chunk (0, 0)');
      expect(manager.getStats().generated).toBe(1);
    });
  });

  describe('tile overrides', () => {
    it('returns an override before the generated tile', () => {
      const manager = new ChunkManager({ worldSeed: 42n, model });
      manager.setTileOverride(3, 4, 'water');

      expect(manager.getTileAt(3, 4)).toBe('water');
      expect(manager.getOverrides()).toEqual([{ x: 3, y: 4, terrain: 'water' }]);
      expect(manager.getStats().overrides).toBe(1);

      expect(manager.clearTileOverride(3, 4)).toBe(true);
      expect(manager.getTileAt(3, 4)).toBe(manager.getChunk(0, 0).tiles[4]?.[3]);
    });

    it('shows overrides in peekTileAt only for explored chunks', () => {
      const manager = new ChunkManager({ worldSeed: 42n, model });
      manager.setTileOverride(40, 40, 'desert');
      expect(manager.peekTileAt(40, 40)).toBeNull();

      manager.getChunk(2, 2);
      expect(manager.peekTileAt(40, 40)).toBe('desert');
    });

    it('syncs terrain under placed locations', () => {
      const manager = new ChunkManager({ worldSeed: 42n, model });
      const synced = manager.syncWithLocations([
        placed('Harbor', 1, 1, 'beach'),
        placed('Crossroads', 2, 2),
      ]);

      expect(synced).toBe(1);
      expect(manager.getTileAt(1, 1)).toBe('beach');
      expect(manager.getOverrides()).toHaveLength(1);

      expect(manager.syncWithLocations([placed('Crossroads', 2, 2)], 'plains')).toBe(1);
      expect(manager.getTileAt(2, 2)).toBe('plains');
    });
  });

  describe('archive', () => {
    it('flushes new chunks once and hydrates them into a fresh manager', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const archive = new MemoryArchive();

      const first = new ChunkManager({ worldSeed: 42n, model });
      const original = first.getChunk(0, 0);
      first.getChunk(1, 0);
      expect(first.getStats().pendingFlush).toBe(2);

      await expect(first.flush(archive)).resolves.toBe(2);
      await expect(first.flush(archive)).resolves.toBe(0);
      expect(first.getStats().pendingFlush).toBe(0);

      const second = new ChunkManager({ worldSeed: 42n, model });
      await expect(second.hydrate(archive)).resolves.toBe(2);
      expect(second.getChunk(0, 0).tiles).toEqual(original.tiles);
      expect(second.getStats().generated).toBe(0);
      expect(second.getStats().pendingFlush).toBe(0);
    });

    it('skips archived chunks from another ruleset version', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const archive = new MemoryArchive();
      const chunk = new ChunkManager({ worldSeed: 42n, model }).getChunk(0, 0);
      archive.chunks.push({ ...chunk, version: chunk.version + 1 });

      const manager = new ChunkManager({ worldSeed: 42n, model });
      await expect(manager.hydrate(archive)).resolves.toBe(0);
      expect(manager.hasChunk(0, 0)).toBe(false);
    });

    it('skips archived chunks from another world seed', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const archive = new MemoryArchive();
      archive.chunks.push(new ChunkManager({ worldSeed: 1n, model }).getChunk(0, 0));

      const manager = new ChunkManager({ worldSeed: 999n, model });
      await expect(manager.hydrate(archive)).resolves.toBe(0);
      expect(manager.hasChunk(0, 0)).toBe(false);
      expect(log).toHaveBeenCalledWith('[Chunks] Hydrated 0 of 1 archived chunks');
      expect(manager.getChunk(0, 0).seed).toBe(getChunkSeed(999n, 0, 0));
    });

    it('survives an archive that fails', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const broken: ChunkArchive = {
        loadChunks: () => Promise.reject(new Error('connection refused')),
        saveChunks: () => Promise.reject(new Error('connection refused')),
      };

      const manager = new ChunkManager({ worldSeed: 42n, model });
      await expect(manager.hydrate(broken)).resolves.toBe(0);

      manager.getChunk(0, 0);
      await expect(manager.flush(broken)).resolves.toBe(0);
      expect(manager.getStats().pendingFlush).toBe(1);
      expect(error).toHaveBeenCalledTimes(2);
    });
  });

  describe('region themes', () => {
    const mountainFamily = ['mountain', 'foothills', 'hills'] as const;

    it('records the theme on chunks generated under it', () => {
      const themed = new ChunkManager({ worldSeed: 42n, model, regionTheme: 'mountains' });
      expect(themed.getRegionTheme()).toBe('mountains');
      expect(themed.getChunk(0, 0).theme).toBe('mountains');

      const plain = new ChunkManager({ worldSeed: 42n, model });
      expect(plain.getRegionTheme()).toBeNull();
      expect(plain.getChunk(0, 0)).not.toHaveProperty('theme');
    });

    it('generates the same themed chunk for the same seed and theme', () => {
      const a = new ChunkManager({ worldSeed: 5n, model, regionTheme: 'forest' }).getChunk(0, 0);
      const b = new ChunkManager({ worldSeed: 5n, model, regionTheme: 'forest' }).getChunk(0, 0);
      expect(b.tiles).toEqual(a.tiles);
    });

    it('raises the share of mountain-family terrain in a mountain region', () => {
      let themed = 0;
      let base = 0;
      for (let seed = 0n; seed < 10n; seed++) {
        themed += countKinds(
          new ChunkManager({ worldSeed: seed, model, regionTheme: 'mountains' }).getChunk(0, 0),
          mountainFamily
        );
        base += countKinds(new ChunkManager({ worldSeed: seed, model }).getChunk(0, 0), mountainFamily);
      }
      expect(themed).toBeGreaterThan(base);
    });

    it('keeps adjacency under every bundled theme', () => {
      for (const theme of model.getThemes()) {
        const manager = new ChunkManager({ worldSeed: 99n, model, regionTheme: theme });
        const left = manager.getChunk(0, 0);
        const right = manager.getChunk(1, 0);

        expectChunkCompatible(model, left);
        expectChunkCompatible(model, right);
        for (let y = 0; y < 16; y++) {
          const a = left.tiles[y]?.[15];
          const b = right.tiles[y]?.[0];
          if (a && b) expect(model.compatible(a, b, 'east')).toBe(true);
        }
      }
    });

    it('leaves existing chunks alone when the theme changes', () => {
      const manager = new ChunkManager({ worldSeed: 42n, model });
      const first = manager.getChunk(0, 0);

      manager.setRegionTheme('forest');
      expect(manager.getChunk(0, 0)).toBe(first);
      expect(manager.getChunk(1, 0).theme).toBe('forest');

      manager.setRegionTheme(null);
      expect(manager.getChunk(2, 0)).not.toHaveProperty('theme');
    });

    it('uses base weights for an unknown theme', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const unknown = new ChunkManager({ worldSeed: 42n, model, regionTheme: 'atlantis' });

      expect(warn).toHaveBeenCalledWith("[Chunks] Unknown region theme 'atlantis', using base weights");
      const base = new ChunkManager({ worldSeed: 42n, model }).getChunk(0, 0);
      expect(unknown.getChunk(0, 0).tiles).toEqual(base.tiles);
    });
  });
});
