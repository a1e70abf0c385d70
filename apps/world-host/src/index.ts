// Sentry must be imported first
import './instrument.js';
import * as Sentry from '@sentry/node';

import { loadConfig } from './config.js';
import { DatabasePersistence, InMemoryPersistence, type WorldPersistence } from './persistence.js';
import { FileChunkStore } from './utils/chunk-storage.js';
import { WorldHost } from './world-host.js';

/**
 * Restore the world, warm the chunks around the origin, then write it back
 */
async function main() {
  const config = loadConfig();
  console.log(`[Host] Starting world '${config.worldName}' (${config.nodeEnv})`);

  let persistence: WorldPersistence;
  if (config.databaseUrl) {
    persistence = new DatabasePersistence(config.databaseUrl);
  } else {
    console.warn('[Host] DATABASE_URL not set, locations will not outlive this process');
    persistence = new InMemoryPersistence();
  }

  const host = new WorldHost(
    {
      worldName: config.worldName,
      worldSeed: config.worldSeed,
      chunkSize: config.chunkSize,
      preloadRadius: config.preloadRadius,
      regionTheme: config.regionTheme,
      store: new FileChunkStore(config.chunkDir),
    },
    persistence
  );

  const map = await host.start();
  const stats = map.getChunks().getStats();
  console.log(`[Host] Ready: ${stats.chunks} chunks in memory, ${stats.storeLoads} loaded from ${config.chunkDir}`);

  // Preloaded chunks and restored locations go back to storage before exit
  try {
    await host.stop();
  } finally {
    await persistence.close();
  }
  console.log('[Host] World saved');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  Sentry.captureException(error);
  process.exit(1);
});
