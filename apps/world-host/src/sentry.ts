import type { NodeOptions } from '@sentry/node';
import type { HostConfig } from './config.js';

/**
 * Sentry options for a validated host config. null when no DSN is set.
 */
export function sentryOptions(config: Pick<HostConfig, 'sentryDsn' | 'nodeEnv'>): NodeOptions | null {
  if (!config.sentryDsn) return null;

  return {
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
    tracesSampleRate: 1.0,
    beforeSend(event) {
      // Add memory info to all events
      const mem = process.memoryUsage();
      event.contexts = {
        ...event.contexts,
        memory: {
          heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
          heap_total_mb: Math.round(mem.heapTotal / 1024 / 1024),
          rss_mb: Math.round(mem.rss / 1024 / 1024),
        },
      };
      return event;
    },
  };
}
