import { z } from 'zod';
import { CHUNK_SIZE, DEFAULT_PRELOAD_RADIUS } from '@wayfarer/protocol';

// Seeds are stored in a signed bigint column
const MAX_WORLD_SEED = 0x7fffffffffffffffn;

const EnvSchema = z.object({
  WORLD_SEED: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform((value) => BigInt(value))
    .refine((seed) => seed <= MAX_WORLD_SEED, 'must fit in a signed 64-bit integer')
    .optional(),
  WORLD_NAME: z.string().min(1).default('Wayfarer'),
  CHUNK_SIZE: z.coerce.number().int().min(4).max(64).default(CHUNK_SIZE),
  CHUNK_DIR: z.string().min(1).default('data/chunks'),
  PRELOAD_RADIUS: z.coerce.number().int().min(0).max(8).default(DEFAULT_PRELOAD_RADIUS),
  REGION_THEME: z.string().min(1).optional(),
  DATABASE_URL: z.string().url().optional(),
  SENTRY_DSN: z.string().url().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface HostConfig {
  worldSeed?: bigint;
  worldName: string;
  chunkSize: number;
  chunkDir: string;
  preloadRadius: number;
  regionTheme?: string;
  databaseUrl?: string;
  sentryDsn?: string;
  nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Parse host configuration from environment variables.
 * Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const data = parsed.data;
  return {
    worldSeed: data.WORLD_SEED,
    worldName: data.WORLD_NAME,
    chunkSize: data.CHUNK_SIZE,
    chunkDir: data.CHUNK_DIR,
    preloadRadius: data.PRELOAD_RADIUS,
    regionTheme: data.REGION_THEME,
    databaseUrl: data.DATABASE_URL,
    sentryDsn: data.SENTRY_DSN,
    nodeEnv: data.NODE_ENV,
  };
}
