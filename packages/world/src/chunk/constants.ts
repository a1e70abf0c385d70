export { CHUNK_SIZE } from '@wayfarer/protocol';

/**
 * Primes mixed into chunk seeds
 */
export const CHUNK_SEED_PRIME_X = 73856093n;
export const CHUNK_SEED_PRIME_Y = 19349669n;
