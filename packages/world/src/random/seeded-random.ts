const MASK_64 = 0xffffffffffffffffn;

/**
 * Deterministic pseudo-random number generator using xorshift128+
 */
export class SeededRandom {
  private s0: bigint;
  private s1: bigint;

  constructor(seed: bigint) {
    // Initialize state from seed using splitmix64
    let state = seed & MASK_64;

    state = ((state ^ (state >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    this.s0 = state;

    state = ((state ^ (state >> 30n)) * 0x94d049bb133111ebn) & MASK_64;
    this.s1 = state;

    // xorshift128+ never leaves the all-zero state
    if (this.s0 === 0n && this.s1 === 0n) {
      this.s1 = 0x9e3779b97f4a7c15n;
    }
  }

  /**
   * Generate next random number in [0, 1)
   */
  next(): number {
    const result = (this.s0 + this.s1) & MASK_64;

    const s1 = this.s0 ^ this.s1;
    this.s0 = ((this.s0 << 55n) | (this.s0 >> 9n)) ^ s1 ^ (s1 << 14n);
    this.s0 = this.s0 & MASK_64;
    this.s1 = ((s1 << 36n) | (s1 >> 28n)) & MASK_64;

    // Convert to float in [0, 1)
    return Number(result & 0x1fffffffffffffn) / 0x20000000000000;
  }

  /**
   * Generate integer in [min, max]
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Pick an index with probability proportional to its weight.
   * Falls back to index 0 when every weight is zero.
   */
  pickWeighted(weights: readonly number[]): number {
    let total = 0;
    for (const weight of weights) {
      total += weight;
    }
    if (total <= 0) return 0;

    let roll = this.next() * total;
    for (let i = 0; i < weights.length; i++) {
      roll -= weights[i] ?? 0;
      if (roll < 0) return i;
    }
    return weights.length - 1;
  }

  /**
   * Clone the current state
   */
  clone(): SeededRandom {
    const rng = new SeededRandom(0n);
    rng.s0 = this.s0;
    rng.s1 = this.s1;
    return rng;
  }
}
