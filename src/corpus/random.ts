import { ValidationError } from '../errors/types.js';

const MULTIPLIER = 0x5deece66dn;
const ADDEND = 0xbn;
const MASK = (1n << 48n) - 1n;
const INT32_MAX = 0x7fffffff;

/**
 * 48-bit linear congruential generator.
 *
 * Seeding, stepping and bounded draws follow the classic `drand48`-family
 * parameters with a scrambled seed, so a given 64-bit seed yields the same
 * sequence on every platform and in every process.
 */
export class SeededRandom {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = (BigInt.asUintN(64, seed) ^ MULTIPLIER) & MASK;
  }

  /**
   * Uniform integer in `[0, bound)`.
   */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0 || bound > INT32_MAX) {
      throw new ValidationError(`bound must be a positive 32-bit integer, got ${bound}`, 'bound');
    }

    let u = this.next(31);
    const m = bound - 1;
    if ((bound & m) === 0) {
      return Number((BigInt(bound) * BigInt(u)) >> 31n);
    }
    let r = u % bound;
    // Reject draws from the incomplete final bucket.
    while (u - r + m > INT32_MAX) {
      u = this.next(31);
      r = u % bound;
    }
    return r;
  }

  /**
   * Signed 32-bit integer built from the top `bits` of the next state.
   */
  next(bits: number): number {
    this.state = (this.state * MULTIPLIER + ADDEND) & MASK;
    return Number(BigInt.asIntN(32, this.state >> BigInt(48 - bits)));
  }
}

/**
 * In-place Fisher-Yates shuffle: `for i = n-1 down to 1, swap(i, nextInt(i + 1))`.
 */
export function seededShuffle<T>(items: T[], random: SeededRandom): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    const current = items[i];
    items[i] = items[j];
    items[j] = current;
  }
  return items;
}
