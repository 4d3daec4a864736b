import { requireText } from '../utils/preconditions.js';

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const UINT64_MASK = (1n << 64n) - 1n;

/**
 * FNV-1a 64-bit hash of the trimmed seed text, folding each UTF-16 code
 * unit. This is the only source of randomness for corpus generation.
 *
 * @returns unsigned 64-bit value
 */
export function deterministicSeed(seedText: string): bigint {
  const normalized = requireText(seedText, 'seed');
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < normalized.length; i++) {
    hash ^= BigInt(normalized.charCodeAt(i));
    hash = (hash * FNV_PRIME) & UINT64_MASK;
  }
  return hash;
}
