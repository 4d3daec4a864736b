import { ValidationError } from '../errors/types.js';

/**
 * Nearest-rank percentile.
 *
 * @param p - fraction in (0, 1], e.g. 0.5 for the median
 * @returns the sample at rank `ceil(n * p)`, or 0 for an empty sample set
 */
export function percentile(samples: readonly number[], p: number): number {
  if (!Number.isFinite(p) || p <= 0 || p > 1) {
    throw new ValidationError('percentile must be in range (0.0, 1.0]', 'percentile');
  }
  if (samples.length === 0) {
    return 0;
  }
  for (const sample of samples) {
    if (!Number.isFinite(sample)) {
      throw new ValidationError('samples must contain finite numbers only', 'samples');
    }
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const index = Math.ceil(sorted.length * p) - 1;
  return sorted[Math.max(0, Math.min(sorted.length - 1, index))];
}
