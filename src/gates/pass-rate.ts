import type { DifferentialReport } from '../diff/types.js';
import { summarizeReport } from '../diff/types.js';
import { ValidationError } from '../errors/types.js';
import { requireNonNegativeInteger } from '../utils/preconditions.js';

/**
 * Share of scenarios that matched, `matchCount / totalCount`.
 */
export class PassRate {
  readonly matchCount: number;
  readonly totalCount: number;

  private constructor(matchCount: number, totalCount: number) {
    requireNonNegativeInteger(matchCount, 'matchCount');
    requireNonNegativeInteger(totalCount, 'totalCount');
    if (matchCount > totalCount) {
      throw new ValidationError('matchCount must be <= totalCount', 'matchCount');
    }
    this.matchCount = matchCount;
    this.totalCount = totalCount;
  }

  static of(matchCount: number, totalCount: number): PassRate {
    return new PassRate(matchCount, totalCount);
  }

  static from(report: DifferentialReport): PassRate {
    const counts = summarizeReport(report);
    return new PassRate(counts.match, counts.total);
  }

  /** In [0, 1]; 0 for an empty report */
  ratio(): number {
    return this.totalCount === 0 ? 0 : this.matchCount / this.totalCount;
  }

  percentage(): number {
    return this.ratio() * 100;
  }

  /** e.g. `95.00% (19/20)` */
  formatted(): string {
    return `${this.percentage().toFixed(2)}% (${this.matchCount}/${this.totalCount})`;
  }
}

export function formatRatio(ratio: number): string {
  return ratio.toFixed(4);
}
