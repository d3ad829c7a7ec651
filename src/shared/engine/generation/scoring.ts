/**
 * Matched-mode balance scoring.
 *
 * A combination's total is the sum of its entries' `score` weights plus
 * `riskPenalty` for every risk flag they carry. Weights, the target band and
 * the penalty all come from the catalogue.
 */

import type { ScoreBand } from '../../types/scenario';
import type { CatalogueEntry, ScoringPolicy } from './catalogue';

export function scoreCombination(entries: readonly CatalogueEntry[], policy: ScoringPolicy): number {
  return entries.reduce(
    (total, entry) => total + entry.score + entry.riskFlags.length * policy.riskPenalty,
    0
  );
}

/** 0 inside the band, otherwise the distance to the nearest edge. */
export function bandDistance(total: number, band: ScoreBand): number {
  if (total < band.min) {
    return band.min - total;
  }
  if (total > band.max) {
    return total - band.max;
  }
  return 0;
}

export interface ScoredAttempt {
  readonly attempt: number;
  readonly total: number;
  readonly distance: number;
  /** Catalogue declaration indices of the selected entries, in step order. */
  readonly declarationOrder: readonly number[];
}

function compareIndexVectors(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Ordering of attempts from best to worst: closest to the band first, then
 * earlier catalogue declarations, then earlier attempts.
 */
export function compareAttempts(a: ScoredAttempt, b: ScoredAttempt): number {
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  const byDeclaration = compareIndexVectors(a.declarationOrder, b.declarationOrder);
  if (byDeclaration !== 0) {
    return byDeclaration;
  }
  return a.attempt - b.attempt;
}
