// ============================================================
// Deepsky Chart - Label Placement
// Greedy single-pass selection: the candidate whose centre sits
// in the weakest part of the repulsion field wins, and its
// footprint is committed before the next object is placed.
// ============================================================

import type { LabelCandidate } from '@shared/types';
import type { LabelPotential } from './label-potential';

/**
 * Index of the candidate with the lowest potential at its centre. Ties go
 * to the earliest candidate, so the result only depends on field state and
 * candidate order. Returns -1 for an empty list.
 */
export function selectLabelPosition(
  candidates: readonly LabelCandidate[],
  potential: LabelPotential,
  exclude?: number,
): number {
  let best = -1;
  let bestValue = Infinity;
  candidates.forEach((candidate, index) => {
    const value = potential.potential(candidate.center.x, candidate.center.y, exclude);
    if (value < bestValue) {
      bestValue = value;
      best = index;
    }
  });
  return best;
}

export interface Placement {
  index: number;
  candidate: LabelCandidate;
}

/**
 * Select a candidate and commit a label of `labelLength` mm at its centre.
 * Returns null when there is nothing to place.
 */
export function placeLabel(
  candidates: readonly LabelCandidate[],
  potential: LabelPotential,
  labelLength: number,
  exclude?: number,
): Placement | null {
  const index = selectLabelPosition(candidates, potential, exclude);
  if (index < 0) return null;

  const candidate = candidates[index];
  potential.addPosition(candidate.center.x, candidate.center.y, labelLength);
  return { index, candidate };
}
