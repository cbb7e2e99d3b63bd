import { DomainCandidate } from '../types/domain';

/**
 * Keeps indexed candidates whose page count, when known, reaches `minimumPages`.
 * An unknown count is not held against a candidate.
 */
export function filterValuable(
  candidates: readonly DomainCandidate[],
  minimumPages: number,
): DomainCandidate[] {
  return candidates.filter(
    (candidate) =>
      candidate.indexed === 'present' &&
      (candidate.estimatedPages === null || candidate.estimatedPages >= minimumPages),
  );
}
