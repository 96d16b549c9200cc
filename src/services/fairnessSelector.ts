/**
 * Fairness selector
 *
 * Picks the eligible tutor with the fewest confirmed bookings inside the
 * configured trailing window; ties go to the lexicographically smallest id.
 */

import { TutorId } from '../types';
import { NoEligibleTutorError } from '../utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FairnessPolicy {
  /** Trailing window in days; null counts all-time bookings */
  windowDays: number | null;
}

export interface BookingCounter {
  countConfirmed(tutorIds: TutorId[], since: Date | null, asOf: Date): Map<TutorId, number>;
}

export interface RankedTutor {
  tutorId: TutorId;
  count: number;
}

function compareIds(a: TutorId, b: TutorId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order candidates by (count, tutorId) ascending
 */
export function rankTutors(counts: Map<TutorId, number>): RankedTutor[] {
  return [...counts.entries()]
    .map(([tutorId, count]) => ({ tutorId, count }))
    .sort((a, b) => a.count - b.count || compareIds(a.tutorId, b.tutorId));
}

export function windowStart(policy: FairnessPolicy, asOf: Date): Date | null {
  return policy.windowDays === null ? null : new Date(asOf.getTime() - policy.windowDays * DAY_MS);
}

export class FairnessSelector {
  constructor(
    private readonly counter: BookingCounter,
    private readonly policy: FairnessPolicy
  ) {}

  rank(eligible: Iterable<TutorId>, asOf: Date): RankedTutor[] {
    const candidates = [...new Set(eligible)];
    if (candidates.length === 0) {
      throw new NoEligibleTutorError();
    }
    const counts = this.counter.countConfirmed(candidates, windowStart(this.policy, asOf), asOf);
    return rankTutors(counts);
  }

  select(eligible: Iterable<TutorId>, asOf: Date): TutorId {
    return this.rank(eligible, asOf)[0].tutorId;
  }
}
