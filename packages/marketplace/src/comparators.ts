import type { ListingComparator, ServiceListing } from './types';

/**
 * Price-time priority: the lowest price first (the best price for the
 * seeker, whether the resting side is requests or offers), then the
 * earliest sequence number.
 */
export const priceTime: ListingComparator = (a: ServiceListing, b: ServiceListing): number => {
  if (a.price !== b.price) {
    return a.price - b.price;
  }
  return a.sequence - b.sequence;
};

/** Anything that can report a soul's reputation score. */
export interface ScoreSource {
  scoreOf(soulId: string): number;
}

/**
 * Reputation-first priority: the owner with the highest score first, then
 * {@link priceTime}.
 */
export function reputationFirst(scores: ScoreSource): ListingComparator {
  return (a, b) => {
    const diff = scores.scoreOf(b.soulId) - scores.scoreOf(a.soulId);
    return diff !== 0 ? diff : priceTime(a, b);
  };
}
