import type { ListingComparator, ServiceListing } from './types';

/** Whether an offer at `offerPrice` satisfies a request at `requestPrice`. */
export function isCompatible(offerPrice: number, requestPrice: number): boolean {
  return offerPrice <= requestPrice;
}

/**
 * OPEN listings of one category. Holds no timers and does no I/O; the
 * marketplace mutates it only while holding the category lock.
 */
export class OrderBook {
  private readonly offers = new Map<string, ServiceListing>();
  private readonly requests = new Map<string, ServiceListing>();

  constructor(readonly category: string) {}

  add(listing: ServiceListing): void {
    this.side(listing.kind).set(listing.id, listing);
  }

  remove(listing: ServiceListing): boolean {
    return this.side(listing.kind).delete(listing.id);
  }

  /**
   * The best resting counterpart for `incoming` under `comparator`:
   * opposite kind, price compatible, owned by another soul.
   */
  bestMatch(incoming: ServiceListing, comparator: ListingComparator): ServiceListing | undefined {
    const resting = incoming.kind === 'offer' ? this.requests : this.offers;
    let best: ServiceListing | undefined;
    for (const candidate of resting.values()) {
      if (candidate.soulId === incoming.soulId) continue;
      const compatible =
        incoming.kind === 'offer'
          ? isCompatible(incoming.price, candidate.price)
          : isCompatible(candidate.price, incoming.price);
      if (!compatible) continue;
      if (!best || comparator(candidate, best) < 0) {
        best = candidate;
      }
    }
    return best;
  }

  /** OPEN listings in arrival order. */
  listings(): ServiceListing[] {
    return [...this.offers.values(), ...this.requests.values()].sort((a, b) => a.sequence - b.sequence);
  }

  get size(): number {
    return this.offers.size + this.requests.size;
  }

  private side(kind: ServiceListing['kind']): Map<string, ServiceListing> {
    return kind === 'offer' ? this.offers : this.requests;
  }
}
