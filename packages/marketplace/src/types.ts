// ─── Listings ───────────────────────────────────────────────────────────────────

export type ListingKind = 'offer' | 'request';

/**
 * OPEN → MATCHED → SETTLED, or OPEN → CANCELLED | EXPIRED. A MATCHED
 * listing whose trade aborts ends CANCELLED; it never returns to OPEN.
 */
export type ListingStatus = 'OPEN' | 'MATCHED' | 'SETTLED' | 'CANCELLED' | 'EXPIRED';

export interface ServiceListing {
  id: string;
  kind: ListingKind;
  category: string;
  price: number;
  /** Owning soul. */
  soulId: string;
  /** Session that created the listing; its disconnect cancels the listing. */
  sessionId: string;
  /** Arrival order within the category, strictly increasing. */
  sequence: number;
  status: ListingStatus;
  /** ISO 8601 */
  createdAt: string;
  /** ISO 8601; an OPEN listing expires at this time. */
  expiresAt: string;
  tradeId?: string;
  /** ISO 8601 time the listing left OPEN. */
  closedAt?: string;
}

/**
 * Orders resting candidates for a new listing: negative when `a` should
 * be matched before `b`.
 */
export type ListingComparator = (a: ServiceListing, b: ServiceListing) => number;

// ─── Trades ─────────────────────────────────────────────────────────────────────

export type TradeRole = 'seeker' | 'provider';

export type TradeStatus =
  | 'PROPOSED'
  | 'ACCEPTED_BY_SEEKER'
  | 'ACCEPTED_BY_PROVIDER'
  | 'SETTLED'
  | 'ABORTED';

export interface Acceptance {
  /** Party's signature over its settlement endorsement. */
  signature: string;
  /** ISO 8601 */
  acceptedAt: string;
}

export interface Trade {
  id: string;
  offerId: string;
  requestId: string;
  category: string;
  /** The resting listing's price. */
  price: number;
  /** Owner of the offer. */
  providerId: string;
  /** Owner of the request. */
  seekerId: string;
  status: TradeStatus;
  /** ISO 8601 */
  createdAt: string;
  /** ISO 8601; a trade not settled by then aborts. */
  deadline: string;
  /** Reputation credit each party grants the other on settlement. */
  credit: number;
  acceptances: Partial<Record<TradeRole, Acceptance>>;
}

// ─── Events ─────────────────────────────────────────────────────────────────────

export type ListingCloseReason = 'cancelled' | 'expired' | 'released' | 'aborted' | 'settled';

export interface MarketplaceEvents {
  'listing:created': { listing: ServiceListing };
  'listing:closed': { listing: ServiceListing; reason: ListingCloseReason };
  'trade:proposed': { trade: Trade; offer: ServiceListing; request: ServiceListing };
  'trade:accepted': { trade: Trade; role: TradeRole };
  'trade:settled': { trade: Trade };
  'trade:aborted': { trade: Trade };
}

// ─── Results ────────────────────────────────────────────────────────────────────

export interface ListResult {
  listing: ServiceListing;
  /** Present when the new listing matched immediately. */
  trade?: Trade;
}

export interface AcceptResult {
  trade: Trade;
  role: TradeRole;
}

/** Persisted per-category sequence counter. */
export interface SequenceRecord {
  id: string;
  value: number;
}
