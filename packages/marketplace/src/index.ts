/**
 * @soulrelay/marketplace — order books, matching and trade settlement.
 *
 * @packageDocumentation
 */

export { Marketplace } from './marketplace';
export {
  DEFAULT_LISTING_TTL_MS,
  DEFAULT_TRADE_DEADLINE_MS,
  DEFAULT_MAX_OPEN_LISTINGS,
  DEFAULT_SETTLEMENT_CREDIT,
} from './marketplace';
export type { MarketplaceOptions, MarketplaceLoadSummary } from './marketplace';

export { OrderBook, isCompatible } from './order-book';
export { priceTime, reputationFirst } from './comparators';
export type { ScoreSource } from './comparators';
export {
  SETTLEMENT_REASON,
  counterpartyRole,
  settlementEndorsement,
  settlementPayload,
  soulForRole,
} from './settlement';
export {
  DEFAULT_MAX_PRICE,
  assertCategory,
  assertPrice,
  formatPrice,
  isValidCategory,
  isValidPrice,
  parsePrice,
} from './validation';
export { decodeListing, decodeTrade, decodeSequence } from './records';

export type {
  Acceptance,
  AcceptResult,
  ListResult,
  ListingCloseReason,
  ListingComparator,
  ListingKind,
  ListingStatus,
  MarketplaceEvents,
  SequenceRecord,
  ServiceListing,
  Trade,
  TradeRole,
  TradeStatus,
} from './types';
