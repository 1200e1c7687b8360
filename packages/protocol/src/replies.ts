/**
 * Reply and notice lines. Every line a session receives from the
 * dispatcher is built here, so the wire vocabulary lives in one file.
 *
 * @packageDocumentation
 */

import type { AuthChallenge } from '@soulrelay/auth';
import { formatPrice } from '@soulrelay/marketplace';
import type { ServiceListing, Trade, TradeRole } from '@soulrelay/marketplace';
import { SoulRelayErrorCode } from '@soulrelay/types';

import type { ListingVisibility } from './types';

// ─── Errors ─────────────────────────────────────────────────────────────────────

/** Wire form of every error code. Codes with no wire meaning answer `ERR_INTERNAL`. */
export const WIRE_ERRORS: Record<SoulRelayErrorCode, string> = {
  [SoulRelayErrorCode.UNKNOWN_SOUL]: 'ERR_UNKNOWN_SOUL',
  [SoulRelayErrorCode.IDENTITY_INVALID]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.IDENTITY_KEY_CONFLICT]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.NOT_AUTHENTICATED]: 'ERR_NOT_AUTHENTICATED',
  [SoulRelayErrorCode.AUTH_FAILED]: 'ERR_AUTH_FAILED',
  [SoulRelayErrorCode.CHALLENGE_EXPIRED]: 'ERR_CHALLENGE_EXPIRED',
  [SoulRelayErrorCode.CRYPTO_INVALID_HEX]: 'ERR_INVALID_SIGNATURE',
  [SoulRelayErrorCode.CRYPTO_INVALID_KEY]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.CRYPTO_SIGNATURE_FAILED]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.NO_SIGNING_KEY]: 'ERR_NO_SIGNING_KEY',
  [SoulRelayErrorCode.INVALID_SIGNATURE]: 'ERR_INVALID_SIGNATURE',
  [SoulRelayErrorCode.SIGNATURE_REQUIRED]: 'ERR_SIGNATURE_REQUIRED',
  [SoulRelayErrorCode.REPUTATION_INVALID_EVENT]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.INVALID_PRICE]: 'ERR_INVALID_PRICE',
  [SoulRelayErrorCode.INVALID_CATEGORY]: 'ERR_INVALID_CATEGORY',
  [SoulRelayErrorCode.LISTING_LIMIT]: 'ERR_LISTING_LIMIT',
  [SoulRelayErrorCode.LISTING_NOT_FOUND]: 'ERR_LISTING_NOT_FOUND',
  [SoulRelayErrorCode.LISTING_NOT_OPEN]: 'ERR_LISTING_NOT_OPEN',
  [SoulRelayErrorCode.NOT_OWNER]: 'ERR_NOT_OWNER',
  [SoulRelayErrorCode.TRADE_NOT_FOUND]: 'ERR_TRADE_NOT_FOUND',
  [SoulRelayErrorCode.TRADE_CLOSED]: 'ERR_TRADE_CLOSED',
  [SoulRelayErrorCode.NOT_PARTY]: 'ERR_NOT_PARTY',
  [SoulRelayErrorCode.ALREADY_ACCEPTED]: 'ERR_ALREADY_ACCEPTED',
  [SoulRelayErrorCode.COUNTERPARTY_OFFLINE]: 'ERR_COUNTERPARTY_OFFLINE',
  [SoulRelayErrorCode.SYNTAX_ERROR]: 'ERR_SYNTAX',
  [SoulRelayErrorCode.UNKNOWN_COMMAND]: 'ERR_UNKNOWN_COMMAND',
  [SoulRelayErrorCode.RATE_LIMITED]: 'ERR_RATE_LIMITED',
  [SoulRelayErrorCode.STORE_MISSING_ID]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.STORE_CORRUPTED]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.CONFIG_INVALID]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.NOT_CONNECTED]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.REPLY_TIMEOUT]: 'ERR_INTERNAL',
  [SoulRelayErrorCode.SERVER_REJECTED]: 'ERR_INTERNAL',
};

export const ERR_INTERNAL = 'ERR_INTERNAL';

/** `ERR_<NAME>` optionally followed by the command it concerns. */
export function errorReply(code: SoulRelayErrorCode, subject?: string): string {
  const wire = WIRE_ERRORS[code];
  return subject ? `${wire} ${subject}` : wire;
}

// ─── Replies ────────────────────────────────────────────────────────────────────

export function challengeReply(challenge: AuthChallenge): string {
  return `CHALLENGE ${challenge.id} ${challenge.nonce}`;
}

export function authOkReply(soulId: string, replaced?: string): string {
  return replaced ? `AUTH_OK ${soulId} REPLACED ${replaced}` : `AUTH_OK ${soulId}`;
}

export function signatureReply(signatureHex: string): string {
  return `SIGNATURE ${signatureHex}`;
}

export function listingReply(listing: ServiceListing, visibility: ListingVisibility): string {
  const owner = visibility === 'tagged' ? listing.soulId : 'anonymous';
  return `LISTING ${listing.id} ${listing.kind.toUpperCase()} ${listing.category} ${formatPrice(listing.price)} ${owner}`;
}

export function endListReply(count: number): string {
  return `END LIST ${count}`;
}

export function listedReply(listing: ServiceListing): string {
  return `LISTED ${listing.id}`;
}

export function cancelledReply(listing: ServiceListing): string {
  return `CANCELLED ${listing.id}`;
}

export function acceptedReply(trade: Trade): string {
  return `ACCEPTED ${trade.id} ${trade.status}`;
}

export function scoreReply(soulId: string, score: number): string {
  return `SCORE ${soulId} ${score}`;
}

export function pongReply(token: string): string {
  return token ? `PONG ${token}` : 'PONG';
}

// ─── Notices ────────────────────────────────────────────────────────────────────

/**
 * `TRADE_PROPOSED <trade_id> <role> <category> <price> <counterparty>
 * <deadline> <credit>`, from the point of view of `role`. Carries what a
 * party needs to sign its settlement endorsement.
 */
export function tradeProposedNotice(trade: Trade, role: TradeRole): string {
  const counterparty = role === 'seeker' ? trade.providerId : trade.seekerId;
  return [
    'TRADE_PROPOSED',
    trade.id,
    role,
    trade.category,
    formatPrice(trade.price),
    counterparty,
    trade.deadline,
    String(trade.credit),
  ].join(' ');
}

export function tradeSettledNotice(trade: Trade): string {
  return `TRADE_SETTLED ${trade.id}`;
}

export function tradeAbortedNotice(trade: Trade): string {
  return `TRADE_ABORTED ${trade.id}`;
}

export function listingExpiredNotice(listing: ServiceListing): string {
  return `LISTING_EXPIRED ${listing.id}`;
}
