import { isPlainObject } from '@soulrelay/types';

import type {
  Acceptance,
  ListingKind,
  ListingStatus,
  SequenceRecord,
  ServiceListing,
  Trade,
  TradeRole,
  TradeStatus,
} from './types';

const LISTING_KINDS: readonly ListingKind[] = ['offer', 'request'];
const LISTING_STATUSES: readonly ListingStatus[] = ['OPEN', 'MATCHED', 'SETTLED', 'CANCELLED', 'EXPIRED'];
const TRADE_STATUSES: readonly TradeStatus[] = [
  'PROPOSED',
  'ACCEPTED_BY_SEEKER',
  'ACCEPTED_BY_PROVIDER',
  'SETTLED',
  'ABORTED',
];

function oneOf<T extends string>(values: readonly T[], value: unknown): T | undefined {
  return values.find((v) => v === value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function decodeListing(value: unknown): ServiceListing | undefined {
  if (!isPlainObject(value)) return undefined;
  const kind = oneOf(LISTING_KINDS, value.kind);
  const status = oneOf(LISTING_STATUSES, value.status);
  const { id, category, price, soulId, sessionId, sequence, createdAt, expiresAt, tradeId, closedAt } = value;
  if (
    !kind ||
    !status ||
    !isString(id) ||
    !isString(category) ||
    !isNumber(price) ||
    !isString(soulId) ||
    !isString(sessionId) ||
    !isNumber(sequence) ||
    !isString(createdAt) ||
    !isString(expiresAt) ||
    (tradeId !== undefined && !isString(tradeId)) ||
    (closedAt !== undefined && !isString(closedAt))
  ) {
    return undefined;
  }
  return {
    id,
    kind,
    category,
    price,
    soulId,
    sessionId,
    sequence,
    status,
    createdAt,
    expiresAt,
    ...(tradeId !== undefined ? { tradeId } : {}),
    ...(closedAt !== undefined ? { closedAt } : {}),
  };
}

function decodeAcceptance(value: unknown): Acceptance | undefined {
  if (!isPlainObject(value) || !isString(value.signature) || !isString(value.acceptedAt)) {
    return undefined;
  }
  return { signature: value.signature, acceptedAt: value.acceptedAt };
}

export function decodeTrade(value: unknown): Trade | undefined {
  if (!isPlainObject(value) || !isPlainObject(value.acceptances)) return undefined;
  const status = oneOf(TRADE_STATUSES, value.status);
  const { id, offerId, requestId, category, price, providerId, seekerId, createdAt, deadline, credit } = value;
  if (
    !status ||
    !isString(id) ||
    !isString(offerId) ||
    !isString(requestId) ||
    !isString(category) ||
    !isNumber(price) ||
    !isString(providerId) ||
    !isString(seekerId) ||
    !isString(createdAt) ||
    !isString(deadline) ||
    !isNumber(credit)
  ) {
    return undefined;
  }
  const acceptances: Partial<Record<TradeRole, Acceptance>> = {};
  for (const role of ['seeker', 'provider'] as const) {
    const raw = value.acceptances[role];
    if (raw === undefined) continue;
    const acceptance = decodeAcceptance(raw);
    if (!acceptance) return undefined;
    acceptances[role] = acceptance;
  }
  return {
    id,
    offerId,
    requestId,
    category,
    price,
    providerId,
    seekerId,
    status,
    createdAt,
    deadline,
    credit,
    acceptances,
  };
}

export function decodeSequence(value: unknown): SequenceRecord | undefined {
  if (!isPlainObject(value) || !isString(value.id) || !isNumber(value.value)) {
    return undefined;
  }
  return { id: value.id, value: value.value };
}
