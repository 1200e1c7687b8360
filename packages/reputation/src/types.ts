/**
 * A signed endorsement adjusting one soul's score. The id is chosen by the
 * caller and is the deduplication key: an id is admitted at most once.
 */
export interface ReputationEvent {
  id: string;
  /** Soul whose score changes. */
  subject: string;
  /** Soul that signed the event. */
  endorser: string;
  /** Signed integer added to the subject's score. */
  delta: number;
  /** Short reason code, e.g. `trade_settled`. */
  reason: string;
  /** Endorser's hex signature over {@link endorsementPayload}. */
  signature: string;
}

/** An admitted event as persisted in the ledger store. */
export interface LedgerRecord extends ReputationEvent {
  /** ISO 8601 admission time. */
  acceptedAt: string;
}

export interface ReputationScore {
  soulId: string;
  score: number;
  /** Number of accepted events for the soul. */
  events: number;
}

export type RejectReason =
  | 'MALFORMED'
  | 'INVALID_DELTA'
  | 'SELF_ENDORSEMENT'
  | 'UNKNOWN_ENDORSER'
  | 'UNKNOWN_SUBJECT'
  | 'ENDORSER_NOT_AUTHENTICATED'
  | 'INVALID_SIGNATURE';

export type SubmitResult =
  | { status: 'ACCEPTED'; score: number }
  | { status: 'DUPLICATE' }
  | { status: 'REJECTED'; reason: RejectReason };

/**
 * Outcome of an all-or-nothing batch. On acceptance `results` holds one
 * ACCEPTED or DUPLICATE entry per event, in input order.
 */
export type BatchSubmitResult =
  | { status: 'ACCEPTED'; results: Array<Exclude<SubmitResult, { status: 'REJECTED' }>> }
  | { status: 'REJECTED'; eventId: string; reason: RejectReason };
