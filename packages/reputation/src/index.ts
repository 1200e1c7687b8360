/**
 * @soulrelay/reputation — the append-only reputation ledger.
 *
 * Scores are the sum of the deltas of every accepted event for a soul,
 * maintained incrementally. Event ids are deduplicated before signature
 * verification, so a replayed event costs a set lookup.
 *
 * @packageDocumentation
 */

import { canonicalizeJson, signString, timestamp, toHex } from '@soulrelay/crypto';
import type { IdentityRegistry } from '@soulrelay/identity';
import type { SignatureService } from '@soulrelay/signing';
import { KeyedMutex, MemoryStore } from '@soulrelay/store';
import type { RecordStore } from '@soulrelay/store';
import { isPlainObject, isToken, silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

export type {
  BatchSubmitResult,
  ReputationEvent,
  LedgerRecord,
  ReputationScore,
  RejectReason,
  SubmitResult,
} from './types';

import type {
  BatchSubmitResult,
  LedgerRecord,
  RejectReason,
  ReputationEvent,
  ReputationScore,
  SubmitResult,
} from './types';

// ---------------------------------------------------------------------------
// Event construction
// ---------------------------------------------------------------------------

/** The fields of an event that its signature covers. */
export type UnsignedReputationEvent = Omit<ReputationEvent, 'signature'>;

/**
 * The exact string an endorser signs: canonical JSON of
 * `{ delta, endorser, id, reason, subject }`.
 */
export function endorsementPayload(event: UnsignedReputationEvent): string {
  return canonicalizeJson({
    delta: event.delta,
    endorser: event.endorser,
    id: event.id,
    reason: event.reason,
    subject: event.subject,
  });
}

/** Sign an event with the endorser's private key. */
export async function createReputationEvent(
  fields: UnsignedReputationEvent,
  privateKey: Uint8Array,
): Promise<ReputationEvent> {
  const signature = toHex(await signString(endorsementPayload(fields), privateKey));
  return { ...fields, signature };
}

/** Validate a persisted ledger record. */
export function decodeLedgerRecord(value: unknown): LedgerRecord | undefined {
  if (!isPlainObject(value)) return undefined;
  const { id, subject, endorser, delta, reason, signature, acceptedAt } = value;
  if (
    typeof id !== 'string' ||
    typeof subject !== 'string' ||
    typeof endorser !== 'string' ||
    typeof delta !== 'number' ||
    !Number.isSafeInteger(delta) ||
    typeof reason !== 'string' ||
    typeof signature !== 'string' ||
    typeof acceptedAt !== 'string'
  ) {
    return undefined;
  }
  return { id, subject, endorser, delta, reason, signature, acceptedAt };
}

// ---------------------------------------------------------------------------
// ReputationLedger
// ---------------------------------------------------------------------------

export interface ReputationLedgerOptions {
  registry: IdentityRegistry;
  signatures: SignatureService;
  /** Whether the soul currently has a live authenticated session. */
  isAuthenticated: (soulId: string) => boolean;
  store?: RecordStore<LedgerRecord>;
  logger?: Logger;
}

export class ReputationLedger {
  private readonly registry: IdentityRegistry;
  private readonly signatures: SignatureService;
  private readonly isAuthenticated: (soulId: string) => boolean;
  private readonly store: RecordStore<LedgerRecord>;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex();

  private readonly accepted = new Set<string>();
  private readonly scores = new Map<string, ReputationScore>();
  private readonly histories = new Map<string, ReputationEvent[]>();

  constructor(options: ReputationLedgerOptions) {
    this.registry = options.registry;
    this.signatures = options.signatures;
    this.isAuthenticated = options.isAuthenticated;
    this.store = options.store ?? new MemoryStore<LedgerRecord>();
    this.logger = (options.logger ?? silentLogger).child('reputation');
  }

  /**
   * Rebuild scores from the persisted event log. Returns the number of
   * events replayed.
   */
  async load(): Promise<number> {
    const records = await this.store.list();
    for (const record of records) {
      if (!this.accepted.has(record.id)) {
        this.apply(record);
      }
    }
    this.logger.info('reputation ledger loaded', { events: records.length, souls: this.scores.size });
    return records.length;
  }

  /**
   * Admit an event. Admission for one subject is serialized; different
   * subjects proceed independently.
   */
  async submit(event: ReputationEvent): Promise<SubmitResult> {
    if (!isToken(event.id, 256) || !isToken(event.reason, 64) || typeof event.signature !== 'string') {
      return this.reject(event, 'MALFORMED');
    }
    if (this.accepted.has(event.id)) {
      return { status: 'DUPLICATE' };
    }

    return this.locks.run(event.subject, async () => {
      const precheck = this.precheck(event);
      if (precheck) {
        return this.reject(event, precheck);
      }
      if (this.accepted.has(event.id)) {
        return { status: 'DUPLICATE' };
      }

      const valid = await this.signatures.verify(event.endorser, endorsementPayload(event), event.signature);
      if (!valid) {
        return this.reject(event, 'INVALID_SIGNATURE');
      }
      // A same-id event for another subject may have landed during verification.
      if (this.accepted.has(event.id)) {
        return { status: 'DUPLICATE' };
      }

      const record: LedgerRecord = {
        id: event.id,
        subject: event.subject,
        endorser: event.endorser,
        delta: event.delta,
        reason: event.reason,
        signature: event.signature,
        acceptedAt: timestamp(),
      };
      this.accepted.add(record.id);
      try {
        await this.store.put(record);
      } catch (err) {
        this.accepted.delete(record.id);
        throw err;
      }
      const score = this.apply(record);
      this.logger.info('reputation event accepted', {
        eventId: record.id,
        subject: record.subject,
        endorser: record.endorser,
        delta: record.delta,
        score,
      });
      return { status: 'ACCEPTED', score };
    });
  }

  /**
   * Admit several events together or none of them. Admission checks,
   * including the endorsers' authentication, are made at the call, before
   * the first await; events already in the ledger count as DUPLICATE.
   * Subject locks are taken in sorted order.
   */
  async submitAll(events: readonly ReputationEvent[]): Promise<BatchSubmitResult> {
    for (const event of events) {
      if (!isToken(event.id, 256) || !isToken(event.reason, 64) || typeof event.signature !== 'string') {
        return this.rejectBatch(event, 'MALFORMED');
      }
      if (this.accepted.has(event.id)) continue;
      const precheck = this.precheck(event);
      if (precheck) {
        return this.rejectBatch(event, precheck);
      }
    }

    const subjects = [...new Set(events.map((event) => event.subject))].sort();
    const locked = subjects.reduceRight<() => Promise<BatchSubmitResult>>(
      (inner, subject) => () => this.locks.run(subject, inner),
      () => this.commitAll(events),
    );
    return locked();
  }

  /** Current score; 0 for souls with no accepted events. O(1). */
  scoreOf(soulId: string): number {
    return this.scores.get(soulId)?.score ?? 0;
  }

  score(soulId: string): ReputationScore {
    const score = this.scores.get(soulId);
    return score ? { ...score } : { soulId, score: 0, events: 0 };
  }

  /** Accepted events for `soulId` in admission order. */
  history(soulId: string): ReputationEvent[] {
    return [...(this.histories.get(soulId) ?? [])];
  }

  /** `true` when an event with this id has been accepted. */
  hasEvent(id: string): boolean {
    return this.accepted.has(id);
  }

  get eventCount(): number {
    return this.accepted.size;
  }

  private precheck(event: ReputationEvent): RejectReason | undefined {
    if (typeof event.delta !== 'number' || !Number.isSafeInteger(event.delta)) {
      return 'INVALID_DELTA';
    }
    if (event.endorser === event.subject) {
      return 'SELF_ENDORSEMENT';
    }
    if (!this.registry.has(event.endorser)) {
      return 'UNKNOWN_ENDORSER';
    }
    if (!this.registry.has(event.subject)) {
      return 'UNKNOWN_SUBJECT';
    }
    if (!this.isAuthenticated(event.endorser)) {
      return 'ENDORSER_NOT_AUTHENTICATED';
    }
    return undefined;
  }

  private reject(event: ReputationEvent, reason: RejectReason): SubmitResult {
    this.logger.warn('reputation event rejected', {
      eventId: event.id,
      subject: event.subject,
      endorser: event.endorser,
      reason,
    });
    return { status: 'REJECTED', reason };
  }

  private rejectBatch(event: ReputationEvent, reason: RejectReason): BatchSubmitResult {
    this.reject(event, reason);
    return { status: 'REJECTED', eventId: event.id, reason };
  }

  private async commitAll(events: readonly ReputationEvent[]): Promise<BatchSubmitResult> {
    const fresh = new Map<string, ReputationEvent>();
    for (const event of events) {
      if (!this.accepted.has(event.id) && !fresh.has(event.id)) fresh.set(event.id, event);
    }

    const pending = [...fresh.values()];
    const verdicts = await Promise.all(
      pending.map((event) => this.signatures.verify(event.endorser, endorsementPayload(event), event.signature)),
    );
    const forged = pending.find((_event, index) => !verdicts[index]);
    if (forged) {
      return this.rejectBatch(forged, 'INVALID_SIGNATURE');
    }

    const acceptedAt = timestamp();
    const records: LedgerRecord[] = pending
      .filter((event) => !this.accepted.has(event.id))
      .map((event) => ({
        id: event.id,
        subject: event.subject,
        endorser: event.endorser,
        delta: event.delta,
        reason: event.reason,
        signature: event.signature,
        acceptedAt,
      }));
    for (const record of records) this.accepted.add(record.id);
    try {
      await this.store.putBatch(records);
    } catch (err) {
      for (const record of records) this.accepted.delete(record.id);
      throw err;
    }

    const scores = new Map<string, number>();
    for (const record of records) {
      scores.set(record.id, this.apply(record));
    }
    this.logger.info('reputation batch accepted', { events: records.length, ids: records.map((r) => r.id) });

    return {
      status: 'ACCEPTED',
      results: events.map((event) => {
        const score = scores.get(event.id);
        // Repeated ids within the batch are credited once.
        if (score !== undefined && scores.delete(event.id)) return { status: 'ACCEPTED' as const, score };
        return { status: 'DUPLICATE' as const };
      }),
    };
  }

  private apply(record: LedgerRecord): number {
    this.accepted.add(record.id);

    const current = this.scores.get(record.subject) ?? { soulId: record.subject, score: 0, events: 0 };
    current.score += record.delta;
    current.events += 1;
    this.scores.set(record.subject, current);

    const { acceptedAt: _acceptedAt, ...event } = record;
    let history = this.histories.get(record.subject);
    if (!history) {
      history = [];
      this.histories.set(record.subject, history);
    }
    history.push(event);
    return current.score;
  }
}
