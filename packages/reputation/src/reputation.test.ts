import { describe, it, expect, beforeEach } from 'vitest';
import { generateKeyPair } from '@soulrelay/crypto';
import type { KeyPair } from '@soulrelay/crypto';
import { IdentityRegistry } from '@soulrelay/identity';
import { SignatureService } from '@soulrelay/signing';
import { MemoryStore } from '@soulrelay/store';
import { LogLevel, Logger } from '@soulrelay/types';
import type { LogEntry } from '@soulrelay/types';

import {
  ReputationLedger,
  createReputationEvent,
  decodeLedgerRecord,
  endorsementPayload,
} from './index';
import type { LedgerRecord, ReputationEvent } from './index';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let registry: IdentityRegistry;
let signatures: SignatureService;
let online: Set<string>;
let alice: KeyPair;
let bob: KeyPair;

function makeLedger(store?: MemoryStore<LedgerRecord>, logger?: Logger): ReputationLedger {
  return new ReputationLedger({
    registry,
    signatures,
    isAuthenticated: (soulId) => online.has(soulId),
    store,
    logger,
  });
}

function endorse(id: string, delta = 1, keyPair: KeyPair = alice): Promise<ReputationEvent> {
  const endorser = keyPair === alice ? 'alice' : 'bob';
  const subject = keyPair === alice ? 'bob' : 'alice';
  return createReputationEvent({ id, subject, endorser, delta, reason: 'helpful' }, keyPair.privateKey);
}

beforeEach(async () => {
  registry = new IdentityRegistry();
  signatures = new SignatureService(registry);
  alice = await generateKeyPair();
  bob = await generateKeyPair();
  await registry.register({ id: 'alice', publicKey: alice.publicKeyHex });
  await registry.register({ id: 'bob', publicKey: bob.publicKeyHex });
  online = new Set(['alice', 'bob']);
});

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------
describe('endorsementPayload', () => {
  it('is canonical JSON of the signed fields', () => {
    expect(
      endorsementPayload({ subject: 'bob', reason: 'r', id: 'e1', endorser: 'alice', delta: -2 }),
    ).toBe('{"delta":-2,"endorser":"alice","id":"e1","reason":"r","subject":"bob"}');
  });
});

// ---------------------------------------------------------------------------
// submit
// ---------------------------------------------------------------------------
describe('ReputationLedger.submit', () => {
  it('accepts a signed event and updates the subject score', async () => {
    const ledger = makeLedger();
    expect(await ledger.submit(await endorse('e1', 3))).toEqual({ status: 'ACCEPTED', score: 3 });
    expect(ledger.scoreOf('bob')).toBe(3);
    expect(ledger.scoreOf('alice')).toBe(0);
  });

  it('applies a replayed event id exactly once', async () => {
    const ledger = makeLedger();
    const event = await endorse('e1', 5);
    await ledger.submit(event);
    expect(await ledger.submit(event)).toEqual({ status: 'DUPLICATE' });
    expect(await ledger.submit({ ...event, delta: 50, signature: '00' })).toEqual({ status: 'DUPLICATE' });
    expect(ledger.scoreOf('bob')).toBe(5);
    expect(ledger.score('bob')).toEqual({ soulId: 'bob', score: 5, events: 1 });
  });

  it('admits concurrent submissions of the same id once', async () => {
    const ledger = makeLedger();
    const event = await endorse('e1', 2);
    const results = await Promise.all([ledger.submit(event), ledger.submit(event), ledger.submit(event)]);
    expect(results.map((r) => r.status).sort()).toEqual(['ACCEPTED', 'DUPLICATE', 'DUPLICATE']);
    expect(ledger.scoreOf('bob')).toBe(2);
  });

  it('sums positive and negative deltas', async () => {
    const ledger = makeLedger();
    await ledger.submit(await endorse('e1', 4));
    await ledger.submit(await endorse('e2', -1));
    await ledger.submit(await endorse('e3', 2, bob));
    expect(ledger.scoreOf('bob')).toBe(3);
    expect(ledger.scoreOf('alice')).toBe(2);
    expect(ledger.eventCount).toBe(3);
  });

  it('rejects a bad signature', async () => {
    const ledger = makeLedger();
    const event = await endorse('e1', 1);
    const forged = { ...event, delta: 100 };
    expect(await ledger.submit(forged)).toEqual({ status: 'REJECTED', reason: 'INVALID_SIGNATURE' });
    expect(ledger.hasEvent('e1')).toBe(false);
    expect(await ledger.submit(event)).toEqual({ status: 'ACCEPTED', score: 1 });
  });

  it('rejects an endorser that is not authenticated', async () => {
    online.delete('alice');
    const ledger = makeLedger();
    expect(await ledger.submit(await endorse('e1'))).toEqual({
      status: 'REJECTED',
      reason: 'ENDORSER_NOT_AUTHENTICATED',
    });
  });

  it('rejects unknown endorsers and subjects', async () => {
    const ledger = makeLedger();
    const stranger = await generateKeyPair();
    const fromStranger = await createReputationEvent(
      { id: 'e1', subject: 'bob', endorser: 'stranger', delta: 1, reason: 'r' },
      stranger.privateKey,
    );
    expect(await ledger.submit(fromStranger)).toEqual({ status: 'REJECTED', reason: 'UNKNOWN_ENDORSER' });

    const toGhost = await createReputationEvent(
      { id: 'e2', subject: 'ghost', endorser: 'alice', delta: 1, reason: 'r' },
      alice.privateKey,
    );
    expect(await ledger.submit(toGhost)).toEqual({ status: 'REJECTED', reason: 'UNKNOWN_SUBJECT' });
  });

  it('rejects self-endorsement', async () => {
    const ledger = makeLedger();
    const event = await createReputationEvent(
      { id: 'e1', subject: 'alice', endorser: 'alice', delta: 10, reason: 'r' },
      alice.privateKey,
    );
    expect(await ledger.submit(event)).toEqual({ status: 'REJECTED', reason: 'SELF_ENDORSEMENT' });
  });

  it.each([1.5, Number.NaN, Number.MAX_SAFE_INTEGER + 2])('rejects non-integer delta %s', async (delta) => {
    const ledger = makeLedger();
    expect(await ledger.submit(await endorse('e1', delta))).toEqual({
      status: 'REJECTED',
      reason: 'INVALID_DELTA',
    });
  });

  it('rejects malformed ids and reasons', async () => {
    const ledger = makeLedger();
    const event = await endorse('e1');
    expect(await ledger.submit({ ...event, id: 'has space' })).toEqual({ status: 'REJECTED', reason: 'MALFORMED' });
    expect(await ledger.submit({ ...event, reason: '' })).toEqual({ status: 'REJECTED', reason: 'MALFORMED' });
  });

  it('logs rejections without the signature', async () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: LogLevel.WARN, output: (e) => entries.push(e) });
    online.clear();
    const ledger = makeLedger(undefined, logger);
    await ledger.submit(await endorse('e1'));
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      component: 'reputation',
      message: 'reputation event rejected',
      eventId: 'e1',
      reason: 'ENDORSER_NOT_AUTHENTICATED',
    });
    expect(entries[0]?.signature).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// submitAll
// ---------------------------------------------------------------------------
describe('ReputationLedger.submitAll', () => {
  it('admits every event of the batch', async () => {
    const ledger = makeLedger();
    const result = await ledger.submitAll([await endorse('t:1', 1, alice), await endorse('t:2', 1, bob)]);

    expect(result).toEqual({
      status: 'ACCEPTED',
      results: [
        { status: 'ACCEPTED', score: 1 },
        { status: 'ACCEPTED', score: 1 },
      ],
    });
    expect(ledger.scoreOf('alice')).toBe(1);
    expect(ledger.scoreOf('bob')).toBe(1);
  });

  it('admits nothing when one endorser is not authenticated', async () => {
    const ledger = makeLedger();
    online.delete('bob');

    const result = await ledger.submitAll([await endorse('t:1', 1, alice), await endorse('t:2', 1, bob)]);

    expect(result).toEqual({ status: 'REJECTED', eventId: 't:2', reason: 'ENDORSER_NOT_AUTHENTICATED' });
    expect(ledger.eventCount).toBe(0);
  });

  it('admits nothing when one signature is forged', async () => {
    const ledger = makeLedger();
    const forged = { ...(await endorse('t:2', 1, bob)), delta: 5 };

    const result = await ledger.submitAll([await endorse('t:1', 1, alice), forged]);

    expect(result).toEqual({ status: 'REJECTED', eventId: 't:2', reason: 'INVALID_SIGNATURE' });
    expect(ledger.scoreOf('bob')).toBe(0);
    expect(ledger.eventCount).toBe(0);
  });

  it('checks authentication when called, not after the subject locks are free', async () => {
    const ledger = makeLedger();
    const events = [await endorse('t:1', 1, alice), await endorse('t:2', 1, bob)];

    const pending = ledger.submitAll(events);
    online.clear();

    await expect(pending).resolves.toMatchObject({ status: 'ACCEPTED' });
    expect(ledger.eventCount).toBe(2);
  });

  it('reports events already in the ledger as duplicates', async () => {
    const ledger = makeLedger();
    const first = await endorse('t:1', 1, alice);
    await ledger.submit(first);
    online.delete('alice');

    const result = await ledger.submitAll([first, await endorse('t:2', 1, bob)]);

    expect(result).toEqual({
      status: 'ACCEPTED',
      results: [{ status: 'DUPLICATE' }, { status: 'ACCEPTED', score: 1 }],
    });
    expect(ledger.scoreOf('bob')).toBe(1);
  });

  it('leaves nothing admitted when the store write fails', async () => {
    const store = new MemoryStore<LedgerRecord>();
    store.putBatch = async () => {
      throw new Error('disk full');
    };
    const ledger = makeLedger(store);
    const events = [await endorse('t:1', 1, alice), await endorse('t:2', 1, bob)];

    await expect(ledger.submitAll(events)).rejects.toThrow('disk full');
    expect(ledger.hasEvent('t:1')).toBe(false);
    expect(ledger.scoreOf('bob')).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// History and persistence
// ---------------------------------------------------------------------------
describe('ReputationLedger history and persistence', () => {
  it('returns accepted events in admission order', async () => {
    const ledger = makeLedger();
    await ledger.submit(await endorse('e2', 1));
    await ledger.submit(await endorse('e1', 2));
    expect(ledger.history('bob').map((e) => e.id)).toEqual(['e2', 'e1']);
    expect(ledger.history('nobody')).toEqual([]);
  });

  it('rebuilds scores from the store', async () => {
    const store = new MemoryStore<LedgerRecord>();
    const first = makeLedger(store);
    await first.submit(await endorse('e1', 2));
    await first.submit(await endorse('e2', 3, bob));

    online.clear();
    const second = makeLedger(store);
    expect(await second.load()).toBe(2);
    expect(second.scoreOf('bob')).toBe(2);
    expect(second.scoreOf('alice')).toBe(3);
    expect(await second.submit(await endorse('e1', 2))).toEqual({ status: 'DUPLICATE' });
  });

  it('decodes ledger records', () => {
    const record = {
      id: 'e1',
      subject: 'bob',
      endorser: 'alice',
      delta: 1,
      reason: 'r',
      signature: 'ab',
      acceptedAt: '2026-01-01T00:00:00.000Z',
    };
    expect(decodeLedgerRecord(record)).toEqual(record);
    expect(decodeLedgerRecord({ ...record, delta: 0.5 })).toBeUndefined();
    expect(decodeLedgerRecord(null)).toBeUndefined();
  });
});
