import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { generateKeyPair, signString, toHex } from '@soulrelay/crypto';
import type { KeyPair } from '@soulrelay/crypto';
import { IdentityRegistry } from '@soulrelay/identity';
import { SignatureService } from '@soulrelay/signing';
import { SoulRelayErrorCode } from '@soulrelay/types';

import { SoulAuthenticator, authSigningString } from './index';
import type { AuthChallenge, Session } from './index';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let registry: IdentityRegistry;
let auth: SoulAuthenticator;
let alice: KeyPair;
let bob: KeyPair;

function makeSession(id: string): Session {
  return { id, nick: `nick-${id}`, connectedAt: '2026-01-01T00:00:00.000Z' };
}

async function prove(challenge: AuthChallenge, keyPair: KeyPair): Promise<string> {
  return toHex(await signString(authSigningString(challenge.soulId, challenge.nonce), keyPair.privateKey));
}

beforeEach(async () => {
  registry = new IdentityRegistry();
  alice = await generateKeyPair();
  bob = await generateKeyPair();
  await registry.register({ id: 'alice', publicKey: alice.publicKeyHex, paradigm: 'stoic' });
  await registry.register({ id: 'bob', publicKey: bob.publicKeyHex });
  auth = new SoulAuthenticator({ registry, signatures: new SignatureService(registry), challengeTtlMs: 1_000 });
});

afterEach(() => {
  auth.shutdown();
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// beginAuth
// ---------------------------------------------------------------------------
describe('beginAuth', () => {
  it('issues a challenge with a 32-byte nonce and an expiry', () => {
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    expect(challenge.sessionId).toBe('s1');
    expect(challenge.soulId).toBe('alice');
    expect(challenge.nonce).toMatch(/^[0-9a-f]{64}$/);
    expect(challenge.expiresAt - challenge.issuedAt).toBe(1_000);
    expect(auth.pendingChallenge('s1')).toEqual(challenge);
  });

  it('throws UNKNOWN_SOUL for an unregistered soul', () => {
    expect(() => auth.beginAuth(makeSession('s1'), 'ghost')).toThrowError(/not registered/);
    expect(auth.pendingCount).toBe(0);
  });

  it('replaces an outstanding challenge', async () => {
    const session = makeSession('s1');
    const first = auth.beginAuth(session, 'alice');
    const second = auth.beginAuth(session, 'alice');
    expect(auth.pendingCount).toBe(1);
    expect(await auth.respond(session, first.id, await prove(first, alice))).toEqual({
      status: 'CHALLENGE_EXPIRED',
    });
    expect((await auth.respond(session, second.id, await prove(second, alice))).status).toBe('AUTHENTICATED');
  });
});

// ---------------------------------------------------------------------------
// respond
// ---------------------------------------------------------------------------
describe('respond', () => {
  it('authenticates exactly once per challenge', async () => {
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    const proof = await prove(challenge, alice);

    const result = await auth.respond(session, challenge.id, proof);
    expect(result.status).toBe('AUTHENTICATED');
    expect(session.soul?.id).toBe('alice');
    expect(auth.isAuthenticated('alice')).toBe(true);
    expect(auth.sessionsOf('alice')).toEqual([session]);

    expect(await auth.respond(session, challenge.id, proof)).toEqual({ status: 'CHALLENGE_EXPIRED' });
    expect(session.soul?.id).toBe('alice');
  });

  it('fails with a proof from the wrong key and discards the challenge', async () => {
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    expect(await auth.respond(session, challenge.id, await prove(challenge, bob))).toEqual({
      status: 'AUTH_FAILED',
    });
    expect(session.soul).toBeUndefined();
    expect(auth.pendingChallenge('s1')).toBeUndefined();
    expect(await auth.respond(session, challenge.id, await prove(challenge, alice))).toEqual({
      status: 'CHALLENGE_EXPIRED',
    });
  });

  it('fails on malformed proofs without throwing', async () => {
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    expect((await auth.respond(session, challenge.id, 'zz')).status).toBe('AUTH_FAILED');
  });

  it('does not accept a proof signed for another soul id', async () => {
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    const proof = toHex(await signString(authSigningString('bob', challenge.nonce), alice.privateKey));
    expect((await auth.respond(session, challenge.id, proof)).status).toBe('AUTH_FAILED');
  });

  it('does not let one session answer another session’s challenge', async () => {
    const owner = makeSession('s1');
    const thief = makeSession('s2');
    const challenge = auth.beginAuth(owner, 'alice');
    expect((await auth.respond(thief, challenge.id, await prove(challenge, alice))).status).toBe(
      'CHALLENGE_EXPIRED',
    );
    expect(thief.soul).toBeUndefined();
  });

  it('expires a challenge when its timer fires', async () => {
    vi.useFakeTimers();
    const expired = vi.fn();
    auth.on('challenge:expired', expired);
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    const proof = await prove(challenge, alice);

    vi.advanceTimersByTime(1_000);
    expect(expired).toHaveBeenCalledWith({ sessionId: 's1', challengeId: challenge.id });
    expect(auth.pendingCount).toBe(0);
    expect(await auth.respond(session, challenge.id, proof)).toEqual({ status: 'CHALLENGE_EXPIRED' });
  });

  it('accepts a response just before the deadline', async () => {
    vi.useFakeTimers();
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    vi.advanceTimersByTime(999);
    expect((await auth.respond(session, challenge.id, await prove(challenge, alice))).status).toBe(
      'AUTHENTICATED',
    );
  });
});

// ---------------------------------------------------------------------------
// Re-authentication and disconnect
// ---------------------------------------------------------------------------
describe('re-authentication', () => {
  it('replaces the bound soul explicitly', async () => {
    const rebound = vi.fn();
    auth.on('soul:rebound', rebound);
    const session = makeSession('s1');

    const c1 = auth.beginAuth(session, 'alice');
    await auth.respond(session, c1.id, await prove(c1, alice));
    const c2 = auth.beginAuth(session, 'bob');
    const result = await auth.respond(session, c2.id, await prove(c2, bob));

    expect(result).toMatchObject({ status: 'AUTHENTICATED', replaced: 'alice' });
    expect(session.soul?.id).toBe('bob');
    expect(auth.isAuthenticated('alice')).toBe(false);
    expect(auth.isAuthenticated('bob')).toBe(true);
    expect(rebound).toHaveBeenCalledWith({ sessionId: 's1', previousSoulId: 'alice', soulId: 'bob' });
  });

  it('does not report a replacement when re-proving the same soul', async () => {
    const session = makeSession('s1');
    const c1 = auth.beginAuth(session, 'alice');
    await auth.respond(session, c1.id, await prove(c1, alice));
    const c2 = auth.beginAuth(session, 'alice');
    const result = await auth.respond(session, c2.id, await prove(c2, alice));
    expect(result).toEqual({ status: 'AUTHENTICATED', soul: registry.get('alice') });
  });

  it('clears a pending SIGN signature on rebind', async () => {
    const session = makeSession('s1');
    session.pendingSignature = 'ab'.repeat(64);
    const c1 = auth.beginAuth(session, 'alice');
    await auth.respond(session, c1.id, await prove(c1, alice));
    expect(session.pendingSignature).toBeUndefined();
  });
});

describe('discard', () => {
  it('drops the challenge and the binding of a disconnected session', async () => {
    const session = makeSession('s1');
    const c1 = auth.beginAuth(session, 'alice');
    await auth.respond(session, c1.id, await prove(c1, alice));
    auth.beginAuth(session, 'bob');

    auth.discard(session);
    expect(auth.pendingCount).toBe(0);
    expect(auth.isAuthenticated('alice')).toBe(false);
  });

  it('keeps other sessions of the same soul bound', async () => {
    const a = makeSession('s1');
    const b = makeSession('s2');
    for (const session of [a, b]) {
      const c = auth.beginAuth(session, 'alice');
      await auth.respond(session, c.id, await prove(c, alice));
    }
    auth.discard(a);
    expect(auth.sessionsOf('alice')).toEqual([b]);
  });

  it('turns an in-flight response into CHALLENGE_EXPIRED', async () => {
    const session = makeSession('s1');
    const challenge = auth.beginAuth(session, 'alice');
    const pending = auth.respond(session, challenge.id, await prove(challenge, alice));
    auth.discard(session);
    expect(await pending).toEqual({ status: 'CHALLENGE_EXPIRED' });
    expect(auth.isAuthenticated('alice')).toBe(false);
  });
});

describe('authSigningString', () => {
  it('binds soul id and nonce', () => {
    expect(authSigningString('alice', 'ab12')).toBe('soulrelay-auth:alice:ab12');
  });

  it('exposes UNKNOWN_SOUL through the error code', () => {
    try {
      auth.beginAuth(makeSession('s9'), 'nobody');
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: SoulRelayErrorCode.UNKNOWN_SOUL });
    }
  });
});
