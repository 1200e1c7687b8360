/**
 * @soulrelay/auth — the challenge/response state machine that upgrades an
 * anonymous session to a verified soul.
 *
 * Each session holds at most one outstanding {@link AuthChallenge}. A
 * challenge ends in exactly one of three ways: consumed by a response,
 * replaced by a newer `beginAuth`, or expired by its own timer. After any
 * of those, responding to it yields `CHALLENGE_EXPIRED`.
 *
 * @packageDocumentation
 */

import { generateId, generateNonce, toHex } from '@soulrelay/crypto';
import type { IdentityRegistry } from '@soulrelay/identity';
import type { SignatureService } from '@soulrelay/signing';
import { TypedEventEmitter, silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

export type { Session, AuthChallenge, AuthResult, AuthenticatorEvents } from './types';

import type { AuthChallenge, AuthResult, AuthenticatorEvents, Session } from './types';

export const DEFAULT_CHALLENGE_TTL_MS = 30_000;

/**
 * The string a client signs to answer a challenge. Binding the soul id
 * into it stops a proof for one soul being replayed as another.
 */
export function authSigningString(soulId: string, nonce: string): string {
  return `soulrelay-auth:${soulId}:${nonce}`;
}

export interface SoulAuthenticatorOptions {
  registry: IdentityRegistry;
  signatures: SignatureService;
  challengeTtlMs?: number;
  logger?: Logger;
}

interface Pending {
  challenge: AuthChallenge;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Generic over the transport's session type so that
 * {@link sessionsOf} hands back the caller's own session objects.
 */
export class SoulAuthenticator<S extends Session = Session> extends TypedEventEmitter<AuthenticatorEvents> {
  private readonly registry: IdentityRegistry;
  private readonly signatures: SignatureService;
  private readonly ttlMs: number;
  private readonly logger: Logger;

  /** sessionId → outstanding challenge */
  private readonly pending = new Map<string, Pending>();
  /** soulId → sessions currently bound to it */
  private readonly bound = new Map<string, Set<S>>();
  private readonly released = new WeakSet<S>();

  constructor(options: SoulAuthenticatorOptions) {
    const logger = (options.logger ?? silentLogger).child('auth');
    super((event, error) => logger.error('listener failed', { event: String(event), error: String(error) }));
    this.registry = options.registry;
    this.signatures = options.signatures;
    this.ttlMs = options.challengeTtlMs ?? DEFAULT_CHALLENGE_TTL_MS;
    this.logger = logger;
  }

  /**
   * Issue a challenge for `soulId`, replacing any outstanding one.
   *
   * @throws {SoulRelayError} UNKNOWN_SOUL when the soul is not registered.
   */
  beginAuth(session: S, soulId: string): AuthChallenge {
    this.registry.require(soulId);
    this.clearPending(session.id);

    const issuedAt = Date.now();
    const challenge: AuthChallenge = {
      id: generateId(8),
      sessionId: session.id,
      soulId,
      nonce: toHex(generateNonce()),
      issuedAt,
      expiresAt: issuedAt + this.ttlMs,
    };
    const timer = setTimeout(() => this.expire(session.id, challenge.id), this.ttlMs);
    timer.unref();
    this.pending.set(session.id, { challenge, timer });

    this.logger.debug('challenge issued', { sessionId: session.id, soulId, challengeId: challenge.id });
    return challenge;
  }

  /**
   * Answer the session's outstanding challenge with `proofHex`, a signature
   * over {@link authSigningString}. The challenge is consumed before the
   * proof is checked, so it can be answered at most once.
   */
  async respond(session: S, challengeId: string, proofHex: string): Promise<AuthResult> {
    const entry = this.pending.get(session.id);
    if (!entry || entry.challenge.id !== challengeId) {
      this.logger.info('auth rejected: no such challenge', { sessionId: session.id, challengeId });
      return { status: 'CHALLENGE_EXPIRED' };
    }
    this.clearPending(session.id);
    const { challenge } = entry;

    const valid = await this.signatures.verify(
      challenge.soulId,
      authSigningString(challenge.soulId, challenge.nonce),
      proofHex,
    );
    if (this.released.has(session)) {
      return { status: 'CHALLENGE_EXPIRED' };
    }
    if (!valid) {
      this.logger.warn('auth failed', { sessionId: session.id, soulId: challenge.soulId });
      return { status: 'AUTH_FAILED' };
    }

    const soul = this.registry.require(challenge.soulId);
    const previous = session.soul;
    if (previous) {
      this.unbind(session, previous.id);
    }
    session.soul = soul;
    session.pendingSignature = undefined;
    this.bindSession(session, soul.id);

    this.logger.info('soul authenticated', { sessionId: session.id, soulId: soul.id });
    this.emit('soul:authenticated', { sessionId: session.id, soulId: soul.id });

    if (previous && previous.id !== soul.id) {
      this.logger.warn('session rebound to a different soul', {
        sessionId: session.id,
        previousSoulId: previous.id,
        soulId: soul.id,
      });
      this.emit('soul:rebound', { sessionId: session.id, previousSoulId: previous.id, soulId: soul.id });
      return { status: 'AUTHENTICATED', soul, replaced: previous.id };
    }
    return { status: 'AUTHENTICATED', soul };
  }

  /** The session's outstanding challenge, if any. */
  pendingChallenge(sessionId: string): AuthChallenge | undefined {
    return this.pending.get(sessionId)?.challenge;
  }

  /**
   * Forget a session that has disconnected: drops its challenge and its
   * soul binding. A response still in flight for it resolves
   * `CHALLENGE_EXPIRED`.
   */
  discard(session: S): void {
    this.clearPending(session.id);
    this.released.add(session);
    if (session.soul) {
      this.unbind(session, session.soul.id);
    }
  }

  /** `true` while at least one live session is bound to `soulId`. */
  isAuthenticated(soulId: string): boolean {
    return (this.bound.get(soulId)?.size ?? 0) > 0;
  }

  /** Live sessions bound to `soulId`. */
  sessionsOf(soulId: string): S[] {
    return Array.from(this.bound.get(soulId) ?? []);
  }

  /** Number of outstanding challenges. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Cancel every challenge timer. */
  shutdown(): void {
    for (const { timer } of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }

  private expire(sessionId: string, challengeId: string): void {
    const entry = this.pending.get(sessionId);
    if (!entry || entry.challenge.id !== challengeId) return;
    this.pending.delete(sessionId);
    this.logger.info('challenge expired', { sessionId, challengeId });
    this.emit('challenge:expired', { sessionId, challengeId });
  }

  private clearPending(sessionId: string): void {
    const entry = this.pending.get(sessionId);
    if (entry) {
      clearTimeout(entry.timer);
      this.pending.delete(sessionId);
    }
  }

  private bindSession(session: S, soulId: string): void {
    let sessions = this.bound.get(soulId);
    if (!sessions) {
      sessions = new Set();
      this.bound.set(soulId, sessions);
    }
    sessions.add(session);
  }

  private unbind(session: S, soulId: string): void {
    const sessions = this.bound.get(soulId);
    if (!sessions) return;
    sessions.delete(session);
    if (sessions.size === 0) {
      this.bound.delete(soulId);
    }
  }
}
