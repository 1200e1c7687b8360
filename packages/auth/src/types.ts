import type { Soul } from '@soulrelay/identity';

/**
 * A live connection. Created and destroyed by the transport; the
 * authenticator only sets and clears `soul`.
 */
export interface Session {
  readonly id: string;
  nick: string;
  /** ISO 8601 connect time. */
  readonly connectedAt: string;
  /** The verified identity, unset until authentication succeeds. */
  soul?: Soul;
  /** Signature from `SIGN`, attached to the next relayed message. */
  pendingSignature?: string;
}

/** A nonce issued to one session for one claimed soul. Never persisted. */
export interface AuthChallenge {
  id: string;
  sessionId: string;
  soulId: string;
  /** 64 hex chars. */
  nonce: string;
  /** Epoch milliseconds. */
  issuedAt: number;
  /** Epoch milliseconds. */
  expiresAt: number;
}

export type AuthResult =
  | { status: 'AUTHENTICATED'; soul: Soul; replaced?: string }
  | { status: 'AUTH_FAILED' }
  | { status: 'CHALLENGE_EXPIRED' };

/** Events emitted by the authenticator. */
export interface AuthenticatorEvents {
  'soul:authenticated': { sessionId: string; soulId: string };
  /** A session that was already authenticated switched to another soul. */
  'soul:rebound': { sessionId: string; previousSoulId: string; soulId: string };
  'challenge:expired': { sessionId: string; challengeId: string };
}
