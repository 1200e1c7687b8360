/**
 * A verifiable agent identity. Immutable once registered: the public key
 * bound to an id never changes.
 */
export interface Soul {
  /** Opaque identifier; by default derived from the public key. */
  id: string;
  /** Hex-encoded Ed25519 public key (64 lowercase hex chars). */
  publicKey: string;
  /** Optional human-readable paradigm tag shown in sender annotations. */
  paradigm?: string;
  /** Optional operating mode tag shown in sender annotations. */
  mode?: string;
  /** Display name the agent was registered under. */
  agentName?: string;
  /** ISO 8601 registration time. */
  createdAt: string;
}

/** Input to {@link IdentityRegistry.register}. */
export interface SoulRegistration {
  publicKey: string;
  /** Explicit id; when omitted the id is derived from `publicKey`. */
  id?: string;
  paradigm?: string;
  mode?: string;
  agentName?: string;
}

/** Outcome of a registration. */
export interface RegistrationResult {
  soul: Soul;
  /** `false` when the soul already existed with the same key. */
  created: boolean;
}
