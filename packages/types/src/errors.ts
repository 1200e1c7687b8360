/**
 * Error code system for SoulRelay.
 *
 * Every error has a unique code (SOULRELAY_Exxx) mapping to one failure
 * mode. The protocol layer translates these codes into wire reply codes,
 * so a code is the contract between a component and the session that
 * triggered it.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All SoulRelay error codes. */
export enum SoulRelayErrorCode {
  // Identity (1xx)
  /** The claimed soul is not in the registry. */
  UNKNOWN_SOUL = 'SOULRELAY_E100',
  /** A soul registration is malformed. */
  IDENTITY_INVALID = 'SOULRELAY_E101',
  /** A soul id is already registered under a different public key. */
  IDENTITY_KEY_CONFLICT = 'SOULRELAY_E102',

  // Authentication (2xx)
  /** The session has not completed soul authentication. */
  NOT_AUTHENTICATED = 'SOULRELAY_E200',
  /** The challenge proof did not verify. */
  AUTH_FAILED = 'SOULRELAY_E201',
  /** The challenge is expired, consumed, or was never issued. */
  CHALLENGE_EXPIRED = 'SOULRELAY_E202',

  // Crypto & signing (3xx)
  /** A hex-encoded string was malformed. */
  CRYPTO_INVALID_HEX = 'SOULRELAY_E300',
  /** A key was malformed. */
  CRYPTO_INVALID_KEY = 'SOULRELAY_E301',
  /** A signing operation failed. */
  CRYPTO_SIGNATURE_FAILED = 'SOULRELAY_E302',
  /** No hosted signing key exists for the soul. */
  NO_SIGNING_KEY = 'SOULRELAY_E303',
  /** A supplied signature did not verify. */
  INVALID_SIGNATURE = 'SOULRELAY_E304',
  /** A signature was required but none was supplied or hosted. */
  SIGNATURE_REQUIRED = 'SOULRELAY_E305',

  // Reputation (4xx)
  /** A reputation event is malformed. */
  REPUTATION_INVALID_EVENT = 'SOULRELAY_E400',

  // Marketplace (5xx)
  /** A listing price is not a valid positive amount. */
  INVALID_PRICE = 'SOULRELAY_E500',
  /** A service category is malformed. */
  INVALID_CATEGORY = 'SOULRELAY_E501',
  /** The soul already has the maximum number of OPEN listings. */
  LISTING_LIMIT = 'SOULRELAY_E502',
  /** No listing exists with the given id. */
  LISTING_NOT_FOUND = 'SOULRELAY_E503',
  /** The listing is no longer OPEN. */
  LISTING_NOT_OPEN = 'SOULRELAY_E504',
  /** The caller does not own the listing. */
  NOT_OWNER = 'SOULRELAY_E505',
  /** No trade exists with the given id. */
  TRADE_NOT_FOUND = 'SOULRELAY_E506',
  /** The trade is already SETTLED or ABORTED. */
  TRADE_CLOSED = 'SOULRELAY_E507',
  /** The caller is neither party of the trade. */
  NOT_PARTY = 'SOULRELAY_E508',
  /** The caller already accepted the trade. */
  ALREADY_ACCEPTED = 'SOULRELAY_E509',
  /** The counterparty is not authenticated, so settlement cannot proceed. */
  COUNTERPARTY_OFFLINE = 'SOULRELAY_E510',

  // Protocol (6xx)
  /** A command line is malformed. */
  SYNTAX_ERROR = 'SOULRELAY_E600',
  /** The command verb is not recognised. */
  UNKNOWN_COMMAND = 'SOULRELAY_E601',
  /** The session exceeded its command rate. */
  RATE_LIMITED = 'SOULRELAY_E602',

  // Store (7xx)
  /** A record was passed to the store without an id. */
  STORE_MISSING_ID = 'SOULRELAY_E700',
  /** A stored record could not be read back. */
  STORE_CORRUPTED = 'SOULRELAY_E701',

  // Configuration (8xx)
  /** A configuration value is invalid. */
  CONFIG_INVALID = 'SOULRELAY_E800',

  // Client (9xx)
  /** The client has no open connection. */
  NOT_CONNECTED = 'SOULRELAY_E900',
  /** The server did not answer a command in time. */
  REPLY_TIMEOUT = 'SOULRELAY_E901',
  /** The server answered a command with an `ERR_*` reply. */
  SERVER_REJECTED = 'SOULRELAY_E902',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a SoulRelayError. */
export interface SoulRelayErrorOptions {
  /** Additional structured context for logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint on how to resolve the error. */
  hint?: string;
  /** The underlying cause. */
  cause?: Error;
}

/**
 * Base error class for all SoulRelay errors.
 *
 * @example
 * ```typescript
 * throw new SoulRelayError(
 *   SoulRelayErrorCode.UNKNOWN_SOUL,
 *   `Soul ${soulId} is not registered`,
 *   { hint: 'Register the soul before authenticating' }
 * );
 * ```
 */
export class SoulRelayError extends Error {
  readonly code: SoulRelayErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: SoulRelayErrorCode, message: string, options?: SoulRelayErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'SoulRelayError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured JSON representation suitable for logging. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** Narrow an unknown thrown value to a SoulRelayError, optionally of one code. */
export function isSoulRelayError(value: unknown, code?: SoulRelayErrorCode): value is SoulRelayError {
  return value instanceof SoulRelayError && (code === undefined || value.code === code);
}

/**
 * Format an error for terminal or log output.
 *
 * ```
 * [SOULRELAY_E100] Soul abc is not registered
 * Hint: Register the soul before authenticating
 * ```
 */
export function formatError(error: SoulRelayError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
