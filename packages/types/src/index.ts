/**
 * @soulrelay/types — shared error codes, results, guards, logging and
 * events used by every SoulRelay package.
 *
 * @packageDocumentation
 */

// ─── Errors ─────────────────────────────────────────────────────────────────────

export { SoulRelayError, SoulRelayErrorCode, isSoulRelayError, formatError } from './errors';
export type { SoulRelayErrorOptions } from './errors';

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union of a success value or an error, for outcomes that
 * are expected rather than exceptional.
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ─── Guards ─────────────────────────────────────────────────────────────────────

export {
  isNonEmptyString,
  isValidHex,
  isValidPublicKey,
  isValidSignature,
  isToken,
  isPlainObject,
  parseJsonSafe,
  assertNever,
} from './guards';

// ─── Logging ────────────────────────────────────────────────────────────────────

export { Logger, LogLevel, createLogger, parseLogLevel, silentLogger } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

// ─── Events ─────────────────────────────────────────────────────────────────────

export { TypedEventEmitter } from './events';
export type { Listener } from './events';

// ─── Protocol constants ─────────────────────────────────────────────────────────

/** Current SoulRelay version string. */
export const SOULRELAY_VERSION = '0.1.0';
