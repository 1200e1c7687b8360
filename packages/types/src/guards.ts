/**
 * Runtime type guards for values that cross a trust boundary: wire
 * arguments, persisted records and configuration files.
 */

/** `true` if `value` is a string with at least one non-whitespace character. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/** `true` if `value` is a non-empty, even-length hex string. */
export function isValidHex(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length % 2 === 0 &&
    /^[0-9a-fA-F]+$/.test(value)
  );
}

/** `true` if `value` is a 64-character hex string (an Ed25519 public key). */
export function isValidPublicKey(value: unknown): value is string {
  return typeof value === 'string' && /^[0-9a-fA-F]{64}$/.test(value);
}

/** `true` if `value` is a 128-character hex string (an Ed25519 signature). */
export function isValidSignature(value: unknown): value is string {
  return typeof value === 'string' && /^[0-9a-fA-F]{128}$/.test(value);
}

/**
 * `true` if `value` is a wire-safe token: 1 to `maxLength` characters with
 * no whitespace or control characters.
 */
export function isToken(value: unknown, maxLength: number = 128): value is string {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length <= maxLength &&
    // eslint-disable-next-line no-control-regex
    !/[\s\x00-\x1F\x7F]/.test(value)
  );
}

/** `true` for objects created by `{}` or `Object.create(null)`. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Keys that are dangerous in parsed JSON (prototype pollution vectors). */
const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function assertNoDangerousKeys(obj: unknown): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoDangerousKeys(item);
    }
    return;
  }

  for (const [key, value] of Object.entries(obj)) {
    if (DANGEROUS_KEYS.has(key)) {
      throw new Error(`Potentially dangerous key "${key}" detected in JSON input`);
    }
    assertNoDangerousKeys(value);
  }
}

/**
 * Parse JSON text, rejecting documents that carry `__proto__`,
 * `constructor` or `prototype` keys at any depth.
 */
export function parseJsonSafe(text: string): unknown {
  const parsed: unknown = JSON.parse(text);
  assertNoDangerousKeys(parsed);
  return parsed;
}

/**
 * Exhaustiveness helper for `switch` statements over unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
