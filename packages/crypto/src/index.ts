import * as ed from '@noble/ed25519';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';
import { SoulRelayError, SoulRelayErrorCode } from '@soulrelay/types';

export type { KeyPair, Nonce, HashHex, PrivateKey, PublicKey, Signature } from './types';

import type { KeyPair, PrivateKey, Signature, HashHex, Nonce } from './types';

const encoder = new TextEncoder();

function describeKey(key: unknown): string {
  return key instanceof Uint8Array ? `${key.length} bytes` : typeof key;
}

/**
 * Generate a new Ed25519 key pair from the platform CSPRNG.
 *
 * SoulRelay never stores client private keys; this exists for tooling,
 * hosted-agent provisioning and tests.
 */
export async function generateKeyPair(): Promise<KeyPair> {
  return keyPairFromPrivateKey(randomBytes(32));
}

/**
 * Reconstruct a KeyPair from an existing 32-byte private key. The input is
 * copied so the caller's array is not retained.
 */
export async function keyPairFromPrivateKey(privateKey: Uint8Array): Promise<KeyPair> {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== 32) {
    throw new SoulRelayError(
      SoulRelayErrorCode.CRYPTO_INVALID_KEY,
      `Private key must be a 32-byte Uint8Array, got ${describeKey(privateKey)}`,
      { hint: 'Provide a 32-byte Uint8Array as the Ed25519 private key.' },
    );
  }
  const publicKey = await ed.getPublicKeyAsync(privateKey);
  return {
    privateKey: new Uint8Array(privateKey),
    publicKey,
    publicKeyHex: toHex(publicKey),
  };
}

/** Reconstruct a KeyPair from a 64-character hex private key. */
export async function keyPairFromPrivateKeyHex(hex: string): Promise<KeyPair> {
  return keyPairFromPrivateKey(fromHex(hex));
}

/**
 * Sign arbitrary bytes with an Ed25519 private key.
 *
 * Ed25519 signatures are deterministic: the same key and message always
 * produce the same 64 bytes.
 */
export async function sign(message: Uint8Array, privateKey: PrivateKey): Promise<Signature> {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== 32) {
    throw new SoulRelayError(
      SoulRelayErrorCode.CRYPTO_INVALID_KEY,
      `sign() expects a 32-byte private key, got ${describeKey(privateKey)}`,
    );
  }
  try {
    return await ed.signAsync(message, privateKey);
  } catch (err) {
    throw new SoulRelayError(
      SoulRelayErrorCode.CRYPTO_SIGNATURE_FAILED,
      `Ed25519 signing failed: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? { cause: err } : undefined,
    );
  }
}

/** Sign the UTF-8 bytes of a string. */
export async function signString(message: string, privateKey: PrivateKey): Promise<Signature> {
  return sign(encoder.encode(message), privateKey);
}

/**
 * Verify an Ed25519 signature. Safe on untrusted input: any malformed key
 * or signature yields `false` rather than an exception.
 */
export async function verify(
  message: Uint8Array,
  signature: Signature,
  publicKey: Uint8Array,
): Promise<boolean> {
  try {
    return await ed.verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}

/**
 * Verify a hex signature over the UTF-8 bytes of `message` against a hex
 * public key. Never throws.
 */
export async function verifyHex(
  message: string,
  signatureHex: string,
  publicKeyHex: string,
): Promise<boolean> {
  if (!/^[0-9a-fA-F]{128}$/.test(signatureHex) || !/^[0-9a-fA-F]{64}$/.test(publicKeyHex)) {
    return false;
  }
  return verify(encoder.encode(message), fromHex(signatureHex), fromHex(publicKeyHex));
}

/** SHA-256 of arbitrary bytes as lowercase hex. */
export function sha256(data: Uint8Array): HashHex {
  return toHex(nobleSha256(data));
}

/** SHA-256 of the UTF-8 bytes of a string. */
export function sha256String(data: string): HashHex {
  return sha256(encoder.encode(data));
}

/**
 * Deterministic JSON serialization: object keys sorted recursively,
 * `undefined` members dropped.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 2 }); // '{"a":2,"z":1}'
 * ```
 */
export function canonicalizeJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, v] of entries) {
      if (v !== undefined) {
        sorted[key] = sortKeys(v);
      }
    }
    return sorted;
  }
  return value;
}

/** Encode bytes as lowercase hex. */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < data.length; i++) {
    hex += (data[i] ?? 0).toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Decode an even-length hex string.
 *
 * @throws {SoulRelayError} CRYPTO_INVALID_HEX on odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new SoulRelayError(
      SoulRelayErrorCode.CRYPTO_INVALID_HEX,
      `Invalid hex string: odd length (${hex.length})`,
      { hint: 'Each byte is represented by two hex characters.' },
    );
  }
  if (hex.length > 0 && !/^[0-9a-fA-F]+$/.test(hex)) {
    throw new SoulRelayError(
      SoulRelayErrorCode.CRYPTO_INVALID_HEX,
      'Invalid hex string: contains non-hexadecimal characters',
    );
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

/** A 32-byte challenge nonce from the platform CSPRNG. */
export function generateNonce(): Nonce {
  return randomBytes(32);
}

/**
 * A random identifier as hex.
 *
 * @param bytes - Random bytes to draw (default 16, giving 32 hex chars).
 */
export function generateId(bytes: number = 16): string {
  return toHex(randomBytes(bytes));
}

/** Current time as an ISO 8601 UTC string. */
export function timestamp(): string {
  return new Date().toISOString();
}
