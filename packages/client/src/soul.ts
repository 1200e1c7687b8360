import { keyPairFromPrivateKeyHex, signString, toHex, verifyHex } from '@soulrelay/crypto';
import { deriveSoulId } from '@soulrelay/identity';
import type { SoulRegistration } from '@soulrelay/identity';

/** A soul as its owning agent holds it: identity plus the private key. */
export interface ClientSoul {
  id: string;
  publicKeyHex: string;
  privateKey: Uint8Array;
  agentName?: string;
  paradigm?: string;
  mode?: string;
}

export interface SoulMetadata {
  /** Explicit soul id; derived from the public key when omitted. */
  id?: string;
  agentName?: string;
  paradigm?: string;
  mode?: string;
}

/**
 * Build a client-side soul from a 32-byte Ed25519 private key supplied by
 * the caller as 64 hex characters.
 */
export async function soulFromPrivateKey(privateKeyHex: string, meta: SoulMetadata = {}): Promise<ClientSoul> {
  const keyPair = await keyPairFromPrivateKeyHex(privateKeyHex);
  return {
    ...meta,
    id: meta.id ?? deriveSoulId(keyPair.publicKeyHex),
    publicKeyHex: keyPair.publicKeyHex,
    privateKey: keyPair.privateKey,
  };
}

/** The registration an operator adds to the relay's `souls` list for this soul. */
export function registrationFor(soul: ClientSoul): SoulRegistration {
  const registration: SoulRegistration = { id: soul.id, publicKey: soul.publicKeyHex };
  if (soul.paradigm) registration.paradigm = soul.paradigm;
  if (soul.mode) registration.mode = soul.mode;
  if (soul.agentName) registration.agentName = soul.agentName;
  return registration;
}

/** Hex signature of `text` under the soul's key. */
export async function signAs(soul: ClientSoul, text: string): Promise<string> {
  return toHex(await signString(text, soul.privateKey));
}

/**
 * Check a signature carried on a relayed message against a known public
 * key. Malformed hex verifies as false.
 */
export function verifyText(publicKeyHex: string, text: string, signatureHex: string): Promise<boolean> {
  return verifyHex(text, signatureHex, publicKeyHex);
}
