/**
 * @soulrelay/signing — signs payloads with a soul's key and verifies
 * signatures against the key held in the identity registry.
 *
 * Verification never throws: malformed hex, unknown souls and bad
 * signatures all come back as `false`, so a hostile payload can only ever
 * be rejected.
 *
 * @packageDocumentation
 */

import { keyPairFromPrivateKey, signString, toHex, verifyHex } from '@soulrelay/crypto';
import type { IdentityRegistry } from '@soulrelay/identity';
import { SoulRelayError, SoulRelayErrorCode } from '@soulrelay/types';

export type { SignedMessage, KeyVault } from './types';
export { MemoryKeyVault, FileKeyVault } from './key-vault';

import type { KeyVault, SignedMessage } from './types';

export class SignatureService {
  constructor(
    private readonly registry: IdentityRegistry,
    private readonly vault?: KeyVault,
  ) {}

  /**
   * Sign `payload` as `soulId` with a caller-held private key.
   *
   * @throws {SoulRelayError} UNKNOWN_SOUL when the soul is not registered;
   *   CRYPTO_INVALID_KEY when the key does not belong to the soul.
   */
  async sign(soulId: string, payload: string, privateKey: Uint8Array): Promise<string> {
    const soul = this.registry.require(soulId);
    const keyPair = await keyPairFromPrivateKey(privateKey);
    if (keyPair.publicKeyHex !== soul.publicKey) {
      throw new SoulRelayError(
        SoulRelayErrorCode.CRYPTO_INVALID_KEY,
        `Private key does not belong to soul ${soulId}`,
        { context: { soulId } },
      );
    }
    return toHex(await signString(payload, keyPair.privateKey));
  }

  /**
   * Sign with the soul's hosted key from the vault.
   *
   * @throws {SoulRelayError} NO_SIGNING_KEY when no vault is configured or
   *   it holds no key for the soul.
   */
  async signHosted(soulId: string, payload: string): Promise<string> {
    const privateKey = await this.vault?.privateKeyFor(soulId);
    if (!privateKey) {
      throw new SoulRelayError(
        SoulRelayErrorCode.NO_SIGNING_KEY,
        `No hosted signing key for soul ${soulId}`,
        { hint: 'Sign locally in the client, or add the key to the server key file.' },
      );
    }
    return this.sign(soulId, payload, privateKey);
  }

  /** `true` when a hosted key exists for the soul. */
  async hasHostedKey(soulId: string): Promise<boolean> {
    return (await this.vault?.privateKeyFor(soulId)) !== undefined;
  }

  /** Verify `signatureHex` over `payload` against the soul's registered key. */
  async verify(soulId: string, payload: string, signatureHex: string): Promise<boolean> {
    const publicKey = this.registry.publicKeyOf(soulId);
    if (publicKey === undefined) {
      return false;
    }
    return verifyHex(payload, signatureHex, publicKey);
  }

  async verifySignedMessage(message: SignedMessage): Promise<boolean> {
    return this.verify(message.soulId, message.payload, message.signature);
  }
}
