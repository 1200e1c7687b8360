import * as fs from 'fs/promises';
import * as path from 'path';

import { fromHex } from '@soulrelay/crypto';
import { SoulRelayError, SoulRelayErrorCode, isPlainObject, parseJsonSafe } from '@soulrelay/types';

import type { KeyVault } from './types';

const PRIVATE_KEY_HEX = /^[0-9a-fA-F]{64}$/;

/** {@link KeyVault} over an in-process map of `soulId → privateKeyHex`. */
export class MemoryKeyVault implements KeyVault {
  private readonly keys = new Map<string, string>();

  constructor(entries?: Record<string, string>) {
    for (const [soulId, hex] of Object.entries(entries ?? {})) {
      this.set(soulId, hex);
    }
  }

  set(soulId: string, privateKeyHex: string): void {
    if (!PRIVATE_KEY_HEX.test(privateKeyHex)) {
      throw new SoulRelayError(
        SoulRelayErrorCode.CRYPTO_INVALID_KEY,
        `Hosted key for ${soulId} must be 64 hex characters`,
      );
    }
    this.keys.set(soulId, privateKeyHex);
  }

  async privateKeyFor(soulId: string): Promise<Uint8Array | undefined> {
    const hex = this.keys.get(soulId);
    return hex === undefined ? undefined : fromHex(hex);
  }
}

/**
 * {@link KeyVault} reading a JSON object of `soulId → privateKeyHex` from
 * disk. The file is read on first use and kept once it parses; a failed
 * read is retried on the next lookup.
 */
export class FileKeyVault implements KeyVault {
  private readonly filePath: string;
  private loaded: Promise<MemoryKeyVault> | undefined;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async privateKeyFor(soulId: string): Promise<Uint8Array | undefined> {
    const loading = (this.loaded ??= this.read());
    try {
      const vault = await loading;
      return vault.privateKeyFor(soulId);
    } catch (err) {
      if (this.loaded === loading) this.loaded = undefined;
      throw err;
    }
  }

  private async read(): Promise<MemoryKeyVault> {
    const raw = await fs.readFile(this.filePath, 'utf-8');
    const parsed = parseJsonSafe(raw);
    if (!isPlainObject(parsed)) {
      throw new SoulRelayError(
        SoulRelayErrorCode.CONFIG_INVALID,
        `Key file ${this.filePath} must contain a JSON object`,
        { hint: 'Expected { "<soulId>": "<64 hex private key>", ... }' },
      );
    }
    const entries: Record<string, string> = {};
    for (const [soulId, hex] of Object.entries(parsed)) {
      if (typeof hex !== 'string') {
        throw new SoulRelayError(
          SoulRelayErrorCode.CONFIG_INVALID,
          `Key file entry for ${soulId} must be a hex string`,
        );
      }
      entries[soulId] = hex;
    }
    return new MemoryKeyVault(entries);
  }
}
