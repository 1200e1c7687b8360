import { sha256String, timestamp } from '@soulrelay/crypto';
import { KeyedMutex, MemoryStore } from '@soulrelay/store';
import type { RecordStore } from '@soulrelay/store';
import {
  SoulRelayError,
  SoulRelayErrorCode,
  isPlainObject,
  isToken,
  isValidPublicKey,
  silentLogger,
} from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

export type { Soul, SoulRegistration, RegistrationResult } from './types';

import type { Soul, SoulRegistration, RegistrationResult } from './types';

// ---------------------------------------------------------------------------
// Id derivation and record decoding
// ---------------------------------------------------------------------------

/**
 * Derive a soul id from a hex public key: `sha256("soul:" + publicKey)`,
 * with the key lowercased first so both spellings of a key agree.
 *
 * @example
 * ```typescript
 * const id = deriveSoulId(keyPair.publicKeyHex);
 * ```
 */
export function deriveSoulId(publicKeyHex: string): string {
  return sha256String(`soul:${publicKeyHex.toLowerCase()}`);
}

/** Tags render inside `[Paradigm:…]` annotations, so they must be tokens. */
function isTag(value: unknown): value is string {
  return isToken(value, 64) && !/[[\]]/.test(value);
}

function optionalTag(value: unknown): value is string | undefined {
  return value === undefined || isTag(value);
}

/** Validate a persisted soul record. */
export function decodeSoul(value: unknown): Soul | undefined {
  if (!isPlainObject(value)) return undefined;
  const { id, publicKey, paradigm, mode, agentName, createdAt } = value;
  if (!isToken(id) || !isValidPublicKey(publicKey) || typeof createdAt !== 'string') {
    return undefined;
  }
  if (!optionalTag(paradigm) || !optionalTag(mode)) return undefined;
  if (agentName !== undefined && typeof agentName !== 'string') return undefined;
  return {
    id,
    publicKey,
    createdAt,
    ...(paradigm !== undefined ? { paradigm } : {}),
    ...(mode !== undefined ? { mode } : {}),
    ...(agentName !== undefined ? { agentName } : {}),
  };
}

// ---------------------------------------------------------------------------
// IdentityRegistry
// ---------------------------------------------------------------------------

export interface IdentityRegistryOptions {
  /** Defaults to an in-memory store. */
  store?: RecordStore<Soul>;
  logger?: Logger;
}

/**
 * Stores known souls and their public keys. Lookups are synchronous from
 * an in-memory index that {@link load} fills from the store at start-up;
 * registrations write through to the store before they become visible.
 */
export class IdentityRegistry {
  private readonly souls = new Map<string, Soul>();
  private readonly store: RecordStore<Soul>;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex();

  constructor(options: IdentityRegistryOptions = {}) {
    this.store = options.store ?? new MemoryStore<Soul>();
    this.logger = (options.logger ?? silentLogger).child('identity');
  }

  /** Populate the index from the store. Returns the number of souls loaded. */
  async load(): Promise<number> {
    const records = await this.store.list();
    for (const soul of records) {
      this.souls.set(soul.id, soul);
    }
    this.logger.info('identity registry loaded', { souls: records.length });
    return records.length;
  }

  /**
   * Register a soul. Idempotent for the same id and key.
   *
   * @throws {SoulRelayError} IDENTITY_INVALID for a malformed key, id or tag;
   *   IDENTITY_KEY_CONFLICT when the id is already bound to another key.
   */
  async register(registration: SoulRegistration): Promise<RegistrationResult> {
    if (!isValidPublicKey(registration.publicKey)) {
      throw new SoulRelayError(
        SoulRelayErrorCode.IDENTITY_INVALID,
        'Public key must be 64 hex characters',
        { hint: 'Pass the hex encoding of a 32-byte Ed25519 public key.' },
      );
    }
    const publicKey = registration.publicKey.toLowerCase();
    const id = registration.id ?? deriveSoulId(publicKey);
    if (!isToken(id)) {
      throw new SoulRelayError(
        SoulRelayErrorCode.IDENTITY_INVALID,
        'Soul id must be 1-128 characters without whitespace',
        { context: { id } },
      );
    }
    if (!optionalTag(registration.paradigm) || !optionalTag(registration.mode)) {
      throw new SoulRelayError(
        SoulRelayErrorCode.IDENTITY_INVALID,
        'Paradigm and mode must be 1-64 characters without whitespace or brackets',
        { context: { id } },
      );
    }

    return this.locks.run(id, async () => {
      const existing = this.souls.get(id);
      if (existing) {
        if (existing.publicKey !== publicKey) {
          throw new SoulRelayError(
            SoulRelayErrorCode.IDENTITY_KEY_CONFLICT,
            `Soul ${id} is already registered with a different public key`,
            { hint: 'A soul key never changes; register a new soul instead.', context: { id } },
          );
        }
        return { soul: existing, created: false };
      }

      const soul: Soul = {
        id,
        publicKey,
        createdAt: timestamp(),
        ...(registration.paradigm !== undefined ? { paradigm: registration.paradigm } : {}),
        ...(registration.mode !== undefined ? { mode: registration.mode } : {}),
        ...(registration.agentName !== undefined ? { agentName: registration.agentName } : {}),
      };
      await this.store.put(soul);
      this.souls.set(id, soul);
      this.logger.info('soul registered', { soulId: id });
      return { soul, created: true };
    });
  }

  get(id: string): Soul | undefined {
    return this.souls.get(id);
  }

  has(id: string): boolean {
    return this.souls.has(id);
  }

  /** Hex public key of a registered soul. */
  publicKeyOf(id: string): string | undefined {
    return this.souls.get(id)?.publicKey;
  }

  /**
   * @throws {SoulRelayError} UNKNOWN_SOUL when the id is not registered.
   */
  require(id: string): Soul {
    const soul = this.souls.get(id);
    if (!soul) {
      throw new SoulRelayError(SoulRelayErrorCode.UNKNOWN_SOUL, `Soul ${id} is not registered`, {
        hint: 'Register the soul before authenticating.',
        context: { soulId: id },
      });
    }
    return soul;
  }

  list(): Soul[] {
    return Array.from(this.souls.values());
  }

  get size(): number {
    return this.souls.size;
  }
}
