import { SoulRelayError, SoulRelayErrorCode } from '@soulrelay/types';

import type { RecordStore, StoredRecord } from './types';

/**
 * In-memory {@link RecordStore} backed by a Map.
 *
 * Records are copied on the way in and on the way out, so callers can
 * mutate what they hold without reaching into the store.
 */
export class MemoryStore<T extends StoredRecord> implements RecordStore<T> {
  private readonly data = new Map<string, T>();

  async put(record: T): Promise<void> {
    assertId(record);
    this.data.set(record.id, structuredClone(record));
  }

  async putBatch(records: T[]): Promise<void> {
    for (const record of records) {
      assertId(record);
    }
    for (const record of records) {
      this.data.set(record.id, structuredClone(record));
    }
  }

  async get(id: string): Promise<T | undefined> {
    const record = this.data.get(id);
    return record === undefined ? undefined : structuredClone(record);
  }

  async has(id: string): Promise<boolean> {
    return this.data.has(id);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }

  async list(predicate?: (record: T) => boolean): Promise<T[]> {
    const out: T[] = [];
    for (const record of this.data.values()) {
      if (!predicate || predicate(record)) {
        out.push(structuredClone(record));
      }
    }
    return out;
  }

  async count(): Promise<number> {
    return this.data.size;
  }

  /** Number of records held; synchronous, for tests. */
  get size(): number {
    return this.data.size;
  }

  /** Remove every record. */
  clear(): void {
    this.data.clear();
  }
}

/** @internal */
export function assertId(record: StoredRecord): void {
  if (typeof record.id !== 'string' || record.id.trim().length === 0) {
    throw new SoulRelayError(
      SoulRelayErrorCode.STORE_MISSING_ID,
      'put(): record.id is required and must be a non-empty string',
      { hint: 'Every stored record needs a non-empty string id.' },
    );
  }
}
