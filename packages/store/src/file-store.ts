/**
 * File-system-backed implementation of {@link RecordStore}.
 *
 * Persists each record as a separate JSON file on disk and maintains an
 * index file that fixes the listing order without reading every record.
 *
 *   - One `{id}.json` file per record (id URI-encoded).
 *   - `_index.json` maps each id to its insertion position.
 *   - All writes are atomic (write to temp file, then rename).
 *   - Index mutations are serialized through a promise-based mutex.
 *   - The base directory is auto-created on the first write.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import { SoulRelayError, SoulRelayErrorCode, isPlainObject, parseJsonSafe } from '@soulrelay/types';

import { assertId } from './memory-store';
import type { RecordDecoder, RecordStore, StoredRecord } from './types';

// ─── Index ──────────────────────────────────────────────────────────────────────

interface IndexEntry {
  /** Insertion position; never reused. */
  position: number;
  updatedAt: string;
}

interface StoreIndex {
  nextPosition: number;
  entries: Record<string, IndexEntry>;
}

function emptyIndex(): StoreIndex {
  return { nextPosition: 0, entries: {} };
}

function decodeIndex(value: unknown): StoreIndex | undefined {
  if (!isPlainObject(value) || typeof value.nextPosition !== 'number' || !isPlainObject(value.entries)) {
    return undefined;
  }
  const entries: Record<string, IndexEntry> = {};
  for (const [id, entry] of Object.entries(value.entries)) {
    if (!isPlainObject(entry) || typeof entry.position !== 'number' || typeof entry.updatedAt !== 'string') {
      return undefined;
    }
    entries[id] = { position: entry.position, updatedAt: entry.updatedAt };
  }
  return { nextPosition: value.nextPosition, entries };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ─── FileStore ──────────────────────────────────────────────────────────────────

/**
 * Records are persisted as individual JSON files inside `baseDir`. Every
 * file read back is passed through `decode`; a record that no longer
 * decodes raises `STORE_CORRUPTED` rather than being returned half-typed.
 */
export class FileStore<T extends StoredRecord> implements RecordStore<T> {
  private readonly baseDir: string;
  private readonly indexPath: string;
  private indexLock: Promise<void> = Promise.resolve();
  private dirEnsured = false;

  /**
   * @param baseDir - Directory for record and index files. Created
   *                  (including parents) on the first write.
   * @param decode - Validates a parsed record file.
   */
  constructor(
    baseDir: string,
    private readonly decode: RecordDecoder<T>,
  ) {
    this.baseDir = path.resolve(baseDir);
    this.indexPath = path.join(this.baseDir, '_index.json');
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private async ensureDir(): Promise<void> {
    if (!this.dirEnsured) {
      await fs.mkdir(this.baseDir, { recursive: true });
      this.dirEnsured = true;
    }
  }

  private recordPath(id: string): string {
    return path.join(this.baseDir, `${encodeURIComponent(id)}.json`);
  }

  /** Read and validate the index file, returning an empty index on ENOENT. */
  private async readIndex(): Promise<StoreIndex> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath, 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return emptyIndex();
      }
      throw err;
    }
    const index = decodeIndex(parseJsonSafe(raw));
    if (!index) {
      throw new SoulRelayError(
        SoulRelayErrorCode.STORE_CORRUPTED,
        `Store index ${this.indexPath} is malformed`,
        { hint: 'Restore the data directory from a backup or remove the collection directory.' },
      );
    }
    return index;
  }

  private async writeIndex(index: StoreIndex): Promise<void> {
    await this.atomicWrite(this.indexPath, JSON.stringify(index, null, 2));
  }

  /**
   * Write to a temporary file in the same directory and rename it over
   * `filePath`. Rename on the same filesystem is atomic on POSIX systems.
   */
  private async atomicWrite(filePath: string, data: string): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}.tmp`;
    await fs.writeFile(tmpPath, data, 'utf-8');
    await fs.rename(tmpPath, filePath);
  }

  /** Only one `fn` runs at a time; later callers queue behind it. */
  private async withIndexLock<R>(fn: () => Promise<R>): Promise<R> {
    const previous = this.indexLock;
    let release: () => void = () => undefined;
    this.indexLock = new Promise<void>((r) => {
      release = r;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private index(index: StoreIndex, id: string, now: string): void {
    const existing = index.entries[id];
    if (existing) {
      existing.updatedAt = now;
    } else {
      index.entries[id] = { position: index.nextPosition++, updatedAt: now };
    }
  }

  // ── CRUD ─────────────────────────────────────────────────────────────────

  async put(record: T): Promise<void> {
    assertId(record);
    await this.ensureDir();
    await this.withIndexLock(async () => {
      await this.atomicWrite(this.recordPath(record.id), JSON.stringify(record, null, 2));
      const index = await this.readIndex();
      this.index(index, record.id, new Date().toISOString());
      await this.writeIndex(index);
    });
  }

  async putBatch(records: T[]): Promise<void> {
    if (records.length === 0) return;
    for (const record of records) {
      assertId(record);
    }
    await this.ensureDir();

    const deduped = new Map<string, T>();
    for (const record of records) {
      deduped.set(record.id, record);
    }

    await this.withIndexLock(async () => {
      await Promise.all(
        Array.from(deduped.values()).map((record) =>
          this.atomicWrite(this.recordPath(record.id), JSON.stringify(record, null, 2)),
        ),
      );
      const index = await this.readIndex();
      const now = new Date().toISOString();
      for (const id of deduped.keys()) {
        this.index(index, id, now);
      }
      await this.writeIndex(index);
    });
  }

  async get(id: string): Promise<T | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(id), 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw err;
    }
    const record = this.decode(parseJsonSafe(raw));
    if (!record) {
      throw new SoulRelayError(
        SoulRelayErrorCode.STORE_CORRUPTED,
        `Record ${id} in ${this.baseDir} does not match the expected shape`,
        { context: { id } },
      );
    }
    return record;
  }

  async has(id: string): Promise<boolean> {
    const index = await this.readIndex();
    return id in index.entries;
  }

  async delete(id: string): Promise<boolean> {
    return this.withIndexLock(async () => {
      const index = await this.readIndex();
      if (!(id in index.entries)) {
        return false;
      }
      delete index.entries[id];
      try {
        await fs.unlink(this.recordPath(id));
      } catch (err: unknown) {
        if (!isNotFound(err)) throw err;
      }
      await this.writeIndex(index);
      return true;
    });
  }

  async list(predicate?: (record: T) => boolean): Promise<T[]> {
    const index = await this.readIndex();
    const ids = Object.entries(index.entries)
      .sort(([, a], [, b]) => a.position - b.position)
      .map(([id]) => id);

    const records: T[] = [];
    for (const id of ids) {
      const record = await this.get(id);
      if (record && (!predicate || predicate(record))) {
        records.push(record);
      }
    }
    return records;
  }

  async count(): Promise<number> {
    const index = await this.readIndex();
    return Object.keys(index.entries).length;
  }
}
