/**
 * Type definitions for the @soulrelay/store package.
 */

/** Anything a store can hold: a JSON-serializable record keyed by `id`. */
export interface StoredRecord {
  id: string;
}

/**
 * Turns a parsed JSON value back into a record, or returns `undefined` when
 * the value does not have the record's shape. File-backed stores use it so
 * that nothing read from disk enters the process unchecked.
 */
export type RecordDecoder<T> = (value: unknown) => T | undefined;

/**
 * Pluggable storage backend for one collection of records (souls,
 * reputation events, listings, trades).
 *
 * `list()` returns records in first-insertion order; overwriting a record
 * keeps its original position. The reputation ledger relies on this to
 * replay events in admission order.
 */
export interface RecordStore<T extends StoredRecord> {
  /** Store a record, replacing any existing record with the same id. */
  put(record: T): Promise<void>;

  /** Store several records at once. Later duplicates of an id win. */
  putBatch(records: T[]): Promise<void>;

  get(id: string): Promise<T | undefined>;

  has(id: string): Promise<boolean>;

  /** Delete a record. Returns true if it existed. */
  delete(id: string): Promise<boolean>;

  /** List records, optionally restricted to those matching `predicate`. */
  list(predicate?: (record: T) => boolean): Promise<T[]>;

  count(): Promise<number>;
}
