/**
 * @soulrelay/store — pluggable record storage for SoulRelay's persisted
 * collections, plus the keyed mutex used to serialize critical sections.
 *
 * @packageDocumentation
 */

export type { RecordStore, RecordDecoder, StoredRecord } from './types';

export { MemoryStore } from './memory-store';
export { FileStore } from './file-store';
export { KeyedMutex } from './mutex';
