export type Order = 'ascending' | 'descending';

export type StorageRecord = [key: Uint8Array, value: Uint8Array];

export interface ReadonlyStorage {
  get(key: Uint8Array): Uint8Array | undefined;

  /**
   * Iterates over keys in [start, end) - an undefined bound is open.
   */
  range(start: Uint8Array | undefined, end: Uint8Array | undefined, order: Order): Iterable<StorageRecord>;
}

export interface Storage extends ReadonlyStorage {
  set(key: Uint8Array, value: Uint8Array): void;

  remove(key: Uint8Array): void;
}
