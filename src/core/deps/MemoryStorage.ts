import { Order, StorageRecord, Storage } from './Storage';

const toHex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

/**
 * A simple, in-memory storage. Keys are compared byte-wise, through their hex encoding.
 */
export class MemoryStorage implements Storage {
  private readonly entries: Map<string, StorageRecord> = new Map();

  get(key: Uint8Array): Uint8Array | undefined {
    return this.entries.get(toHex(key))?.[1];
  }

  set(key: Uint8Array, value: Uint8Array): void {
    if (value.length === 0) {
      throw new Error('Empty values are not supported in storage');
    }
    this.entries.set(toHex(key), [Uint8Array.from(key), Uint8Array.from(value)]);
  }

  remove(key: Uint8Array): void {
    this.entries.delete(toHex(key));
  }

  range(start: Uint8Array | undefined, end: Uint8Array | undefined, order: Order): Iterable<StorageRecord> {
    const lower = start ? toHex(start) : undefined;
    const upper = end ? toHex(end) : undefined;
    const keys = [...this.entries.keys()]
      .filter((key) => (lower === undefined || key >= lower) && (upper === undefined || key < upper))
      .sort();
    if (order === 'descending') {
      keys.reverse();
    }
    const records: StorageRecord[] = [];
    for (const key of keys) {
      const record = this.entries.get(key);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  size(): number {
    return this.entries.size;
  }
}
