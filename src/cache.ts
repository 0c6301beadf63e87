/**
 * Bounded least-recently-used cache
 *
 * Entries form an intrusive doubly linked list from `head` (most recently
 * used) to `tail` (least recently used). A key → entry map gives O(1) lookup,
 * and each entry carries its key so an evicted tail can be dropped from the map.
 *
 * Every method is synchronous and runs to completion before any other code on
 * the event loop, so a single instance never observes a half-applied update.
 *
 * @example
 * ```typescript
 * const cache = new Cache<string, Data>(2);
 * cache.put('a', Data.stringData('x'));
 * cache.put('b', Data.stringData('y'));
 * cache.get('a');                        // promotes 'a'
 * cache.put('c', Data.stringData('z'));  // evicts 'b'
 * ```
 */

import { ArgumentError } from './errors.js';

interface Entry<K, V> {
  readonly key: K;
  value: V;
  prev: Entry<K, V> | null;
  next: Entry<K, V> | null;
}

export class Cache<K, V> {
  private readonly entries = new Map<K, Entry<K, V>>();
  private head: Entry<K, V> | null = null;
  private tail: Entry<K, V> | null = null;

  /**
   * @param capacity - Maximum number of entries; must be a positive integer
   */
  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ArgumentError(`Cache capacity must be a positive integer, got ${capacity}.`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Looks up a value and marks it most recently used
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    this.unlink(entry);
    this.linkFirst(entry);
    return entry.value;
  }

  /**
   * Inserts or replaces a value and marks it most recently used. Inserting a
   * new key into a full cache evicts the least recently used entry first.
   *
   * @returns The value previously stored under the key
   */
  put(key: K, value: V): V | undefined {
    this.checkValue(value);
    const entry = this.entries.get(key);
    if (entry !== undefined) {
      const previous = entry.value;
      entry.value = value;
      this.unlink(entry);
      this.linkFirst(entry);
      return previous;
    }

    if (this.entries.size >= this.capacity) {
      this.evict();
    }
    const created: Entry<K, V> = { key, value, prev: null, next: null };
    this.linkFirst(created);
    this.entries.set(key, created);
    return undefined;
  }

  /**
   * Replaces the value of a cached key in place, leaving recency untouched.
   * Keys that are not cached are ignored.
   *
   * @returns The value previously stored under the key
   */
  update(key: K, value: V): V | undefined {
    this.checkValue(value);
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    const previous = entry.value;
    entry.value = value;
    return previous;
  }

  remove(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    this.unlink(entry);
    this.entries.delete(key);
    return entry.value;
  }

  /**
   * Membership test; does not affect recency
   */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
    this.head = null;
    this.tail = null;
  }

  /**
   * Cached keys from most to least recently used
   */
  keys(): K[] {
    const keys: K[] = [];
    for (let entry = this.head; entry !== null; entry = entry.next) {
      keys.push(entry.key);
    }
    return keys;
  }

  private evict(): void {
    const eldest = this.tail;
    if (eldest !== null) {
      this.unlink(eldest);
      this.entries.delete(eldest.key);
    }
  }

  private linkFirst(entry: Entry<K, V>): void {
    entry.prev = null;
    entry.next = this.head;
    if (this.head === null) {
      this.tail = entry;
    } else {
      this.head.prev = entry;
    }
    this.head = entry;
  }

  private unlink(entry: Entry<K, V>): void {
    if (entry.prev === null) {
      this.head = entry.next;
    } else {
      entry.prev.next = entry.next;
    }
    if (entry.next === null) {
      this.tail = entry.prev;
    } else {
      entry.next.prev = entry.prev;
    }
    entry.prev = null;
    entry.next = null;
  }

  private checkValue(value: V): void {
    if (value === null || value === undefined) {
      throw new ArgumentError('Cannot cache a null value.');
    }
  }
}
