/**
 * Asynchronous map and tree views handed out by a `Database`
 */

export type MapEntry<K, V> = [key: K, value: V];

export interface TreeEntry<K, V> {
  path: K[];
  value: V;
}

/**
 * Key/value view over persistent storage
 */
export interface DataMap<K, V> {
  get(key: K): Promise<V | undefined>;

  /**
   * Inserts or replaces the value under a key
   *
   * @returns The value previously stored under the key
   */
  put(key: K, value: V): Promise<V | undefined>;

  putAll(entries: Iterable<readonly [K, V]>): Promise<void>;

  remove(key: K): Promise<V | undefined>;

  has(key: K): Promise<boolean>;

  size(): Promise<number>;

  isEmpty(): Promise<boolean>;

  clear(): Promise<void>;

  keys(): Promise<K[]>;

  values(): Promise<V[]>;

  entries(): Promise<MapEntry<K, V>[]>;

  /**
   * @returns Whether anything was removed
   */
  removeAll(keys: Iterable<K>): Promise<boolean>;

  /**
   * Removes every entry whose key is not among `keys`
   *
   * @returns Whether anything was removed
   */
  retainAll(keys: Iterable<K>): Promise<boolean>;

  /**
   * @returns The number of entries removed
   */
  removeWhere(predicate: (key: K, value: V) => boolean): Promise<number>;
}

/**
 * Maps paths (sequences of keys) to values. The empty path is the root.
 */
export interface Tree<K, V> {
  get(path: readonly K[]): Promise<V | undefined>;

  /**
   * Values stored at each prefix of `path`, root first; prefixes without a
   * value are skipped
   */
  getAll(path: readonly K[]): Promise<V[]>;

  /**
   * Inserts or replaces the value at a path
   *
   * @returns The value previously stored at the path
   */
  set(value: V, path: readonly K[]): Promise<V | undefined>;

  /**
   * Stores a value only if the path holds none yet
   *
   * @returns Whether the value was stored
   */
  add(value: V, path: readonly K[]): Promise<boolean>;

  remove(path: readonly K[]): Promise<V | undefined>;

  containsPath(path: readonly K[]): Promise<boolean>;

  size(): Promise<number>;

  isEmpty(): Promise<boolean>;

  clear(): Promise<void>;

  paths(): Promise<K[][]>;

  values(): Promise<V[]>;

  entries(): Promise<TreeEntry<K, V>[]>;

  /**
   * @returns The number of entries removed
   */
  removeWhere(predicate: (path: K[], value: V) => boolean): Promise<number>;
}
