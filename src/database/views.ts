/**
 * Cache-fronted, close-guarded wrappers around the trees and maps a database creates
 */

import PQueue from 'p-queue';
import { Cache } from '../cache.js';
import type { Translator } from '../translate/index.js';
import type { DataMap, MapEntry, Tree, TreeEntry } from '../tree/index.js';
import type { DatabaseStats } from './stats.js';

export interface ViewContext {
  cacheSize: number;
  stats: DatabaseStats;
  /** Throws once the owning database is closed */
  checkOpen(): void;
}

/**
 * State shared by both view kinds: the value cache, keyed by encoded key, and
 * the queue that runs the view's operations one at a time
 */
abstract class CachedView<V> {
  protected readonly cache: Cache<string, V>;
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(protected readonly context: ViewContext) {
    this.cache = new Cache(context.cacheSize);
  }

  invalidate(): void {
    this.cache.clear();
  }

  /**
   * Resolves once every queued operation has finished
   */
  settle(): Promise<void> {
    return this.queue.onIdle();
  }

  protected async run<R>(operation: () => Promise<R>): Promise<R> {
    this.context.checkOpen();
    return this.queue.add(
      () => {
        this.context.checkOpen();
        return operation();
      },
      { throwOnTimeout: true }
    );
  }

  /**
   * Serves a lookup from the cache, falling back to `fetch` and recording
   * the outcome in the database stats
   */
  protected async lookup(cacheKey: string, fetch: () => Promise<V | undefined>): Promise<V | undefined> {
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      this.context.stats.addCacheHit();
      return cached;
    }

    const start = Date.now();
    const value = await fetch();
    const elapsed = Date.now() - start;
    if (value === undefined) {
      this.context.stats.addFetchFailure(elapsed);
    } else {
      this.context.stats.addFetchSuccess(elapsed);
      this.context.stats.addCacheMiss();
      this.cache.put(cacheKey, value);
    }
    return value;
  }

  /**
   * Runs a write through to the store; `cacheKeys` are evicted if it fails
   */
  protected async writing<R>(cacheKeys: readonly string[], operation: () => Promise<R>): Promise<R> {
    try {
      return await operation();
    } catch (error) {
      cacheKeys.forEach((key) => this.cache.remove(key));
      throw error;
    }
  }

  protected async flushing<R>(operation: () => Promise<R>): Promise<R> {
    this.cache.clear();
    return operation();
  }
}

export class CachedTree<K, V> extends CachedView<V> implements Tree<K, V> {
  constructor(
    private readonly backing: Tree<K, V>,
    private readonly pathTranslator: Translator<readonly K[]>,
    context: ViewContext
  ) {
    super(context);
  }

  get(path: readonly K[]): Promise<V | undefined> {
    return this.run(() => this.lookup(this.pathTranslator.encode(path), () => this.backing.get(path)));
  }

  getAll(path: readonly K[]): Promise<V[]> {
    return this.run(() => this.backing.getAll(path));
  }

  set(value: V, path: readonly K[]): Promise<V | undefined> {
    return this.run(async () => {
      const cacheKey = this.pathTranslator.encode(path);
      const previous = await this.writing([cacheKey], () => this.backing.set(value, path));
      this.cache.update(cacheKey, value);
      return previous;
    });
  }

  add(value: V, path: readonly K[]): Promise<boolean> {
    return this.run(() => this.backing.add(value, path));
  }

  remove(path: readonly K[]): Promise<V | undefined> {
    return this.run(() => {
      this.cache.remove(this.pathTranslator.encode(path));
      return this.backing.remove(path);
    });
  }

  containsPath(path: readonly K[]): Promise<boolean> {
    return this.run(() => this.backing.containsPath(path));
  }

  size(): Promise<number> {
    return this.run(() => this.backing.size());
  }

  isEmpty(): Promise<boolean> {
    return this.run(() => this.backing.isEmpty());
  }

  clear(): Promise<void> {
    return this.run(() => this.flushing(() => this.backing.clear()));
  }

  paths(): Promise<K[][]> {
    return this.run(() => this.backing.paths());
  }

  values(): Promise<V[]> {
    return this.run(() => this.backing.values());
  }

  entries(): Promise<TreeEntry<K, V>[]> {
    return this.run(() => this.backing.entries());
  }

  removeWhere(predicate: (path: K[], value: V) => boolean): Promise<number> {
    return this.run(() => this.flushing(() => this.backing.removeWhere(predicate)));
  }
}

export class CachedMap<K, V> extends CachedView<V> implements DataMap<K, V> {
  constructor(
    private readonly backing: DataMap<K, V>,
    private readonly keyTranslator: Translator<K>,
    context: ViewContext
  ) {
    super(context);
  }

  get(key: K): Promise<V | undefined> {
    return this.run(() => this.lookup(this.keyTranslator.encode(key), () => this.backing.get(key)));
  }

  put(key: K, value: V): Promise<V | undefined> {
    return this.run(async () => {
      const cacheKey = this.keyTranslator.encode(key);
      const previous = await this.writing([cacheKey], () => this.backing.put(key, value));
      this.cache.update(cacheKey, value);
      return previous;
    });
  }

  putAll(entries: Iterable<readonly [K, V]>): Promise<void> {
    const list = [...entries];
    return this.run(async () => {
      const cacheKeys = list.map(([key]) => this.keyTranslator.encode(key));
      await this.writing(cacheKeys, () => this.backing.putAll(list));
      list.forEach(([, value], i) => this.cache.update(cacheKeys[i], value));
    });
  }

  remove(key: K): Promise<V | undefined> {
    return this.run(() => {
      this.cache.remove(this.keyTranslator.encode(key));
      return this.backing.remove(key);
    });
  }

  has(key: K): Promise<boolean> {
    return this.run(() => this.backing.has(key));
  }

  size(): Promise<number> {
    return this.run(() => this.backing.size());
  }

  isEmpty(): Promise<boolean> {
    return this.run(() => this.backing.isEmpty());
  }

  clear(): Promise<void> {
    return this.run(() => this.flushing(() => this.backing.clear()));
  }

  keys(): Promise<K[]> {
    return this.run(() => this.backing.keys());
  }

  values(): Promise<V[]> {
    return this.run(() => this.backing.values());
  }

  entries(): Promise<MapEntry<K, V>[]> {
    return this.run(() => this.backing.entries());
  }

  removeAll(keys: Iterable<K>): Promise<boolean> {
    const list = [...keys];
    return this.run(() => this.flushing(() => this.backing.removeAll(list)));
  }

  retainAll(keys: Iterable<K>): Promise<boolean> {
    const list = [...keys];
    return this.run(() => this.flushing(() => this.backing.retainAll(list)));
  }

  removeWhere(predicate: (key: K, value: V) => boolean): Promise<number> {
    return this.run(() => this.flushing(() => this.backing.removeWhere(predicate)));
  }
}
