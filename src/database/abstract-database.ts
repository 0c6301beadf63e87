import PQueue from 'p-queue';
import { ArgumentError, StateError } from '../errors.js';
import {
  DataTranslator,
  ListTranslator,
  StringTranslator,
  sameKind,
  type Translator
} from '../translate/index.js';
import type { DataMap, Tree } from '../tree/index.js';
import { DEFAULT_DATABASE_CONFIG, type DatabaseConfig, type LoadParameter, type Logger } from '../types.js';
import { DatabaseStats } from './stats.js';
import type { Database, MapView, TreeView } from './types.js';
import { CachedMap, CachedTree, type ViewContext } from './views.js';

const isTreeViewOf = <K, V>(
  view: TreeView<unknown, unknown>,
  keyTranslator: Translator<K>,
  valueTranslator: Translator<V>
): view is TreeView<K, V> =>
  sameKind(view.keyTranslator, keyTranslator) && sameKind(view.valueTranslator, valueTranslator);

const isMapViewOf = <K, V>(
  view: MapView<unknown, unknown>,
  keyTranslator: Translator<K>,
  valueTranslator: Translator<V>
): view is MapView<K, V> =>
  sameKind(view.keyTranslator, keyTranslator) && sameKind(view.valueTranslator, valueTranslator);

const checkTranslators = (
  existing: { keyTranslator: Translator<unknown>; valueTranslator: Translator<unknown> },
  keyTranslator: Translator<unknown>,
  valueTranslator: Translator<unknown>
): void => {
  if (!sameKind(existing.keyTranslator, keyTranslator)) {
    throw new ArgumentError(
      `Given key translator (${keyTranslator.kind}) is of a different kind than the existing key translator (${existing.keyTranslator.kind}).`
    );
  }
  if (!sameKind(existing.valueTranslator, valueTranslator)) {
    throw new ArgumentError(
      `Given value translator (${valueTranslator.kind}) is of a different kind than the existing value translator (${existing.valueTranslator.kind}).`
    );
  }
};

/**
 * Lifecycle, view registry and view wrapping shared by every database.
 *
 * Subclasses connect to their store and create raw trees and maps; this class
 * wraps each one in a cache-fronted view, keeps one view per name and guards
 * every operation against use after close.
 */
export abstract class AbstractDatabase implements Database {
  readonly stats: DatabaseStats;

  protected readonly logger: Logger;
  protected readonly cacheSize: number;

  private loaded = false;
  private closed = false;
  private readonly trees = new Map<string, TreeView<unknown, unknown>>();
  private readonly maps = new Map<string, MapView<unknown, unknown>>();
  private readonly views: Array<Pick<CachedTree<unknown, unknown>, 'invalidate' | 'settle'>> = [];
  private readonly lifecycle = new PQueue({ concurrency: 1 });

  constructor(config: DatabaseConfig = {}) {
    const settings = { ...DEFAULT_DATABASE_CONFIG, ...config };
    if (!Number.isInteger(settings.cacheSize) || settings.cacheSize <= 0) {
      throw new ArgumentError(`Cache size must be a positive integer, got ${settings.cacheSize}.`);
    }
    this.cacheSize = settings.cacheSize;
    this.logger = settings.logger;
    this.stats = config.stats ?? new DatabaseStats();
  }

  abstract getLoadParams(): LoadParameter[];

  /**
   * Establishes the backing connection; throws if it cannot be established
   */
  protected abstract connect(params: readonly string[]): Promise<void>;

  /**
   * Releases the backing connection
   */
  protected abstract disconnect(): Promise<void>;

  protected abstract newTree<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<Tree<K, V>>;

  protected abstract newMap<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<DataMap<K, V>>;

  isLoaded(): boolean {
    return this.loaded;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async load(params: readonly string[]): Promise<boolean> {
    return this.lifecycle.add(() => this.loadOnce(params), { throwOnTimeout: true });
  }

  private async loadOnce(params: readonly string[]): Promise<boolean> {
    if (this.closed) {
      throw new StateError('Database already closed.');
    }
    if (this.loaded) {
      throw new StateError('Database already loaded.');
    }

    const expected = this.getLoadParams();
    if (params.length !== expected.length) {
      throw new ArgumentError(
        `Incorrect amount of arguments provided: expected ${expected.length}, got ${params.length}.`
      );
    }
    expected.forEach((param, i) => {
      if (param.choices !== undefined && !param.choices.includes(params[i])) {
        throw new ArgumentError(
          `Invalid value '${params[i]}' for '${param.name}'; expected one of: ${param.choices.join(', ')}.`
        );
      }
    });

    try {
      await this.connect(params);
    } catch (error) {
      if (error instanceof ArgumentError) {
        throw error;
      }
      this.logger.error(`Failed to load ${this.constructor.name}.`, error);
      return false;
    }
    this.loaded = true;
    this.logger.info(`Loaded ${this.constructor.name}.`);
    return true;
  }

  async close(): Promise<void> {
    return this.lifecycle.add(() => this.closeOnce(), { throwOnTimeout: true });
  }

  private async closeOnce(): Promise<void> {
    if (!this.loaded) {
      throw new StateError('Database not loaded yet.');
    }
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.logger.info(`Closing ${this.constructor.name}.`);
    await Promise.all(this.views.map((view) => view.settle()));
    this.views.forEach((view) => view.invalidate());
    await this.disconnect();
  }

  protected checkState(): void {
    if (!this.loaded) {
      throw new StateError('Database not loaded yet.');
    }
    if (this.closed) {
      throw new StateError('Database already closed.');
    }
  }

  private viewContext(): ViewContext {
    return {
      cacheSize: this.cacheSize,
      stats: this.stats,
      checkOpen: () => {
        if (this.closed) {
          throw new StateError('The backing database is already closed.');
        }
      }
    };
  }

  private checkName(name: string): void {
    if (name.length === 0) {
      throw new ArgumentError('Data name cannot be empty.');
    }
  }

  getDataTree(name: string): Promise<Tree<string, string>> {
    return this.getTranslatedDataTree(name, new StringTranslator(), new StringTranslator());
  }

  getKeyTranslatedDataTree<K>(name: string, keyTranslator: Translator<K>): Promise<Tree<K, string>> {
    return this.getTranslatedDataTree(name, keyTranslator, new StringTranslator());
  }

  getValueTranslatedDataTree<V>(name: string, valueTranslator: Translator<V>): Promise<Tree<string, V>> {
    return this.getTranslatedDataTree(name, new StringTranslator(), valueTranslator);
  }

  async getTranslatedDataTree<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<Tree<K, V>> {
    this.checkState();
    this.checkName(name);
    return this.lifecycle.add(
      async () => {
        this.checkState();
        const existing = this.trees.get(name);
        if (existing === undefined) {
          if (this.maps.has(name)) {
            throw new ArgumentError(`Name '${name}' is assigned to a map.`);
          }
          this.logger.debug(`Creating tree '${name}'.`);
          const tree = new CachedTree(
            await this.newTree(name, keyTranslator, valueTranslator),
            new ListTranslator(keyTranslator),
            this.viewContext()
          );
          const view: TreeView<K, V> = { name, tree, keyTranslator, valueTranslator };
          this.trees.set(name, view);
          this.views.push(tree);
          return tree;
        }
        checkTranslators(existing, keyTranslator, valueTranslator);
        if (!isTreeViewOf(existing, keyTranslator, valueTranslator)) {
          throw new ArgumentError(`Tree '${name}' was opened with different translators.`);
        }
        return existing.tree;
      },
      { throwOnTimeout: true }
    );
  }

  getDataMap(name: string): Promise<DataMap<string, string>> {
    return this.getTranslatedDataMap(name, new StringTranslator(), new StringTranslator());
  }

  getKeyTranslatedDataMap<K>(name: string, keyTranslator: Translator<K>): Promise<DataMap<K, string>> {
    return this.getTranslatedDataMap(name, keyTranslator, new StringTranslator());
  }

  getValueTranslatedDataMap<V>(name: string, valueTranslator: Translator<V>): Promise<DataMap<string, V>> {
    return this.getTranslatedDataMap(name, new StringTranslator(), valueTranslator);
  }

  async getTranslatedDataMap<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<DataMap<K, V>> {
    this.checkState();
    this.checkName(name);
    return this.lifecycle.add(
      async () => {
        this.checkState();
        const existing = this.maps.get(name);
        if (existing === undefined) {
          if (this.trees.has(name)) {
            throw new ArgumentError(`Name '${name}' is assigned to a tree.`);
          }
          this.logger.debug(`Creating map '${name}'.`);
          const map = new CachedMap(
            await this.newMap(name, keyTranslator, valueTranslator),
            keyTranslator,
            this.viewContext()
          );
          const view: MapView<K, V> = { name, map, keyTranslator, valueTranslator };
          this.maps.set(name, view);
          this.views.push(map);
          return map;
        }
        checkTranslators(existing, keyTranslator, valueTranslator);
        if (!isMapViewOf(existing, keyTranslator, valueTranslator)) {
          throw new ArgumentError(`Map '${name}' was opened with different translators.`);
        }
        return existing.map;
      },
      { throwOnTimeout: true }
    );
  }

  size(): number {
    this.checkState();
    return this.trees.size + this.maps.size;
  }

  getDataTrees(): TreeView<unknown, unknown>[] {
    this.checkState();
    return [...this.trees.values()];
  }

  getDataMaps(): MapView<unknown, unknown>[] {
    this.checkState();
    return [...this.maps.values()];
  }

  async copyData(other: Database): Promise<void> {
    this.checkState();
    if (this.size() > 0) {
      throw new StateError('Cannot copy data into a database with views checked out.');
    }
    if (!other.isLoaded() || other.isClosed()) {
      throw new StateError('Source database must be loaded and open.');
    }

    const keys = new StringTranslator();
    const values = new DataTranslator();
    try {
      for (const source of other.getDataTrees()) {
        this.logger.debug(`Copying tree '${source.name}'.`);
        const target = await this.getTranslatedDataTree(source.name, keys, values);
        for (const { path, value } of await source.tree.entries()) {
          await target.add(
            source.valueTranslator.toData(value),
            path.map((key) => source.keyTranslator.encode(key))
          );
        }
      }
      for (const source of other.getDataMaps()) {
        this.logger.debug(`Copying map '${source.name}'.`);
        const target = await this.getTranslatedDataMap(source.name, keys, values);
        for (const [key, value] of await source.map.entries()) {
          const encoded = source.keyTranslator.encode(key);
          if (!(await target.has(encoded))) {
            await target.put(encoded, source.valueTranslator.toData(value));
          }
        }
      }
    } finally {
      this.releaseViews();
    }
  }

  /**
   * Forgets every checked-out view so the names can be reopened with other translators
   */
  private releaseViews(): void {
    this.views.forEach((view) => view.invalidate());
    this.views.length = 0;
    this.trees.clear();
    this.maps.clear();
  }
}
