import type { Translator } from '../translate/index.js';
import type { DataMap, Tree } from '../tree/index.js';
import type { LoadParameter } from '../types.js';
import type { DatabaseStats } from './stats.js';

/**
 * A checked-out tree and the translators it was first opened with
 */
export interface TreeView<K, V> {
  readonly name: string;
  readonly tree: Tree<K, V>;
  readonly keyTranslator: Translator<K>;
  readonly valueTranslator: Translator<V>;
}

/**
 * A checked-out map and the translators it was first opened with
 */
export interface MapView<K, V> {
  readonly name: string;
  readonly map: DataMap<K, V>;
  readonly keyTranslator: Translator<K>;
  readonly valueTranslator: Translator<V>;
}

/**
 * Hands out named, translator-typed trees and maps over persistent storage.
 *
 * A database is loaded once, serves views until it is closed, and cannot be
 * reused afterwards. Trees and maps share one namespace; reopening a name
 * requires translators of the same kinds it was first opened with.
 */
export interface Database {
  readonly stats: DatabaseStats;

  /**
   * The parameters `load` expects, in order
   */
  getLoadParams(): LoadParameter[];

  /**
   * Connects to the backing store
   *
   * @returns false if the connection could not be established
   */
  load(params: readonly string[]): Promise<boolean>;

  isLoaded(): boolean;
  isClosed(): boolean;

  getDataTree(name: string): Promise<Tree<string, string>>;
  getKeyTranslatedDataTree<K>(name: string, keyTranslator: Translator<K>): Promise<Tree<K, string>>;
  getValueTranslatedDataTree<V>(name: string, valueTranslator: Translator<V>): Promise<Tree<string, V>>;
  getTranslatedDataTree<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<Tree<K, V>>;

  getDataMap(name: string): Promise<DataMap<string, string>>;
  getKeyTranslatedDataMap<K>(name: string, keyTranslator: Translator<K>): Promise<DataMap<K, string>>;
  getValueTranslatedDataMap<V>(name: string, valueTranslator: Translator<V>): Promise<DataMap<string, V>>;
  getTranslatedDataMap<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<DataMap<K, V>>;

  /**
   * Number of checked-out views, trees and maps together
   */
  size(): number;
  getDataTrees(): TreeView<unknown, unknown>[];
  getDataMaps(): MapView<unknown, unknown>[];

  /**
   * Imports every entry of every view of `other` into same-named views of this
   * database, keeping values that already exist here
   */
  copyData(other: Database): Promise<void>;

  close(): Promise<void>;
}
