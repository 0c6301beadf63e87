import type { Data } from '../data/index.js';
import { StorageError, describeError } from '../errors.js';
import { ListTranslator, type Translator } from '../translate/index.js';
import { MappedTree, type DataMap, type MapEntry, type Tree } from '../tree/index.js';
import { AbstractDatabase } from './abstract-database.js';

/**
 * Flat string-keyed store of `Data` values, one per view name
 */
export interface Table {
  get(key: string): Promise<Data | undefined>;

  /**
   * @returns The value previously stored under the key
   */
  put(key: string, value: Data): Promise<Data | undefined>;

  /**
   * @returns The value that was stored under the key
   */
  delete(key: string): Promise<Data | undefined>;

  has(key: string): Promise<boolean>;
  size(): Promise<number>;
  entries(): Promise<Array<[string, Data]>>;
  clear(): Promise<void>;
}

/**
 * Typed map over a `Table`: keys go through the key translator's string
 * form, values through the value translator's `Data` form
 */
export class TranslatedTableMap<K, V> implements DataMap<K, V> {
  constructor(
    private readonly table: Table,
    private readonly keyTranslator: Translator<K>,
    private readonly valueTranslator: Translator<V>
  ) {}

  async get(key: K): Promise<V | undefined> {
    return this.decodeValue(await this.table.get(this.keyTranslator.encode(key)));
  }

  async put(key: K, value: V): Promise<V | undefined> {
    const encodedKey = this.keyTranslator.encode(key);
    const data = this.valueTranslator.toData(value);
    return this.decodeValue(await this.table.put(encodedKey, data));
  }

  async putAll(entries: Iterable<readonly [K, V]>): Promise<void> {
    for (const [key, value] of entries) {
      await this.put(key, value);
    }
  }

  async remove(key: K): Promise<V | undefined> {
    return this.decodeValue(await this.table.delete(this.keyTranslator.encode(key)));
  }

  has(key: K): Promise<boolean> {
    return this.table.has(this.keyTranslator.encode(key));
  }

  size(): Promise<number> {
    return this.table.size();
  }

  async isEmpty(): Promise<boolean> {
    return (await this.table.size()) === 0;
  }

  clear(): Promise<void> {
    return this.table.clear();
  }

  async keys(): Promise<K[]> {
    return (await this.table.entries()).map(([key]) => this.decodeKey(key));
  }

  async values(): Promise<V[]> {
    return (await this.table.entries()).map(([, data]) => this.decodeData(data));
  }

  async entries(): Promise<MapEntry<K, V>[]> {
    return (await this.table.entries()).map(([key, data]): MapEntry<K, V> => [
      this.decodeKey(key),
      this.decodeData(data)
    ]);
  }

  async removeAll(keys: Iterable<K>): Promise<boolean> {
    let changed = false;
    for (const key of keys) {
      if ((await this.table.delete(this.keyTranslator.encode(key))) !== undefined) {
        changed = true;
      }
    }
    return changed;
  }

  async retainAll(keys: Iterable<K>): Promise<boolean> {
    const retained = new Set<string>();
    for (const key of keys) {
      retained.add(this.keyTranslator.encode(key));
    }
    let changed = false;
    for (const [key] of await this.table.entries()) {
      if (!retained.has(key)) {
        await this.table.delete(key);
        changed = true;
      }
    }
    return changed;
  }

  async removeWhere(predicate: (key: K, value: V) => boolean): Promise<number> {
    let removed = 0;
    for (const [key, data] of await this.table.entries()) {
      if (predicate(this.decodeKey(key), this.decodeData(data))) {
        await this.table.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private decodeKey(key: string): K {
    try {
      return this.keyTranslator.decode(key);
    } catch (error) {
      throw new StorageError(`Stored key '${key}' could not be decoded: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  private decodeData(data: Data): V {
    try {
      return this.valueTranslator.fromData(data);
    } catch (error) {
      throw new StorageError(`Stored value could not be decoded: ${describeError(error)}`, { cause: error });
    }
  }

  private decodeValue(data: Data | undefined): V | undefined {
    return data === undefined ? undefined : this.decodeData(data);
  }
}

/**
 * Database over flat tables. Subclasses only open tables; maps are table
 * views and trees are maps keyed by the list encoding of their paths.
 */
export abstract class TableDatabase extends AbstractDatabase {
  protected abstract openTable(name: string): Promise<Table>;

  protected async newTree<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<Tree<K, V>> {
    return new MappedTree(
      await this.newMap<readonly K[], V>(name, new ListTranslator(keyTranslator), valueTranslator)
    );
  }

  protected async newMap<K, V>(
    name: string,
    keyTranslator: Translator<K>,
    valueTranslator: Translator<V>
  ): Promise<DataMap<K, V>> {
    return new TranslatedTableMap(await this.openTable(name), keyTranslator, valueTranslator);
  }
}
