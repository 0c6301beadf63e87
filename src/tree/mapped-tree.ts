import type { DataMap, Tree, TreeEntry } from './types.js';

/**
 * Tree stored in a map keyed by whole paths
 */
export class MappedTree<K, V> implements Tree<K, V> {
  constructor(private readonly backing: DataMap<readonly K[], V>) {}

  get(path: readonly K[]): Promise<V | undefined> {
    return this.backing.get(path);
  }

  async getAll(path: readonly K[]): Promise<V[]> {
    const values: V[] = [];
    for (let depth = 0; depth <= path.length; depth++) {
      const value = await this.backing.get(path.slice(0, depth));
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }

  set(value: V, path: readonly K[]): Promise<V | undefined> {
    return this.backing.put(path, value);
  }

  async add(value: V, path: readonly K[]): Promise<boolean> {
    if (await this.backing.has(path)) {
      return false;
    }
    await this.backing.put(path, value);
    return true;
  }

  remove(path: readonly K[]): Promise<V | undefined> {
    return this.backing.remove(path);
  }

  containsPath(path: readonly K[]): Promise<boolean> {
    return this.backing.has(path);
  }

  size(): Promise<number> {
    return this.backing.size();
  }

  isEmpty(): Promise<boolean> {
    return this.backing.isEmpty();
  }

  clear(): Promise<void> {
    return this.backing.clear();
  }

  async paths(): Promise<K[][]> {
    return (await this.backing.keys()).map((path) => [...path]);
  }

  values(): Promise<V[]> {
    return this.backing.values();
  }

  async entries(): Promise<TreeEntry<K, V>[]> {
    return (await this.backing.entries()).map(([path, value]) => ({ path: [...path], value }));
  }

  removeWhere(predicate: (path: K[], value: V) => boolean): Promise<number> {
    return this.backing.removeWhere((path, value) => predicate([...path], value));
  }
}
