import { describe, it, expect, beforeEach } from 'vitest';
import type { Data } from '../data/index.js';
import { TranslatedTableMap, type Table } from '../database/index.js';
import { StorageError, TranslationError } from '../errors.js';
import { IntegerTranslator, ListTranslator, StringTranslator } from '../translate/index.js';
import { MappedTree } from '../tree/index.js';

class TestTable implements Table {
  readonly rows = new Map<string, Data>();

  async get(key: string) {
    return this.rows.get(key);
  }

  async put(key: string, value: Data) {
    const previous = this.rows.get(key);
    this.rows.set(key, value);
    return previous;
  }

  async delete(key: string) {
    const previous = this.rows.get(key);
    this.rows.delete(key);
    return previous;
  }

  async has(key: string) {
    return this.rows.has(key);
  }

  async size() {
    return this.rows.size;
  }

  async entries(): Promise<Array<[string, Data]>> {
    return [...this.rows];
  }

  async clear() {
    this.rows.clear();
  }
}

describe('MappedTree', () => {
  let table: TestTable;
  let tree: MappedTree<string, number>;

  beforeEach(() => {
    table = new TestTable();
    tree = new MappedTree(
      new TranslatedTableMap<readonly string[], number>(
        table,
        new ListTranslator(new StringTranslator()),
        new IntegerTranslator()
      )
    );
  });

  it('should store each path under its list encoding', async () => {
    await tree.set(1, ['guild', 'user']);
    await tree.set(2, []);

    expect([...table.rows.keys()]).toEqual(['guild;user', '']);
  });

  it('should return the previous value on set', async () => {
    expect(await tree.set(1, ['a'])).toBeUndefined();
    expect(await tree.set(2, ['a'])).toBe(1);
    expect(await tree.get(['a'])).toBe(2);
  });

  it('should only add to empty paths', async () => {
    expect(await tree.add(1, ['a'])).toBe(true);
    expect(await tree.add(2, ['a'])).toBe(false);
    expect(await tree.get(['a'])).toBe(1);
  });

  it('should collect values along a path, root first, skipping gaps', async () => {
    await tree.set(0, []);
    await tree.set(2, ['a', 'b']);
    await tree.set(9, ['a', 'b', 'c', 'd']);
    await tree.set(5, ['x']);

    expect(await tree.getAll(['a', 'b', 'c'])).toEqual([0, 2]);
    expect(await tree.getAll([])).toEqual([0]);
  });

  it('should keep the root apart from a path of one empty key', async () => {
    await tree.set(1, []);
    await tree.set(2, ['']);

    expect(await tree.get([])).toBe(1);
    expect(await tree.get([''])).toBe(2);
  });

  it('should remove paths and report contents', async () => {
    await tree.set(1, ['a']);
    await tree.set(2, ['a', 'b']);

    expect(await tree.remove(['a'])).toBe(1);
    expect(await tree.containsPath(['a'])).toBe(false);
    expect(await tree.size()).toBe(1);
    expect(await tree.paths()).toEqual([['a', 'b']]);
    expect(await tree.entries()).toEqual([{ path: ['a', 'b'], value: 2 }]);
  });

  it('should remove matching entries', async () => {
    await tree.set(1, ['a']);
    await tree.set(2, ['b']);
    await tree.set(3, ['c']);

    expect(await tree.removeWhere((_path, value) => value % 2 === 1)).toBe(2);
    expect(await tree.values()).toEqual([2]);
  });

  it('should clear everything', async () => {
    await tree.set(1, ['a']);
    await tree.clear();

    expect(await tree.isEmpty()).toBe(true);
  });
});

describe('TranslatedTableMap', () => {
  it('should surface caller encoding failures as translation errors', async () => {
    const map = new TranslatedTableMap(new TestTable(), new IntegerTranslator(), new IntegerTranslator());

    await expect(map.put(1.5, 1)).rejects.toThrow(TranslationError);
    await expect(map.put(1, 1.5)).rejects.toThrow(TranslationError);
  });

  it('should surface undecodable stored values as storage errors', async () => {
    const table = new TestTable();
    const strings = new TranslatedTableMap(table, new StringTranslator(), new StringTranslator());
    await strings.put('a', 'not a number');

    const integers = new TranslatedTableMap(table, new StringTranslator(), new IntegerTranslator());
    await expect(integers.get('a')).rejects.toThrow(StorageError);
  });

  it('should retain only the given keys', async () => {
    const map = new TranslatedTableMap(new TestTable(), new StringTranslator(), new IntegerTranslator());
    await map.putAll([
      ['a', 1],
      ['b', 2],
      ['c', 3]
    ]);

    expect(await map.retainAll(['b'])).toBe(true);
    expect(await map.entries()).toEqual([['b', 2]]);
    expect(await map.retainAll(['b'])).toBe(false);
  });

  it('should report whether removeAll changed anything', async () => {
    const map = new TranslatedTableMap(new TestTable(), new StringTranslator(), new IntegerTranslator());
    await map.put('a', 1);

    expect(await map.removeAll(['x'])).toBe(false);
    expect(await map.removeAll(['a', 'x'])).toBe(true);
    expect(await map.keys()).toEqual([]);
  });
});
