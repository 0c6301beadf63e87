import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Data } from '../data/index.js';
import { DatabaseStats } from '../database/index.js';
import { ArgumentError, StateError, TranslationError } from '../errors.js';
import { MemoryDatabase } from '../stores/index.js';
import {
  DataTranslator,
  FloatTranslator,
  IntegerTranslator,
  ListTranslator,
  StringTranslator
} from '../translate/index.js';
import type { Logger } from '../types.js';

const quietLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

const loadedMemoryDatabase = async (cacheSize = 10): Promise<MemoryDatabase> => {
  const database = new MemoryDatabase({ cacheSize, logger: quietLogger() });
  await database.load([]);
  return database;
};

describe('AbstractDatabase', () => {
  describe('lifecycle', () => {
    it('should reject a non-positive cache size', () => {
      expect(() => new MemoryDatabase({ cacheSize: 0 })).toThrow(ArgumentError);
    });

    it('should load once', async () => {
      const database = new MemoryDatabase({ logger: quietLogger() });

      expect(database.isLoaded()).toBe(false);
      expect(await database.load([])).toBe(true);
      expect(database.isLoaded()).toBe(true);
      await expect(database.load([])).rejects.toThrow(StateError);
    });

    it('should reject the wrong number of load parameters', async () => {
      const database = new MemoryDatabase({ logger: quietLogger() });

      await expect(database.load(['extra'])).rejects.toThrow(ArgumentError);
      expect(database.isLoaded()).toBe(false);
    });

    it('should refuse views before load', async () => {
      const database = new MemoryDatabase({ logger: quietLogger() });

      await expect(database.getDataMap('prefixes')).rejects.toThrow(StateError);
      expect(() => database.size()).toThrow(StateError);
    });

    it('should refuse to close before load', async () => {
      const database = new MemoryDatabase({ logger: quietLogger() });

      await expect(database.close()).rejects.toThrow(StateError);
    });

    it('should treat a second close as a no-op', async () => {
      const database = await loadedMemoryDatabase();
      await database.close();

      await expect(database.close()).resolves.toBeUndefined();
      expect(database.isClosed()).toBe(true);
    });

    it('should not load again after close', async () => {
      const database = await loadedMemoryDatabase();
      await database.close();

      await expect(database.load([])).rejects.toThrow(StateError);
    });
  });

  describe('view registry', () => {
    let database: MemoryDatabase;

    beforeEach(async () => {
      database = await loadedMemoryDatabase();
    });

    it('should return the same view for the same name', async () => {
      const first = await database.getDataMap('prefixes');
      const second = await database.getDataMap('prefixes');

      expect(second).toBe(first);
      expect(database.size()).toBe(1);
    });

    it('should accept another instance of the same translator kind', async () => {
      const first = await database.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());
      const second = await database.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());

      expect(second).toBe(first);
    });

    it('should accept differently configured translators of the same kind', async () => {
      const first = await database.getTranslatedDataMap(
        'history',
        new StringTranslator(),
        new ListTranslator(new StringTranslator())
      );
      const second = await database.getTranslatedDataMap(
        'history',
        new StringTranslator(),
        new ListTranslator(new IntegerTranslator())
      );

      expect(second).toBe(first);
    });

    it('should reject a translator of another kind', async () => {
      await database.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());

      await expect(
        database.getTranslatedDataMap('scores', new StringTranslator(), new FloatTranslator())
      ).rejects.toThrow(ArgumentError);
      await expect(
        database.getTranslatedDataMap('scores', new IntegerTranslator(), new IntegerTranslator())
      ).rejects.toThrow(ArgumentError);
    });

    it('should keep trees and maps in one namespace', async () => {
      await database.getDataTree('usage');
      await database.getDataMap('prefixes');

      await expect(database.getDataMap('usage')).rejects.toThrow(new ArgumentError("Name 'usage' is assigned to a tree."));
      await expect(database.getDataTree('prefixes')).rejects.toThrow(
        new ArgumentError("Name 'prefixes' is assigned to a map.")
      );
    });

    it('should reject an empty name', async () => {
      await expect(database.getDataMap('')).rejects.toThrow(ArgumentError);
    });

    it('should create one view when opened concurrently', async () => {
      const [a, b, c] = await Promise.all([
        database.getDataMap('race'),
        database.getDataMap('race'),
        database.getDataMap('race')
      ]);

      expect(b).toBe(a);
      expect(c).toBe(a);
      expect(database.getDataMaps()).toHaveLength(1);
    });

    it('should list checked-out views with their translators', async () => {
      await database.getTranslatedDataTree('usage', new StringTranslator(), new IntegerTranslator());
      await database.getDataMap('prefixes');

      expect(database.getDataTrees().map((view) => [view.name, view.valueTranslator.kind])).toEqual([
        ['usage', 'integer']
      ]);
      expect(database.getDataMaps().map((view) => view.name)).toEqual(['prefixes']);
    });
  });

  describe('views', () => {
    it('should write through and read back maps', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());

      expect(await map.put('alice', 3)).toBeUndefined();
      expect(await map.put('alice', 4)).toBe(3);
      expect(await map.get('alice')).toBe(4);
      expect(await map.has('alice')).toBe(true);
      expect(await map.size()).toBe(1);
      expect(await map.remove('alice')).toBe(4);
      expect(await map.isEmpty()).toBe(true);
    });

    it('should write through and read back trees', async () => {
      const database = await loadedMemoryDatabase();
      const tree = await database.getTranslatedDataTree('usage', new StringTranslator(), new IntegerTranslator());

      await tree.set(1, ['guild']);
      await tree.set(5, ['guild', 'user', 'ping']);

      expect(await tree.get(['guild', 'user', 'ping'])).toBe(5);
      expect(await tree.getAll(['guild', 'user', 'ping'])).toEqual([1, 5]);
      expect(await tree.add(9, ['guild'])).toBe(false);
      expect(await tree.remove(['guild'])).toBe(1);
      expect(await tree.paths()).toEqual([['guild', 'user', 'ping']]);
    });

    it('should serve updated values after set on a cached path', async () => {
      const database = await loadedMemoryDatabase();
      const tree = await database.getDataTree('notes');
      await tree.set('first', ['a']);
      await tree.get(['a']);
      await tree.set('second', ['a']);

      expect(await tree.get(['a'])).toBe('second');
      expect(database.stats.cacheHits).toBe(1);
    });

    it('should flush the cache on bulk removal', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());
      await map.putAll([
        ['a', 1],
        ['b', 2]
      ]);
      await map.get('a');
      await map.get('b');

      expect(await map.removeWhere((_key, value) => value > 1)).toBe(1);
      expect(await map.get('b')).toBeUndefined();
      expect(await map.get('a')).toBe(1);
      expect(database.stats.fetchFailures).toBe(1);
      expect(database.stats.fetchSuccesses).toBe(3);
    });

    it('should evict cached values when a bulk write fails part-way', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());
      await map.put('a', 1);
      await map.get('a');

      await expect(
        map.putAll([
          ['a', 2],
          ['b', 0.5]
        ])
      ).rejects.toThrow(TranslationError);
      expect(await map.get('a')).toBe(2);
      expect(await map.has('b')).toBe(false);
    });

    it('should surface bad keys as translation errors', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getTranslatedDataMap('scores', new IntegerTranslator(), new IntegerTranslator());

      await expect(map.get(0.5)).rejects.toThrow(TranslationError);
    });

    it('should record cache misses, hits and failed fetches', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getDataMap('kv');

      await map.put('k', 'v1');
      expect(await map.get('k')).toBe('v1');
      expect(database.stats.cacheMisses).toBe(1);
      expect(database.stats.fetchSuccesses).toBe(1);
      expect(database.stats.cacheHits).toBe(0);

      expect(await map.get('k')).toBe('v1');
      expect(database.stats.cacheHits).toBe(1);

      await map.remove('k');
      expect(await map.get('k')).toBeUndefined();
      expect(database.stats.fetchFailures).toBe(1);
      expect(database.stats.cacheHits).toBe(1);

      expect(await map.get('k')).toBeUndefined();
      expect(database.stats.fetchFailures).toBe(2);
    });

    it('should evict from the view cache at its capacity', async () => {
      const database = await loadedMemoryDatabase(2);
      const map = await database.getDataMap('kv');
      await map.putAll([
        ['a', '1'],
        ['b', '2'],
        ['c', '3']
      ]);
      await map.get('a');
      await map.get('b');
      await map.get('c');
      await map.get('a');

      expect(database.stats.cacheHits).toBe(0);
      expect(database.stats.cacheMisses).toBe(4);
    });

    it('should share a stats sink passed in the config', async () => {
      const stats = new DatabaseStats();
      const first = new MemoryDatabase({ logger: quietLogger(), stats });
      const second = new MemoryDatabase({ logger: quietLogger(), stats });
      await first.load([]);
      await second.load([]);

      await (await first.getDataMap('a')).get('missing');
      await (await second.getDataMap('a')).get('missing');

      expect(stats.fetchFailures).toBe(2);
    });
  });

  describe('after close', () => {
    it('should fail every view and database operation', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getDataMap('kv');
      const tree = await database.getDataTree('paths');
      await map.put('k', 'v');
      await database.close();

      await expect(map.get('k')).rejects.toThrow(StateError);
      await expect(map.put('k', 'w')).rejects.toThrow(StateError);
      await expect(map.remove('k')).rejects.toThrow(StateError);
      await expect(map.clear()).rejects.toThrow(StateError);
      await expect(map.keys()).rejects.toThrow(StateError);
      await expect(tree.get(['a'])).rejects.toThrow(StateError);
      await expect(tree.set('v', ['a'])).rejects.toThrow(StateError);
      await expect(tree.entries()).rejects.toThrow(StateError);
      await expect(database.getDataMap('kv')).rejects.toThrow(StateError);
      await expect(database.copyData(await loadedMemoryDatabase())).rejects.toThrow(StateError);
      expect(() => database.size()).toThrow(StateError);
      expect(() => database.getDataTrees()).toThrow(StateError);
    });

    it('should fail operations queued before close', async () => {
      const database = await loadedMemoryDatabase();
      const map = await database.getDataMap('kv');

      const pending = map.put('k', 'v');
      const late = map.get('k');
      const closing = database.close();

      await expect(pending).resolves.toBeUndefined();
      await expect(late).rejects.toThrow(StateError);
      await closing;
    });
  });

  describe('copyData', () => {
    it('should copy every view with its values intact', async () => {
      const source = await loadedMemoryDatabase();
      const tree = await source.getTranslatedDataTree('usage', new IntegerTranslator(), new FloatTranslator());
      await tree.set(2, [1, 2]);
      const map = await source.getTranslatedDataMap('names', new IntegerTranslator(), new StringTranslator());
      await map.put(7, 'seven');

      const target = await loadedMemoryDatabase();
      await target.copyData(source);

      expect(target.size()).toBe(0);
      const copiedTree = await target.getTranslatedDataTree('usage', new StringTranslator(), new DataTranslator());
      expect((await copiedTree.get(['1', '2']))?.equals(Data.floatData(2))).toBe(true);
      const copiedMap = await target.getTranslatedDataMap('names', new IntegerTranslator(), new StringTranslator());
      expect(await copiedMap.get(7)).toBe('seven');
    });

    it('should keep values that already exist in the target', async () => {
      const target = await loadedMemoryDatabase();
      const first = await loadedMemoryDatabase();
      await (await first.getDataMap('names')).put('k', 'first');
      await target.copyData(first);

      const second = await loadedMemoryDatabase();
      const secondNames = await second.getDataMap('names');
      await secondNames.put('k', 'second');
      await secondNames.put('other', 'new');
      await target.copyData(second);

      const names = await target.getDataMap('names');
      expect(await names.get('k')).toBe('first');
      expect(await names.get('other')).toBe('new');
    });

    it('should refuse to copy while views are checked out', async () => {
      const target = await loadedMemoryDatabase();
      await target.getDataMap('open');

      await expect(target.copyData(await loadedMemoryDatabase())).rejects.toThrow(StateError);
    });

    it('should refuse an unloaded source', async () => {
      const target = await loadedMemoryDatabase();

      await expect(target.copyData(new MemoryDatabase())).rejects.toThrow(StateError);
    });
  });
});
