import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LowdbDatabase } from '../stores/index.js';
import { FloatTranslator, IntegerTranslator, StringTranslator } from '../translate/index.js';
import { StorageError } from '../errors.js';
import type { Logger } from '../types.js';

const quietLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

describe('LowdbDatabase', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'keyshelf-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const open = async (): Promise<LowdbDatabase> => {
    const database = new LowdbDatabase({ logger: quietLogger() });
    expect(await database.load([directory])).toBe(true);
    return database;
  };

  it('should ask for a directory path', () => {
    expect(new LowdbDatabase().getLoadParams()).toEqual([{ name: 'Directory path' }]);
  });

  it('should create a missing directory', async () => {
    const nested = join(directory, 'a', 'b');
    const database = new LowdbDatabase({ logger: quietLogger() });

    expect(await database.load([nested])).toBe(true);
    await (await database.getDataMap('kv')).put('k', 'v');
    expect(await readFile(join(nested, 'kv.json'), 'utf8')).toBe('{"k":"v"}');
  });

  it('should fail to load when the path is a file', async () => {
    const file = join(directory, 'not-a-directory');
    await writeFile(file, 'x');
    const logger = quietLogger();
    const database = new LowdbDatabase({ logger });

    expect(await database.load([file])).toBe(false);
    expect(database.isLoaded()).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should persist maps across instances', async () => {
    const first = await open();
    const scores = await first.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());
    await scores.put('alice', 3);
    await scores.put('bob', 5);
    await scores.remove('bob');
    await first.close();

    const second = await open();
    const reopened = await second.getTranslatedDataMap('scores', new StringTranslator(), new IntegerTranslator());
    expect(await reopened.entries()).toEqual([['alice', 3]]);
  });

  it('should keep floats lexically distinct on disk', async () => {
    const database = await open();
    const ratios = await database.getTranslatedDataMap('ratios', new StringTranslator(), new FloatTranslator());
    await ratios.put('half', 0.5);
    await ratios.put('whole', 1);

    expect(await readFile(join(directory, 'ratios.json'), 'utf8')).toBe('{"half":0.5,"whole":1.0}');
  });

  it('should store tree paths as list-encoded keys', async () => {
    const database = await open();
    const usage = await database.getTranslatedDataTree('command-usage', new StringTranslator(), new IntegerTranslator());
    await usage.set(2, ['guild-1', 'user;1', 'ping']);

    expect(await readFile(join(directory, 'command-usage.json'), 'utf8')).toBe(
      '{"guild-1;user&scln1;ping":2}'
    );
  });

  it('should encode view names into safe file names', async () => {
    const database = await open();
    await (await database.getDataMap('a/b c')).put('k', 'v');

    expect(await readFile(join(directory, 'a%2Fb%20c.json'), 'utf8')).toBe('{"k":"v"}');
  });

  it('should leave rows unchanged when the file cannot be written', async () => {
    const database = await open();
    const map = await database.getDataMap('kv');
    await map.put('kept', 'v');
    await rm(directory, { recursive: true, force: true });

    await expect(map.put('k', 'v')).rejects.toThrow(StorageError);
    expect(await map.has('k')).toBe(false);
    await expect(map.put('kept', 'changed')).rejects.toThrow(StorageError);
    expect(await map.get('kept')).toBe('v');
    await expect(map.remove('kept')).rejects.toThrow(StorageError);
    expect(await map.has('kept')).toBe(true);
    await expect(map.clear()).rejects.toThrow(StorageError);
    expect(await map.entries()).toEqual([['kept', 'v']]);
  });

  it('should report a corrupt file as a storage error', async () => {
    await writeFile(join(directory, 'broken.json'), '{"k":');
    const database = await open();

    await expect(database.getDataMap('broken')).rejects.toThrow(StorageError);
  });
});
