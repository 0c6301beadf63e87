import { mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Low } from 'lowdb';
import { Data, decodeDataJson, encodeDataJson } from '../data/index.js';
import { TableDatabase, type Table } from '../database/index.js';
import { StateError, StorageError, describeError } from '../errors.js';
import type { LoadParameter } from '../types.js';

type Rows = Map<string, Data>;

/**
 * File contents are the `Data` JSON text of a map, so numbers keep their
 * lexical form (`42.0` stays a float on disk)
 */
const parseRows = (text: string): Rows => {
  const data = decodeDataJson(text);
  const rows = data.getMap();
  if (rows === undefined) {
    throw new StorageError(`Expected a map at the top level, found ${data.type}.`);
  }
  return new Map(rows);
};

const stringifyRows = (rows: Rows): string => encodeDataJson(Data.mapData(rows));

class LowdbTable implements Table {
  constructor(
    private readonly db: Low<Rows>,
    private readonly file: string
  ) {}

  async get(key: string): Promise<Data | undefined> {
    return this.db.data.get(key);
  }

  async put(key: string, value: Data): Promise<Data | undefined> {
    const previous = this.db.data.get(key);
    this.db.data.set(key, value);
    await this.persist(() => this.restore(key, previous));
    return previous;
  }

  async delete(key: string): Promise<Data | undefined> {
    const previous = this.db.data.get(key);
    if (previous !== undefined) {
      this.db.data.delete(key);
      await this.persist(() => this.restore(key, previous));
    }
    return previous;
  }

  async has(key: string): Promise<boolean> {
    return this.db.data.has(key);
  }

  async size(): Promise<number> {
    return this.db.data.size;
  }

  async entries(): Promise<Array<[string, Data]>> {
    return [...this.db.data];
  }

  async clear(): Promise<void> {
    const rows = new Map(this.db.data);
    this.db.data.clear();
    await this.persist(() => {
      this.db.data = rows;
    });
  }

  private restore(key: string, previous: Data | undefined): void {
    if (previous === undefined) {
      this.db.data.delete(key);
    } else {
      this.db.data.set(key, previous);
    }
  }

  /**
   * Writes the file, undoing the in-memory change with `rollback` if the write fails
   */
  private async persist(rollback: () => void): Promise<void> {
    try {
      await this.db.write();
    } catch (error) {
      rollback();
      throw new StorageError(`Failed to write ${this.file}: ${describeError(error)}`, { cause: error });
    }
  }
}

/**
 * Database of JSON files, one per view, in a directory
 */
export class LowdbDatabase extends TableDatabase {
  private directory: string | null = null;

  getLoadParams(): LoadParameter[] {
    return [{ name: 'Directory path' }];
  }

  protected async connect([path]: readonly string[]): Promise<void> {
    const directory = resolve(path);
    const existing = await stat(directory).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    });
    if (existing === null) {
      this.logger.info(`Creating database directory ${directory}.`);
      await mkdir(directory, { recursive: true });
    } else if (!existing.isDirectory()) {
      throw new StorageError(`${directory} exists and is not a directory.`);
    }
    this.logger.info(`Using database directory ${directory}.`);
    this.directory = directory;
  }

  protected async disconnect(): Promise<void> {
    this.directory = null;
  }

  protected async openTable(name: string): Promise<Table> {
    if (this.directory === null) {
      throw new StateError('Database not loaded yet.');
    }
    const file = join(this.directory, `${encodeURIComponent(name)}.json`);
    const { DataFile } = await import('lowdb/node');
    const db = new Low<Rows>(new DataFile<Rows>(file, { parse: parseRows, stringify: stringifyRows }), new Map());
    try {
      await db.read();
    } catch (error) {
      throw new StorageError(`Failed to read ${file}: ${describeError(error)}`, { cause: error });
    }
    this.logger.debug(`Opened table file ${file}.`);
    return new LowdbTable(db, file);
  }
}
