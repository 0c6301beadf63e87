import type { Data } from '../data/index.js';
import { TableDatabase, type Table } from '../database/index.js';
import type { LoadParameter } from '../types.js';

class MemoryTable implements Table {
  private readonly rows = new Map<string, Data>();

  async get(key: string): Promise<Data | undefined> {
    return this.rows.get(key);
  }

  async put(key: string, value: Data): Promise<Data | undefined> {
    const previous = this.rows.get(key);
    this.rows.set(key, value);
    return previous;
  }

  async delete(key: string): Promise<Data | undefined> {
    const previous = this.rows.get(key);
    this.rows.delete(key);
    return previous;
  }

  async has(key: string): Promise<boolean> {
    return this.rows.has(key);
  }

  async size(): Promise<number> {
    return this.rows.size;
  }

  async entries(): Promise<Array<[string, Data]>> {
    return [...this.rows];
  }

  async clear(): Promise<void> {
    this.rows.clear();
  }
}

/**
 * Volatile database; its contents live as long as the instance is open
 */
export class MemoryDatabase extends TableDatabase {
  private readonly tables = new Map<string, MemoryTable>();

  getLoadParams(): LoadParameter[] {
    return [];
  }

  protected async connect(): Promise<void> {
    this.logger.info('Starting in-memory database.');
  }

  protected async disconnect(): Promise<void> {
    this.tables.clear();
  }

  protected async openTable(name: string): Promise<Table> {
    let table = this.tables.get(name);
    if (table === undefined) {
      table = new MemoryTable();
      this.tables.set(name, table);
    }
    return table;
  }
}
