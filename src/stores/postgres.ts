/**
 * PostgreSQL-backed database: one `(key TEXT, value JSONB)` table per view.
 *
 * Values are written as their `Data` JSON text cast to `jsonb` and read back
 * through `value::text`, so lists and maps are stored as native JSON.
 */

import pg from 'pg';
import { Data, decodeDataJson, encodeDataJson } from '../data/index.js';
import { TableDatabase, type Table } from '../database/index.js';
import { ArgumentError, StateError, StorageError, describeError } from '../errors.js';
import type { DatabaseConfig, LoadParameter, Logger } from '../types.js';

/**
 * The slice of a `pg` pool the database uses
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
  end(): Promise<void>;
}

export interface PostgresConnectionOptions {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
}

export interface PostgresDatabaseConfig extends DatabaseConfig {
  /** Builds the client for a connection; defaults to a `pg` pool */
  createClient?: (options: PostgresConnectionOptions, logger: Logger) => SqlClient;
}

export const createPoolClient = (options: PostgresConnectionOptions, logger: Logger): SqlClient => {
  const pool = new pg.Pool(options);
  pool.on('error', (error) => logger.warn('Idle PostgreSQL client failed.', error));
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    end: () => pool.end()
  };
};

export const quoteIdentifier = (name: string): string => `"${name.replaceAll('"', '""')}"`;

const allFinite = (data: Data): boolean => {
  switch (data.type) {
    case 'number':
      return Number.isFinite(data.getNumberFloat());
    case 'list':
      return (data.getList() ?? []).every(allFinite);
    case 'map':
      return [...(data.getMap() ?? new Map<string, Data>()).values()].every(allFinite);
    default:
      return true;
  }
};

/**
 * JSON has no NaN or Infinity, so such values cannot be stored as `jsonb`
 */
const toJsonText = (value: Data): string => {
  if (!allFinite(value)) {
    throw new StorageError('PostgreSQL cannot store NaN or Infinity values.');
  }
  return encodeDataJson(value);
};

class PostgresTable implements Table {
  private readonly table: string;

  constructor(
    private readonly client: SqlClient,
    private readonly name: string
  ) {
    this.table = quoteIdentifier(name);
  }

  async create(): Promise<void> {
    await this.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (key TEXT PRIMARY KEY, value JSONB NOT NULL)`
    );
  }

  async get(key: string): Promise<Data | undefined> {
    const rows = await this.query(`SELECT value::text AS value FROM ${this.table} WHERE key = $1`, [key]);
    return rows.length === 0 ? undefined : this.readValue(rows[0]);
  }

  async put(key: string, value: Data): Promise<Data | undefined> {
    const rows = await this.query(
      `WITH old AS (SELECT value FROM ${this.table} WHERE key = $1)
       INSERT INTO ${this.table} (key, value) VALUES ($1, $2::jsonb)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value
       RETURNING (SELECT value::text FROM old) AS previous`,
      [key, toJsonText(value)]
    );
    const previous = rows[0]?.previous;
    return previous === null || previous === undefined ? undefined : this.parse(previous);
  }

  async delete(key: string): Promise<Data | undefined> {
    const rows = await this.query(`DELETE FROM ${this.table} WHERE key = $1 RETURNING value::text AS value`, [
      key
    ]);
    return rows.length === 0 ? undefined : this.readValue(rows[0]);
  }

  async has(key: string): Promise<boolean> {
    const rows = await this.query(`SELECT 1 FROM ${this.table} WHERE key = $1`, [key]);
    return rows.length > 0;
  }

  async size(): Promise<number> {
    const rows = await this.query(`SELECT COUNT(*)::int AS count FROM ${this.table}`);
    const count = rows[0]?.count;
    if (typeof count !== 'number') {
      throw new StorageError(`Malformed row count for table ${this.table}.`);
    }
    return count;
  }

  async entries(): Promise<Array<[string, Data]>> {
    const rows = await this.query(`SELECT key, value::text AS value FROM ${this.table} ORDER BY key`);
    return rows.map((row) => {
      if (typeof row.key !== 'string') {
        throw new StorageError(`Row of table ${this.table} is missing the key column.`);
      }
      return [row.key, this.readValue(row)];
    });
  }

  async clear(): Promise<void> {
    await this.query(`DELETE FROM ${this.table}`);
  }

  private readValue(row: Record<string, unknown>): Data {
    if (typeof row.value !== 'string') {
      throw new StorageError(`Row of table ${this.table} is missing the value column.`);
    }
    return this.parse(row.value);
  }

  private parse(text: unknown): Data {
    if (typeof text !== 'string') {
      throw new StorageError(`Malformed value in table ${this.table}.`);
    }
    try {
      return decodeDataJson(text);
    } catch (error) {
      throw new StorageError(`Malformed value in table ${this.table}: ${describeError(error)}`, { cause: error });
    }
  }

  private async query(text: string, values?: unknown[]): Promise<Record<string, unknown>[]> {
    try {
      return (await this.client.query(text, values)).rows;
    } catch (error) {
      throw new StorageError(`Query on table '${this.name}' failed: ${describeError(error)}`, { cause: error });
    }
  }
}

const SSL_CHOICES = ['yes', 'no'] as const;

/** PostgreSQL truncates longer identifiers */
const MAX_IDENTIFIER_BYTES = 63;

export class PostgresDatabase extends TableDatabase {
  private client: SqlClient | null = null;
  private readonly createClient: (options: PostgresConnectionOptions, logger: Logger) => SqlClient;

  constructor(config: PostgresDatabaseConfig = {}) {
    super(config);
    this.createClient = config.createClient ?? createPoolClient;
  }

  getLoadParams(): LoadParameter[] {
    return [
      { name: 'Host' },
      { name: 'Port' },
      { name: 'Database' },
      { name: 'User' },
      { name: 'Password' },
      { name: 'SSL', choices: SSL_CHOICES }
    ];
  }

  protected async connect([host, port, database, user, password, ssl]: readonly string[]): Promise<void> {
    const portNumber = Number(port);
    if (!/^\d+$/.test(port) || portNumber < 1 || portNumber > 65535) {
      throw new ArgumentError(`Invalid port '${port}'.`);
    }

    this.logger.info(`Connecting to PostgreSQL at ${host}:${portNumber}/${database}.`);
    const client = this.createClient(
      { host, port: portNumber, database, user, password, ssl: ssl === 'yes' },
      this.logger
    );
    try {
      await client.query('SELECT 1');
    } catch (error) {
      await client.end();
      throw new StorageError(`Failed to connect to PostgreSQL: ${describeError(error)}`, { cause: error });
    }
    this.client = client;
  }

  protected async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.logger.info('Closing PostgreSQL connection.');
    await client?.end();
  }

  protected async openTable(name: string): Promise<Table> {
    if (this.client === null) {
      throw new StateError('Database not loaded yet.');
    }
    if (Buffer.byteLength(name, 'utf8') > MAX_IDENTIFIER_BYTES) {
      throw new ArgumentError(`View name '${name}' is longer than ${MAX_IDENTIFIER_BYTES} bytes.`);
    }
    const table = new PostgresTable(this.client, name);
    await table.create();
    this.logger.info(`Using table '${name}'.`);
    return table;
  }
}
