export { MemoryDatabase } from './memory.js';
export { LowdbDatabase } from './lowdb.js';
export { PostgresDatabase, createPoolClient, quoteIdentifier } from './postgres.js';
export type { SqlClient, PostgresConnectionOptions, PostgresDatabaseConfig } from './postgres.js';
