/**
 * Keyshelf - Cached, translator-based key/value storage for Discord bots
 *
 * Main interface: start a `BotContext`, then open named maps and trees from
 * its `database`
 */

// Errors
export { ArgumentError, StateError, TranslationError, StorageError, describeError } from './errors.js';

// Configuration
export { DEFAULT_DATABASE_CONFIG } from './types.js';
export type { DatabaseConfig, LoadParameter, Logger } from './types.js';

// Value model
export { Data, encodeDataJson, decodeDataJson, isNumberLiteral } from './data/index.js';
export type { DataFields, DataType } from './data/index.js';

// Translators
export {
  AbstractTranslator,
  StringTranslator,
  IntegerTranslator,
  FloatTranslator,
  BooleanTranslator,
  DataTranslator,
  ListTranslator,
  SetTranslator,
  MapTranslator,
  StorableTranslator,
  sameKind,
  encodeList,
  decodeList
} from './translate/index.js';
export type { Translator, Storable } from './translate/index.js';

// Cache and views
export { Cache } from './cache.js';
export { MappedTree } from './tree/index.js';
export type { DataMap, Tree, TreeEntry, MapEntry } from './tree/index.js';

// Databases
export {
  AbstractDatabase,
  TableDatabase,
  TranslatedTableMap,
  CachedMap,
  CachedTree,
  DatabaseStats
} from './database/index.js';
export type { Database, Table, TreeView, MapView, DatabaseStatsSnapshot } from './database/index.js';
export { MemoryDatabase, LowdbDatabase, PostgresDatabase, createPoolClient } from './stores/index.js';
export type { SqlClient, PostgresConnectionOptions, PostgresDatabaseConfig } from './stores/index.js';

// Running a bot
export { DatabaseManager, DatabaseTypeRegistry, createDefaultRegistry, Settings, DEFAULT_SETTINGS } from './manager/index.js';
export type { DatabaseManagerOptions, DatabaseFactory, DatabaseTypeRegistration, SettingsData } from './manager/index.js';
export { BotContext } from './context.js';
export type { BotContextOptions, ShutdownListener } from './context.js';
