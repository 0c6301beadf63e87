export { AbstractDatabase } from './abstract-database.js';
export { TableDatabase, TranslatedTableMap } from './table-database.js';
export type { Table } from './table-database.js';
export { CachedMap, CachedTree } from './views.js';
export type { ViewContext } from './views.js';
export { DatabaseStats } from './stats.js';
export type { DatabaseStatsSnapshot } from './stats.js';
export type { Database, MapView, TreeView } from './types.js';
