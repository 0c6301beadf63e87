export { DatabaseManager } from './database-manager.js';
export type { DatabaseManagerOptions } from './database-manager.js';
export { DatabaseTypeRegistry, createDefaultRegistry } from './registry.js';
export type { DatabaseFactory, DatabaseTypeRegistration } from './registry.js';
export { Settings, DEFAULT_SETTINGS } from './settings.js';
export type { SettingsData } from './settings.js';
