/**
 * Registry of the database types an operator can choose from
 */

import type { Database } from '../database/index.js';
import { ArgumentError } from '../errors.js';
import { LowdbDatabase, MemoryDatabase, PostgresDatabase } from '../stores/index.js';
import type { DatabaseConfig, LoadParameter } from '../types.js';

/**
 * Creates an unloaded database of one type
 */
export type DatabaseFactory = (config: DatabaseConfig) => Database;

/**
 * Registration information for a database type
 */
export interface DatabaseTypeRegistration {
  type: string;
  displayName: string;
  create: DatabaseFactory;
}

/**
 * Maps database type identifiers to their factories
 */
export class DatabaseTypeRegistry {
  private registry = new Map<string, DatabaseTypeRegistration>();

  /**
   * Register a database type
   *
   * @example
   * ```typescript
   * const registry = new DatabaseTypeRegistry();
   * registry.register('memory', 'In-memory (volatile)', (config) => new MemoryDatabase(config));
   * ```
   */
  register(type: string, displayName: string, create: DatabaseFactory): void {
    if (type.length === 0) {
      throw new ArgumentError('Database type cannot be empty.');
    }
    if (this.registry.has(type)) {
      throw new ArgumentError(`Database type '${type}' is already registered.`);
    }
    this.registry.set(type, { type, displayName, create });
  }

  getRegistration(type: string): DatabaseTypeRegistration | undefined {
    return this.registry.get(type);
  }

  isRegistered(type: string): boolean {
    return this.registry.has(type);
  }

  /**
   * Creates an unloaded database of a registered type
   */
  create(type: string, config: DatabaseConfig = {}): Database {
    const registration = this.registry.get(type);
    if (registration === undefined) {
      throw new ArgumentError(`Unknown database type '${type}'.`);
    }
    return registration.create(config);
  }

  /**
   * The parameters a type's `load` expects, read off a throwaway instance
   */
  getLoadParams(type: string): LoadParameter[] {
    return this.create(type).getLoadParams();
  }

  types(): DatabaseTypeRegistration[] {
    return [...this.registry.values()];
  }

  clear(): void {
    this.registry.clear();
  }
}

/**
 * A registry holding the built-in `memory`, `lowdb` and `postgres` types
 */
export const createDefaultRegistry = (): DatabaseTypeRegistry => {
  const registry = new DatabaseTypeRegistry();
  registry.register('memory', 'In-memory (volatile)', (config) => new MemoryDatabase(config));
  registry.register('lowdb', 'Local JSON files', (config) => new LowdbDatabase(config));
  registry.register('postgres', 'PostgreSQL', (config) => new PostgresDatabase(config));
  return registry;
};
