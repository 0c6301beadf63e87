import type { DatabaseStats } from './database/stats.js';

/**
 * Minimal logging surface; `console` satisfies it
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A parameter a database needs in order to load, in the order `load` takes them
 */
export interface LoadParameter {
  name: string;
  /** When present, the value must be one of these */
  choices?: readonly string[];
}

export interface DatabaseConfig {
  /** Capacity of the LRU cache kept by each view (default: 1000) */
  cacheSize?: number;
  logger?: Logger;
  /** Shared statistics sink; each database gets its own when omitted */
  stats?: DatabaseStats;
}

export const DEFAULT_DATABASE_CONFIG = {
  cacheSize: 1000,
  logger: console
} satisfies DatabaseConfig;
