import PQueue from 'p-queue';
import { DatabaseStats, type Database } from '../database/index.js';
import { StateError } from '../errors.js';
import type { Logger } from '../types.js';
import { createDefaultRegistry, type DatabaseTypeRegistry } from './registry.js';
import type { Settings } from './settings.js';

export interface DatabaseManagerOptions {
  settings: Settings;
  registry?: DatabaseTypeRegistry;
  logger?: Logger;
  /** Shared by every database the manager creates */
  stats?: DatabaseStats;
}

interface ChangeRequest {
  type: string;
  params: string[];
}

/**
 * Runs the database chosen in the settings and carries out operator requests
 * to move to another one. A change is only applied on shutdown, when the
 * current database's data is copied into the new one.
 */
export class DatabaseManager {
  readonly stats: DatabaseStats;

  private readonly settings: Settings;
  private readonly registry: DatabaseTypeRegistry;
  private readonly logger: Logger;
  private readonly queue = new PQueue({ concurrency: 1 });
  private database: Database | null = null;
  private change: ChangeRequest | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.settings = options.settings;
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? console;
    this.stats = options.stats ?? new DatabaseStats();
  }

  private create(type: string): Database {
    return this.registry.create(type, {
      cacheSize: this.settings.get('cacheSize'),
      logger: this.logger,
      stats: this.stats
    });
  }

  /**
   * Loads the database stored in the settings
   *
   * @returns Whether the database could be loaded
   */
  async startup(): Promise<boolean> {
    return this.queue.add(
      async () => {
        if (this.database !== null) {
          throw new StateError('Database currently running.');
        }
        const type = this.settings.get('databaseType');
        this.logger.info(`Starting database of type '${type}'.`);
        const database = this.create(type);
        if (!(await database.load(this.settings.get('databaseParams')))) {
          this.logger.error('Could not start database.');
          return false;
        }
        this.database = database;
        this.logger.info('Database started.');
        return true;
      },
      { throwOnTimeout: true }
    );
  }

  getDatabase(): Database {
    if (this.database === null) {
      throw new StateError('Database not currently running.');
    }
    return this.database;
  }

  isRunning(): boolean {
    return this.database !== null;
  }

  /**
   * Checks that a database of `type` loads with `params`, then schedules the
   * change for the next shutdown
   *
   * @returns false if the new database could not be loaded
   */
  async requestDatabaseChange(type: string, params: readonly string[]): Promise<boolean> {
    return this.queue.add(
      async () => {
        this.logger.debug(`Received database change request to type '${type}'.`);
        const candidate = this.create(type);
        if (!(await candidate.load(params))) {
          return false;
        }
        await candidate.close();
        this.change = { type, params: [...params] };
        this.logger.info(`Placed database change request to type '${type}'.`);
        return true;
      },
      { throwOnTimeout: true }
    );
  }

  getDatabaseChangeRequestType(): string | null {
    return this.change?.type ?? null;
  }

  /**
   * @returns Whether there was a pending change to cancel
   */
  cancelDatabaseChange(): boolean {
    if (this.change === null) {
      return false;
    }
    this.change = null;
    this.logger.info('Database change aborted.');
    return true;
  }

  /**
   * Applies any pending change, then closes the running database
   */
  async shutdown(): Promise<void> {
    return this.queue.add(
      async () => {
        const current = this.getDatabase();
        if (this.change !== null) {
          await this.applyChange(current, this.change);
          this.change = null;
        }
        this.logger.info('Terminating database.');
        await current.close();
        this.database = null;
        this.logger.info('Database terminated.');
      },
      { throwOnTimeout: true }
    );
  }

  private async applyChange(current: Database, change: ChangeRequest): Promise<void> {
    this.logger.info(`Executing database change request to type '${change.type}'.`);
    const target = this.create(change.type);
    let loaded: boolean;
    try {
      loaded = await target.load(change.params);
    } catch (error) {
      this.logger.error('Failed to load new database. Change aborted.', error);
      return;
    }
    if (!loaded) {
      this.logger.error('Failed to load new database. Change aborted.');
      return;
    }
    try {
      await target.copyData(current);
    } catch (error) {
      this.logger.error('Could not copy database data. Change aborted.', error);
      await target.close();
      return;
    }
    await target.close();
    this.settings.set('databaseType', change.type);
    this.settings.set('databaseParams', [...change.params]);
    await this.settings.save();
    this.logger.info('Database change performed successfully.');
  }
}
