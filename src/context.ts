import type { Database } from './database/index.js';
import { describeError } from './errors.js';
import { DatabaseManager, Settings, type DatabaseTypeRegistry } from './manager/index.js';
import type { Logger } from './types.js';

export type ShutdownListener = () => void | Promise<void>;

export interface BotContextOptions {
  /** Settings file; settings stay in memory when omitted */
  settingsPath?: string;
  registry?: DatabaseTypeRegistry;
  logger?: Logger;
}

/**
 * Everything a running bot shares: its settings, the database manager and
 * the listeners to notify before shutting down
 */
export class BotContext {
  readonly databases: DatabaseManager;

  private readonly listeners: ShutdownListener[] = [];

  constructor(
    readonly settings: Settings,
    private readonly logger: Logger = console,
    registry?: DatabaseTypeRegistry
  ) {
    this.databases = new DatabaseManager({ settings, registry, logger });
  }

  static async create(options: BotContextOptions = {}): Promise<BotContext> {
    const settings =
      options.settingsPath === undefined
        ? await Settings.inMemory()
        : await Settings.open(options.settingsPath);
    return new BotContext(settings, options.logger, options.registry);
  }

  get database(): Database {
    return this.databases.getDatabase();
  }

  onShutdown(listener: ShutdownListener): void {
    this.listeners.push(listener);
  }

  /**
   * @returns Whether the listener was registered
   */
  offShutdown(listener: ShutdownListener): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) {
      return false;
    }
    this.listeners.splice(index, 1);
    return true;
  }

  start(): Promise<boolean> {
    return this.databases.startup();
  }

  /**
   * Notifies the shutdown listeners in registration order, then shuts the
   * database down. A failing listener does not stop the others.
   */
  async shutdown(): Promise<void> {
    for (const listener of [...this.listeners]) {
      try {
        await listener();
      } catch (error) {
        this.logger.error(`Shutdown listener failed: ${describeError(error)}`, error);
      }
    }
    if (this.databases.isRunning()) {
      await this.databases.shutdown();
    }
  }
}
