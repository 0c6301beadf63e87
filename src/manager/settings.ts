import { Low, Memory } from 'lowdb';

export interface SettingsData {
  /** Registered database type to start with */
  databaseType: string;
  /** `load` parameters for that type, in order */
  databaseParams: string[];
  /** Capacity of each view's cache */
  cacheSize: number;
}

export const DEFAULT_SETTINGS: SettingsData = {
  databaseType: 'memory',
  databaseParams: [],
  cacheSize: 1000
};

/**
 * Operator settings, persisted with lowdb
 */
export class Settings {
  private constructor(private readonly db: Low<SettingsData>) {}

  /**
   * Loads settings from a JSON file, creating it with defaults on first save
   */
  static async open(path: string): Promise<Settings> {
    const { JSONFilePreset } = await import('lowdb/node');
    const db = await JSONFilePreset<SettingsData>(path, { ...DEFAULT_SETTINGS });
    db.data = { ...DEFAULT_SETTINGS, ...db.data };
    return new Settings(db);
  }

  /**
   * Settings that are never written to disk
   */
  static async inMemory(initial: Partial<SettingsData> = {}): Promise<Settings> {
    const db = new Low<SettingsData>(new Memory<SettingsData>(), { ...DEFAULT_SETTINGS, ...initial });
    await db.read();
    return new Settings(db);
  }

  get<K extends keyof SettingsData>(key: K): SettingsData[K] {
    return this.db.data[key];
  }

  set<K extends keyof SettingsData>(key: K, value: SettingsData[K]): void {
    this.db.data[key] = value;
  }

  save(): Promise<void> {
    return this.db.write();
  }
}
