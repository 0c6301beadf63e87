import {
  IntegerTranslator,
  StorableTranslator,
  StringTranslator,
  type BotContext,
  type DataMap,
  type Tree
} from '../../../src/index.js';
import { UserProfile } from './entities.js';

/**
 * Storage used by the example bot, opened once the database has started
 */
export class DatabaseService {
  private constructor(
    private readonly prefixes: DataMap<string, string>,
    private readonly profiles: Tree<string, UserProfile>,
    private readonly usage: Tree<string, number>
  ) {}

  static async open(context: BotContext): Promise<DatabaseService> {
    const database = context.database;
    return new DatabaseService(
      await database.getDataMap('guild-prefixes'),
      await database.getTranslatedDataTree(
        'user-profiles',
        new StringTranslator(),
        new StorableTranslator(() => new UserProfile())
      ),
      await database.getTranslatedDataTree('command-usage', new StringTranslator(), new IntegerTranslator())
    );
  }

  /**
   * Storage context for a user
   * - DM context: userId (personal storage)
   * - Guild context: guildId (per-server storage)
   */
  static getContextId(guildId: string | null, userId: string): string {
    return guildId ?? userId;
  }

  async getPrefix(guildId: string | null, fallback: string): Promise<string> {
    if (guildId === null) {
      return fallback;
    }
    return (await this.prefixes.get(guildId)) ?? fallback;
  }

  async setPrefix(guildId: string, prefix: string): Promise<void> {
    await this.prefixes.put(guildId, prefix);
  }

  async getOrCreateUserProfile(contextId: string, userId: string, username: string): Promise<UserProfile> {
    const existing = await this.profiles.get([contextId, userId]);
    if (existing !== undefined) {
      return existing;
    }
    const profile = UserProfile.create(username);
    await this.profiles.set(profile, [contextId, userId]);
    return profile;
  }

  /**
   * @returns The updated profile and whether it gained a level
   */
  async awardExperience(
    contextId: string,
    userId: string,
    username: string,
    amount: number = 10
  ): Promise<{ profile: UserProfile; levelledUp: boolean }> {
    const profile = await this.getOrCreateUserProfile(contextId, userId, username);
    profile.username = username;
    const levelledUp = profile.award(amount);
    await this.profiles.set(profile, [contextId, userId]);
    return { profile, levelledUp };
  }

  /**
   * Top profiles of one context by experience
   */
  async getTopUsers(contextId: string, limit: number): Promise<UserProfile[]> {
    const entries = await this.profiles.entries();
    return entries
      .filter(({ path }) => path[0] === contextId)
      .map(({ value }) => value)
      .sort((a, b) => b.experience - a.experience)
      .slice(0, limit);
  }

  async recordCommand(contextId: string, userId: string, command: string): Promise<number> {
    const path = [contextId, userId, command];
    const count = ((await this.usage.get(path)) ?? 0) + 1;
    await this.usage.set(count, path);
    return count;
  }

  /**
   * Usage counts of a user's commands, most used first
   */
  async getCommandUsage(contextId: string, userId: string): Promise<Array<[string, number]>> {
    const entries = await this.usage.entries();
    return entries
      .filter(({ path }) => path[0] === contextId && path[1] === userId)
      .map(({ path, value }): [string, number] => [path[2] ?? '', value])
      .sort(([, a], [, b]) => b - a);
  }
}
