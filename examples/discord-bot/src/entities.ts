import { Data, TranslationError, type Storable } from '../../../src/index.js';

export interface UserProfileData {
  username: string;
  level: number;
  experience: number;
  createdAt: string;
}

const requireField = (fields: ReadonlyMap<string, Data>, name: string): Data => {
  const value = fields.get(name);
  if (value === undefined) {
    throw new TranslationError(`User profile is missing '${name}'.`);
  }
  return value;
};

/**
 * User profile stored per context: the guild in servers, the user in DMs
 */
export class UserProfile implements Storable, UserProfileData {
  username = '';
  level = 1;
  experience = 0;
  createdAt = new Date(0).toISOString();

  static create(username: string): UserProfile {
    const profile = new UserProfile();
    profile.username = username;
    profile.createdAt = new Date().toISOString();
    return profile;
  }

  /**
   * Adds experience, levelling up every 100 points
   *
   * @returns Whether the profile gained a level
   */
  award(amount: number): boolean {
    this.experience += amount;
    const level = Math.floor(this.experience / 100) + 1;
    const levelledUp = level > this.level;
    this.level = level;
    return levelledUp;
  }

  toData(): Data {
    return Data.mapData({
      username: Data.stringData(this.username),
      level: Data.numberData(this.level),
      experience: Data.numberData(this.experience),
      createdAt: Data.stringData(this.createdAt)
    });
  }

  fromData(data: Data): void {
    const fields = data.getMap();
    if (fields === undefined) {
      throw new TranslationError(`Expected map data for a user profile, got ${data.type}.`);
    }
    this.username = requireField(fields, 'username').getString() ?? '';
    this.level = requireField(fields, 'level').getNumberInteger();
    this.experience = requireField(fields, 'experience').getNumberInteger();
    this.createdAt = requireField(fields, 'createdAt').getString() ?? this.createdAt;
  }
}
