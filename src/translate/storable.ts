import type { Data } from '../data/index.js';
import { AbstractTranslator } from './translator.js';

/**
 * An object that knows how to write itself as `Data` and read itself back
 */
export interface Storable {
  toData(): Data;
  fromData(data: Data): void;
}

/**
 * Translates `Storable` objects; `create` supplies a blank instance for each decode
 *
 * @example
 * ```typescript
 * const settings = new StorableTranslator(() => new GuildSettings());
 * ```
 */
export class StorableTranslator<T extends Storable> extends AbstractTranslator<T> {
  readonly kind = 'storable';

  constructor(private readonly create: () => T) {
    super();
  }

  toData(value: T): Data {
    return value.toData();
  }

  fromData(data: Data): T {
    const value = this.create();
    value.fromData(data);
    return value;
  }
}
