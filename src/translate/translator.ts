/**
 * Two-way conversion between application values, their string encoding and `Data`
 */

import { Data, decodeDataJson, encodeDataJson } from '../data/index.js';
import { TranslationError } from '../errors.js';

export interface Translator<T> {
  /**
   * Type tag; two translators are interchangeable for a view when their kinds match
   */
  readonly kind: string;

  encode(value: T): string;
  decode(encoded: string): T;
  toData(value: T): Data;
  fromData(data: Data): T;
}

/**
 * Base for translators whose string form is the JSON text of their `Data` form
 */
export abstract class AbstractTranslator<T> implements Translator<T> {
  abstract readonly kind: string;

  abstract toData(value: T): Data;
  abstract fromData(data: Data): T;

  encode(value: T): string {
    return encodeDataJson(this.toData(value));
  }

  decode(encoded: string): T {
    return this.fromData(decodeDataJson(encoded));
  }
}

export const sameKind = (a: { readonly kind: string }, b: { readonly kind: string }): boolean =>
  a.kind === b.kind;

export const expectType = (data: Data, expected: Data['type']): void => {
  if (data.type !== expected) {
    throw new TranslationError(`Expected ${expected} data, got ${data.type}.`);
  }
};
