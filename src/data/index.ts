/**
 * Canonical intermediate representation for persisted values
 *
 * A `Data` holds exactly one of: a string, a number (kept as its decimal
 * text), a boolean, null, a list of `Data` or a map of strings to `Data`.
 * Instances are immutable, and equality is structural and variant-aware.
 */

import { ArgumentError, TranslationError } from '../errors.js';
import { encodeDataJson } from './json.js';

export type DataType = 'string' | 'number' | 'boolean' | 'null' | 'list' | 'map';

/**
 * Raw variant fields; exactly one must be populated
 */
export interface DataFields {
  string?: string;
  number?: string;
  boolean?: boolean;
  null?: true;
  list?: Iterable<Data>;
  map?: ReadonlyMap<string, Data>;
}

const NUMBER_LITERAL = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)$/;

const FLOAT_TOKENS = new Set(['NaN', '+NaN', '-NaN', 'Infinity', '+Infinity', '-Infinity']);

export const isNumberLiteral = (text: string): boolean => NUMBER_LITERAL.test(text);

const hashString = (value: string): number => {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0;
  }
  return hash;
};

const isReadonlyMap = (
  value: ReadonlyMap<string, Data> | Readonly<Record<string, Data>>
): value is ReadonlyMap<string, Data> => value instanceof Map;

/**
 * Formats a number so that its text always reads as floating-point
 */
const toFloatText = (value: number): string => {
  const text = String(value);
  if (text.includes('.') || FLOAT_TOKENS.has(text)) {
    return text;
  }
  const exponent = text.search(/e/i);
  return exponent === -1 ? `${text}.0` : `${text.slice(0, exponent)}.0${text.slice(exponent)}`;
};

export class Data {
  readonly type: DataType;

  private readonly stringValue?: string;
  private readonly numberValue?: string;
  private readonly booleanValue?: boolean;
  private readonly listValue?: readonly Data[];
  private readonly mapValue?: ReadonlyMap<string, Data>;

  constructor(fields: DataFields) {
    const populated: DataType[] = [];
    if (fields.string !== undefined) populated.push('string');
    if (fields.number !== undefined) populated.push('number');
    if (fields.boolean !== undefined) populated.push('boolean');
    if (fields.null === true) populated.push('null');
    if (fields.list !== undefined) populated.push('list');
    if (fields.map !== undefined) populated.push('map');

    if (populated.length === 0) {
      throw new ArgumentError('Missing data value.');
    }
    if (populated.length > 1) {
      throw new ArgumentError('Multiple data values.');
    }
    this.type = populated[0];

    if (fields.number !== undefined && !isNumberLiteral(fields.number)) {
      throw new TranslationError(`Not a valid number: '${fields.number}'`);
    }

    this.stringValue = fields.string;
    this.numberValue = fields.number;
    this.booleanValue = fields.boolean;

    if (fields.list !== undefined) {
      const list: Data[] = [];
      for (const element of fields.list) {
        if (!(element instanceof Data)) {
          throw new ArgumentError('Given list contains null.');
        }
        list.push(element);
      }
      this.listValue = Object.freeze(list);
    }

    if (fields.map !== undefined) {
      const map = new Map<string, Data>();
      for (const [key, value] of fields.map) {
        if (typeof key !== 'string') {
          throw new ArgumentError('Given map contains null key.');
        }
        if (!(value instanceof Data)) {
          throw new ArgumentError('Given map contains null value.');
        }
        map.set(key, value);
      }
      this.mapValue = map;
    }

    Object.freeze(this);
  }

  static stringData(value: string | null): Data {
    return value === null ? Data.nullData() : new Data({ string: value });
  }

  /**
   * Number data from a decimal literal, a number or a bigint.
   * Integral numbers produce integer text (`42`); use {@link Data.floatData}
   * to keep an integral value floating-point.
   */
  static numberData(value: string | number | bigint | null): Data {
    if (value === null) {
      return Data.nullData();
    }
    return new Data({ number: String(value) });
  }

  /**
   * Number data that is always floating-point (`42` becomes `42.0`)
   */
  static floatData(value: number): Data {
    return new Data({ number: toFloatText(value) });
  }

  static booleanData(value: boolean): Data {
    return new Data({ boolean: value });
  }

  static nullData(): Data {
    return NULL_DATA;
  }

  static listData(elements: Iterable<Data> | null): Data {
    return elements === null ? Data.nullData() : new Data({ list: elements });
  }

  static listOf(...elements: Data[]): Data {
    return new Data({ list: elements });
  }

  static mapData(entries: ReadonlyMap<string, Data> | Readonly<Record<string, Data>> | null): Data {
    if (entries === null) {
      return Data.nullData();
    }
    return new Data({ map: isReadonlyMap(entries) ? entries : new Map(Object.entries(entries)) });
  }

  isString(): boolean {
    return this.type === 'string';
  }

  getString(): string | undefined {
    return this.stringValue;
  }

  isNumber(): boolean {
    return this.type === 'number';
  }

  /**
   * Float-ness is read off the text: a decimal point, NaN or an infinity
   */
  isFloat(): boolean {
    const text = this.numberValue;
    return text !== undefined && (text.includes('.') || FLOAT_TOKENS.has(text));
  }

  getNumber(): string | undefined {
    return this.numberValue;
  }

  getNumberFloat(): number {
    return this.numberValue === undefined ? 0 : Number(this.numberValue);
  }

  /**
   * The number truncated towards zero, or 0 if this is not number data
   */
  getNumberInteger(): number {
    if (this.numberValue === undefined) {
      return 0;
    }
    const value = Math.trunc(Number(this.numberValue));
    return Object.is(value, -0) ? 0 : value;
  }

  isBoolean(): boolean {
    return this.type === 'boolean';
  }

  getBoolean(): boolean {
    return this.booleanValue === true;
  }

  isNull(): boolean {
    return this.type === 'null';
  }

  isList(): boolean {
    return this.type === 'list';
  }

  getList(): readonly Data[] | undefined {
    return this.listValue;
  }

  isMap(): boolean {
    return this.type === 'map';
  }

  getMap(): ReadonlyMap<string, Data> | undefined {
    return this.mapValue;
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof Data) || other.type !== this.type) {
      return false;
    }
    switch (this.type) {
      case 'string':
        return this.stringValue === other.stringValue;
      case 'number':
        return this.numberValue === other.numberValue;
      case 'boolean':
        return this.booleanValue === other.booleanValue;
      case 'null':
        return true;
      case 'list': {
        const mine = this.listValue ?? [];
        const theirs = other.listValue ?? [];
        return mine.length === theirs.length && mine.every((element, i) => element.equals(theirs[i]));
      }
      case 'map': {
        const mine = this.mapValue ?? new Map<string, Data>();
        const theirs = other.mapValue ?? new Map<string, Data>();
        if (mine.size !== theirs.size) {
          return false;
        }
        for (const [key, value] of mine) {
          const match = theirs.get(key);
          if (match === undefined || !value.equals(match)) {
            return false;
          }
        }
        return true;
      }
    }
  }

  hashCode(): number {
    switch (this.type) {
      case 'string':
        return hashString(this.stringValue ?? '');
      case 'number':
        return hashString(this.numberValue ?? '');
      case 'boolean':
        return this.booleanValue ? 1 : 0;
      case 'null':
        return 0;
      case 'list': {
        let hash = 1;
        for (const element of this.listValue ?? []) {
          hash = (Math.imul(hash, 31) + element.hashCode()) | 0;
        }
        return hash;
      }
      case 'map': {
        // Order-independent, like the equality it backs
        let hash = 0;
        for (const [key, value] of this.mapValue ?? []) {
          hash = (hash + (hashString(key) ^ value.hashCode())) | 0;
        }
        return hash;
      }
    }
  }

  toString(): string {
    return encodeDataJson(this);
  }
}

const NULL_DATA = new Data({ null: true });

export { encodeDataJson, decodeDataJson } from './json.js';
