/**
 * JSON text form of `Data`
 *
 * Numbers are written as their canonical text rather than through
 * `JSON.stringify`, so `42.0` stays distinguishable from `42` and the
 * non-finite values round-trip as the bare tokens `NaN` / `Infinity`.
 */

import { TranslationError } from '../errors.js';
import { Data } from './index.js';

export const encodeDataJson = (data: Data): string => {
  switch (data.type) {
    case 'string':
      return JSON.stringify(data.getString() ?? '');
    case 'number':
      return data.getNumber() ?? '0';
    case 'boolean':
      return data.getBoolean() ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'list':
      return `[${(data.getList() ?? []).map(encodeDataJson).join(',')}]`;
    case 'map': {
      const members: string[] = [];
      for (const [key, value] of data.getMap() ?? []) {
        members.push(`${JSON.stringify(key)}:${encodeDataJson(value)}`);
      }
      return `{${members.join(',')}}`;
    }
  }
};

const NUMBER_TOKEN = /[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/y;

class DataReader {
  private position = 0;

  constructor(private readonly text: string) {}

  readDocument(): Data {
    const data = this.readValue();
    this.skipWhitespace();
    if (this.position < this.text.length) {
      throw this.error('Unexpected trailing content');
    }
    return data;
  }

  private readValue(): Data {
    this.skipWhitespace();
    const next: string | undefined = this.text[this.position];
    switch (next) {
      case '"':
        return Data.stringData(this.readString());
      case '[':
        return this.readList();
      case '{':
        return this.readMap();
      case 't':
        this.expectWord('true');
        return Data.booleanData(true);
      case 'f':
        this.expectWord('false');
        return Data.booleanData(false);
      case 'n':
        this.expectWord('null');
        return Data.nullData();
      case undefined:
        throw this.error('Unexpected end of input');
      default:
        return this.readNumber();
    }
  }

  private readNumber(): Data {
    NUMBER_TOKEN.lastIndex = this.position;
    const match = NUMBER_TOKEN.exec(this.text);
    if (match === null) {
      throw this.error('Unexpected character');
    }
    this.position += match[0].length;
    return Data.numberData(match[0]);
  }

  private readString(): string {
    const start = this.position;
    this.position++; // opening quote
    while (this.position < this.text.length) {
      const char = this.text[this.position];
      if (char === '\\') {
        this.position += 2;
      } else if (char === '"') {
        this.position++;
        try {
          const parsed: unknown = JSON.parse(this.text.slice(start, this.position));
          if (typeof parsed === 'string') {
            return parsed;
          }
        } catch (error) {
          throw this.error('Malformed string', error);
        }
        throw this.error('Malformed string');
      } else {
        this.position++;
      }
    }
    throw this.error('Unterminated string');
  }

  private readList(): Data {
    this.position++; // [
    const elements: Data[] = [];
    this.skipWhitespace();
    if (this.text[this.position] === ']') {
      this.position++;
      return Data.listData(elements);
    }
    for (;;) {
      elements.push(this.readValue());
      this.skipWhitespace();
      const separator = this.text[this.position++];
      if (separator === ']') {
        return Data.listData(elements);
      }
      if (separator !== ',') {
        throw this.error("Expected ',' or ']'");
      }
    }
  }

  private readMap(): Data {
    this.position++; // {
    const entries = new Map<string, Data>();
    this.skipWhitespace();
    if (this.text[this.position] === '}') {
      this.position++;
      return Data.mapData(entries);
    }
    for (;;) {
      this.skipWhitespace();
      if (this.text[this.position] !== '"') {
        throw this.error('Expected a member name');
      }
      const key = this.readString();
      this.skipWhitespace();
      if (this.text[this.position++] !== ':') {
        throw this.error("Expected ':'");
      }
      entries.set(key, this.readValue());
      this.skipWhitespace();
      const separator = this.text[this.position++];
      if (separator === '}') {
        return Data.mapData(entries);
      }
      if (separator !== ',') {
        throw this.error("Expected ',' or '}'");
      }
    }
  }

  private expectWord(word: string): void {
    if (!this.text.startsWith(word, this.position)) {
      throw this.error('Unexpected character');
    }
    this.position += word.length;
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.text[this.position] ?? '')) {
      this.position++;
    }
  }

  private error(reason: string, cause?: unknown): TranslationError {
    return new TranslationError(`${reason} at position ${this.position} of data text.`, { cause });
  }
}

export const decodeDataJson = (text: string): Data => new DataReader(text).readDocument();
