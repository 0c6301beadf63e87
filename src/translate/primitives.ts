import { Data } from '../data/index.js';
import { TranslationError } from '../errors.js';
import { AbstractTranslator, expectType, type Translator } from './translator.js';

export class StringTranslator implements Translator<string> {
  readonly kind = 'string';

  encode(value: string): string {
    return value;
  }

  decode(encoded: string): string {
    return encoded;
  }

  toData(value: string): Data {
    return Data.stringData(value);
  }

  fromData(data: Data): string {
    expectType(data, 'string');
    return data.getString() ?? '';
  }
}

/**
 * Safe integers; encoded as bare decimal text (`42`)
 */
export class IntegerTranslator implements Translator<number> {
  readonly kind = 'integer';

  encode(value: number): string {
    return String(this.check(value));
  }

  decode(encoded: string): number {
    if (!/^[+-]?\d+$/.test(encoded)) {
      throw new TranslationError(`Not an integer: '${encoded}'`);
    }
    return this.check(Number(encoded));
  }

  toData(value: number): Data {
    return Data.numberData(this.check(value));
  }

  fromData(data: Data): number {
    expectType(data, 'number');
    if (data.isFloat()) {
      throw new TranslationError(`Not an integer: '${data.getNumber() ?? ''}'`);
    }
    return this.check(data.getNumberFloat());
  }

  private check(value: number): number {
    if (!Number.isSafeInteger(value)) {
      throw new TranslationError(`Not a safe integer: ${value}`);
    }
    return value;
  }
}

export class FloatTranslator implements Translator<number> {
  readonly kind = 'float';

  encode(value: number): string {
    return this.toData(value).getNumber() ?? '';
  }

  decode(encoded: string): number {
    return this.fromData(Data.numberData(encoded));
  }

  toData(value: number): Data {
    return Data.floatData(value);
  }

  fromData(data: Data): number {
    expectType(data, 'number');
    return data.getNumberFloat();
  }
}

export class BooleanTranslator implements Translator<boolean> {
  readonly kind = 'boolean';

  encode(value: boolean): string {
    return value ? 'true' : 'false';
  }

  decode(encoded: string): boolean {
    if (encoded === 'true') return true;
    if (encoded === 'false') return false;
    throw new TranslationError(`Not a boolean: '${encoded}'`);
  }

  toData(value: boolean): Data {
    return Data.booleanData(value);
  }

  fromData(data: Data): boolean {
    expectType(data, 'boolean');
    return data.getBoolean();
  }
}

/**
 * Identity on `Data`; the string form is its JSON text
 */
export class DataTranslator extends AbstractTranslator<Data> {
  readonly kind = 'data';

  toData(value: Data): Data {
    return value;
  }

  fromData(data: Data): Data {
    return data;
  }
}
