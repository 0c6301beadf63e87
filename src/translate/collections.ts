import { Data, decodeDataJson } from '../data/index.js';
import { TranslationError, describeError } from '../errors.js';
import { decodeList, encodeList } from './list-encoding.js';
import { expectType, type Translator } from './translator.js';

const elementFailure = (index: number, error: unknown): TranslationError =>
  new TranslationError(`Element ${index} could not be translated: ${describeError(error)}`, {
    cause: error
  });

/**
 * Maps each element, failing the whole list on the first element that fails
 */
const mapElements = <A, B>(elements: Iterable<A>, step: (element: A) => B): B[] => {
  const result: B[] = [];
  let index = 0;
  for (const element of elements) {
    try {
      result.push(step(element));
    } catch (error) {
      throw elementFailure(index, error);
    }
    index++;
  }
  return result;
};

/**
 * Lists of `T`. The string form joins the element encodings (see
 * {@link encodeList}), which is also how tree paths are encoded.
 */
export class ListTranslator<T> implements Translator<readonly T[]> {
  readonly kind = 'list';

  constructor(readonly elementTranslator: Translator<T>) {}

  encode(value: readonly T[]): string {
    return encodeList(mapElements(value, (element) => this.elementTranslator.encode(element)));
  }

  decode(encoded: string): T[] {
    return mapElements(decodeList(encoded), (element) => this.elementTranslator.decode(element));
  }

  toData(value: readonly T[]): Data {
    return Data.listData(mapElements(value, (element) => this.elementTranslator.toData(element)));
  }

  fromData(data: Data): T[] {
    expectType(data, 'list');
    return mapElements(data.getList() ?? [], (element) => this.elementTranslator.fromData(element));
  }
}

/**
 * Sets of `T`, stored list-shaped in iteration order
 */
export class SetTranslator<T> implements Translator<ReadonlySet<T>> {
  readonly kind = 'set';

  private readonly list: ListTranslator<T>;

  constructor(elementTranslator: Translator<T>) {
    this.list = new ListTranslator(elementTranslator);
  }

  encode(value: ReadonlySet<T>): string {
    return this.list.encode([...value]);
  }

  decode(encoded: string): Set<T> {
    return new Set(this.list.decode(encoded));
  }

  toData(value: ReadonlySet<T>): Data {
    return this.list.toData([...value]);
  }

  fromData(data: Data): Set<T> {
    return new Set(this.list.fromData(data));
  }
}

/**
 * Maps from `K` to `V`, stored as a `Data` map keyed by the encoded keys
 */
export class MapTranslator<K, V> implements Translator<ReadonlyMap<K, V>> {
  readonly kind = 'map';

  constructor(
    readonly keyTranslator: Translator<K>,
    readonly valueTranslator: Translator<V>
  ) {}

  encode(value: ReadonlyMap<K, V>): string {
    return this.toData(value).toString();
  }

  decode(encoded: string): Map<K, V> {
    return this.fromData(decodeDataJson(encoded));
  }

  toData(value: ReadonlyMap<K, V>): Data {
    const entries = new Map<string, Data>();
    for (const [key, element] of value) {
      try {
        entries.set(this.keyTranslator.encode(key), this.valueTranslator.toData(element));
      } catch (error) {
        throw new TranslationError(`Map entry could not be translated: ${describeError(error)}`, {
          cause: error
        });
      }
    }
    return Data.mapData(entries);
  }

  fromData(data: Data): Map<K, V> {
    expectType(data, 'map');
    const result = new Map<K, V>();
    for (const [key, element] of data.getMap() ?? []) {
      try {
        result.set(this.keyTranslator.decode(key), this.valueTranslator.fromData(element));
      } catch (error) {
        throw new TranslationError(`Map entry '${key}' could not be translated: ${describeError(error)}`, {
          cause: error
        });
      }
    }
    return result;
  }
}
