/**
 * Flat string form of a list of strings: elements joined with `;`, with `&`,
 * `;` and the empty element escaped so the join is reversible
 */

const SEPARATOR = ';';
const EMPTY = '&empty';

const escapeElement = (element: string): string =>
  element === '' ? EMPTY : element.replaceAll('&', '&amp').replaceAll(';', '&scln');

const unescapeElement = (element: string): string =>
  element === EMPTY ? '' : element.replaceAll('&scln', ';').replaceAll('&amp', '&');

export const encodeList = (elements: readonly string[]): string =>
  elements.map(escapeElement).join(SEPARATOR);

/**
 * Inverse of {@link encodeList}; `""` is the empty list
 */
export const decodeList = (encoded: string): string[] =>
  encoded === '' ? [] : encoded.split(SEPARATOR).map(unescapeElement);
