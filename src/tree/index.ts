export type { DataMap, Tree, TreeEntry, MapEntry } from './types.js';
export { MappedTree } from './mapped-tree.js';
