export { StorageEngine } from './engine.js';
export { Tree, compareKeys } from './tree.js';
export type { Bound, Entry, RangeOptions, PersistHook } from './tree.js';
