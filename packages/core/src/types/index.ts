export type * from './engine.js';
export type * from './stream.js';
