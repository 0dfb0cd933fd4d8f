export type * from './logging/index.js';
export type * from './mobile/index.js';
export type * from './module/index.js';
export type * from './views/index.js';
