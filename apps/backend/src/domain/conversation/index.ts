export * from './vector.js';
export * from './filter.js';
export * from './stats.js';
