export * from './logging/index.js';
export * from './utils/index.js';
