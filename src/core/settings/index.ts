export * from './types.js';
export * from './queries.js';
export * from './default-value.js';
export * from './properties.js';
export * from './extractor.js';
