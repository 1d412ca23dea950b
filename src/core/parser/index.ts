export * from './types.js';
export * from './service-client.js';
export * from './json-source.js';
