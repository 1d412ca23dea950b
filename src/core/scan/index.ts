export * from './walker.js';
export * from './output.js';
export * from './driver.js';
