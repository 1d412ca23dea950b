/**
 * setting-extractor - configuration setting metadata from Java syntax trees.
 * Main library exports barrel file.
 */

// Syntax trees and path queries
export * from './core/tree/index.js';

// Setting extraction
export * from './core/settings/index.js';

// Tree sources
export * from './core/parser/index.js';

// Scanning and output
export * from './core/scan/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
