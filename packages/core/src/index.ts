/**
 * @lineproto-csv/core
 *
 * Line protocol parsing, schema unification and CSV emission
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Line parser
export * from './parser/index.js';

// Schema unification and CSV output
export * from './conversion/index.js';
