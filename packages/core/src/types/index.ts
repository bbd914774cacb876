export * from './record.js';
export * from './schema.js';
export * from './diagnostic.js';
