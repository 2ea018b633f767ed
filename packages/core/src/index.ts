export * from './configuration/index.js';
export * from './interpol/index.js';
export * from './tree/index.js';
export * from './expr/index.js';
export * from './convert/index.js';
export * from './errors/index.js';

// Logging with redaction
export * from './logging/index.js';
