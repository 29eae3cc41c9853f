/**
 * Domain types, parsers and capability contracts shared by every package
 */

export * from './types.js';
export * from './errors.js';
export * from './filename.js';
export * from './signature.js';
export * from './objects.js';
export * from './capabilities.js';
