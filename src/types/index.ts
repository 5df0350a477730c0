/**
 * @fileoverview Types module public exports.
 *
 * @module campus-guide/types
 */

export * from './core.types.js';
export * from './transcript.types.js';
export * from './capabilities.types.js';
export * from './tools.types.js';
