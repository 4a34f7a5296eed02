/**
 * Manifest module: loading, validation, typed views and text patching.
 *
 * @module manifest
 */

export * from './types.js';
export * from './values.js';
export * from './validator.js';
export * from './loader.js';
export * from './patcher.js';
