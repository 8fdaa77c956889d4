/**
 * @fileoverview Type definitions public exports.
 *
 * @module research-loop/types
 * @version 0.1.0
 */

export * from './core.types.js';
export * from './context.types.js';
export * from './tools.types.js';
export * from './errors.js';
