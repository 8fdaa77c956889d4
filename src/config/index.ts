/**
 * @fileoverview Configuration module public exports.
 *
 * @module research-loop/config
 * @version 0.1.0
 */

export {
  DEFAULT_RUN_CONFIG,
  resolveRunConfig,
  loadEnvironment,
  type RunConfig,
  type EnvironmentConfig,
} from './run-config.js';
