/**
 * @fileoverview Runtime module public exports.
 *
 * @module research-loop/runtime
 * @version 0.1.0
 */

export {
  ToolRegistry,
  DEFAULT_REGISTRY_CONFIG,
  type ToolRegistryConfig,
  type ToolRegistryEvents,
} from './tool-registry.js';

export {
  ContextManager,
  MIN_UNIT_ALLOWANCE,
  clipText,
  clipSummary,
  measure,
  summarizeEvictedSteps,
  type ContextManagerOptions,
  type ContextSummarizer,
  type NewContextEntry,
} from './context-manager.js';

export { withDeadline, type DeadlineOptions } from './deadline.js';
