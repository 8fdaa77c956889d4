/**
 * @fileoverview research-loop public API.
 *
 * A single research agent: a planner backed by a language model decides
 * which tool to call next, the loop executes it and folds the observation
 * into a bounded context, and a synthesizer writes the final report.
 *
 * @example
 * ```typescript
 * import {
 *   AgentLoop,
 *   BackendPlanner,
 *   ToolRegistry,
 *   createBackend,
 *   createFetchPageTool,
 * } from 'research-loop';
 *
 * const registry = new ToolRegistry();
 * registry.register(createFetchPageTool());
 *
 * const backend = createBackend({ model: 'claude-3-5-sonnet-20241022', anthropicApiKey });
 * const loop = new AgentLoop({ registry, planner: new BackendPlanner(backend) });
 * const result = await loop.run({ title: 'Exampletown', instruction: 'How many people live there?' });
 * ```
 *
 * @module research-loop
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './runtime/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './providers/index.js';
export * from './tools/index.js';
