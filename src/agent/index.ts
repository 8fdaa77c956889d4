/**
 * @fileoverview Agent module public exports.
 *
 * @module research-loop/agent
 * @version 0.1.0
 */

export {
  AgentLoop,
  type AgentLoopEvents,
  type AgentLoopOptions,
  type RunOptions,
} from './agent-loop.js';

export {
  LifecycleController,
  LifecycleTransitionError,
  type LifecycleEvents,
  type PhaseMetadata,
  type LifecycleError,
  type LifecycleState,
  type PhaseHistoryEntry,
} from './lifecycle.js';

export {
  BackendPlanner,
  createScriptedPlanner,
  type Planner,
  type PlannerInput,
  type BackendPlannerConfig,
  type ScriptedTurn,
} from './planner.js';

export {
  DigestSynthesizer,
  ModelSynthesizer,
  markBestEffort,
  type Synthesizer,
  type SynthesisInput,
  type DigestSynthesizerConfig,
  type ModelSynthesizerConfig,
} from './synthesizer.js';

export {
  buildSystemInstructions,
  formatTask,
  renderObservation,
} from './prompt.js';

export { encodeRunResult, decodeRunResult, RunResultSchema } from './run-result-codec.js';
