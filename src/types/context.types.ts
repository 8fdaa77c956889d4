/**
 * @fileoverview Context and decision type definitions.
 *
 * The context is the bounded material handed to the planner on every
 * iteration. The decision is what the planner hands back.
 *
 * @module research-loop/types/context
 * @version 0.1.0
 */

/**
 * Conversational role of a context entry.
 */
export type ContextRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * What an entry represents inside the run.
 */
export type ContextEntryKind =
  | 'instructions'
  | 'task'
  | 'action'
  | 'observation'
  | 'feedback'
  | 'summary';

/**
 * A single entry of the context.
 */
export interface ContextEntry {
  readonly role: ContextRole;
  readonly kind: ContextEntryKind;
  readonly content: string;

  /** Pinned entries are never evicted */
  readonly pinned: boolean;

  /**
   * Step sequence this entry belongs to. Entries sharing a step are
   * evicted or retained together. Null for pinned entries and the summary.
   */
  readonly step: number | null;
}

/**
 * The decision produced by one planner call.
 */
export type Decision =
  | {
      readonly kind: 'tool_call';
      readonly toolName: string;
      readonly arguments: Readonly<Record<string, unknown>>;
      readonly rationale: string | null;
    }
  | {
      readonly kind: 'finalize';
      readonly answer: string;
    };

/**
 * Provider-agnostic description of a registered tool, as sent to a backend.
 */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;

  /** JSON Schema of the argument object */
  readonly parameters: Readonly<Record<string, unknown>>;
}
