/**
 * @fileoverview Context Manager - the bounded view handed to the planner.
 *
 * The context holds pinned entries (system instructions, task) followed by
 * step units: the action/observation entries of one step, which are always
 * evicted or retained together. When the view would exceed its character
 * budget, units are evicted oldest-first and the evicted prefix is replaced by
 * a single summary entry.
 *
 * Budget layout:
 * ```
 *   budget = pinned + summaryMaxChars + preserveRecentSteps × unitAllowance
 * ```
 * Every appended unit is clipped to `unitAllowance`, so the pinned entries,
 * the summary and the newest `preserveRecentSteps` units always fit.
 *
 * @module research-loop/runtime/context-manager
 * @version 0.1.0
 */

import type { ContextEntry, ContextEntryKind, ContextRole } from '../types/context.types.js';
import { ConfigurationError } from '../types/errors.js';

/**
 * Smallest per-unit allowance that still leaves room for a useful
 * action line and a clipped observation.
 */
export const MIN_UNIT_ALLOWANCE = 200;

const TRUNCATION_MARKER = ' …[truncated]';
const OMITTED_LINES = '- …';

/**
 * Entry as supplied by callers. `pinned` and `step` are set by the manager.
 */
export interface NewContextEntry {
  readonly role: ContextRole;
  readonly kind: ContextEntryKind;
  readonly content: string;
}

/**
 * Builds the summary content for the evicted prefix.
 */
export type ContextSummarizer = (evicted: ReadonlyArray<ReadonlyArray<ContextEntry>>) => string;

export interface ContextManagerOptions {
  /** Maximum total characters of content in the view */
  readonly budgetChars: number;

  /** Number of most recent step units that are never evicted */
  readonly preserveRecentSteps: number;

  /** Upper bound on the summary entry's content */
  readonly summaryMaxChars: number;

  readonly summarizer?: ContextSummarizer;
}

interface StepUnit {
  readonly step: number;
  readonly entries: ReadonlyArray<ContextEntry>;
}

/**
 * Owns one run's context. Not shared between runs.
 *
 * @example
 * ```typescript
 * const context = new ContextManager(
 *   [{ role: 'system', kind: 'instructions', content: instructions },
 *    { role: 'user', kind: 'task', content: task }],
 *   { budgetChars: 24_000, preserveRecentSteps: 3, summaryMaxChars: 2_000 },
 * );
 * context.appendStep(1, [action, observation]);
 * const view = context.view();
 * ```
 */
export class ContextManager {
  private readonly pinned: ReadonlyArray<ContextEntry>;
  private readonly options: Required<ContextManagerOptions>;
  private readonly unitAllowance: number;
  private readonly units: StepUnit[] = [];
  private readonly evicted: StepUnit[] = [];
  private summary: ContextEntry | null = null;

  /**
   * @throws ConfigurationError when the pinned entries cannot fit the budget
   * alongside the summary and the preserved steps
   */
  constructor(pinned: ReadonlyArray<NewContextEntry>, options: ContextManagerOptions) {
    if (!Number.isInteger(options.budgetChars) || options.budgetChars <= 0) {
      throw new ConfigurationError('Context budget must be a positive integer');
    }
    if (!Number.isInteger(options.preserveRecentSteps) || options.preserveRecentSteps < 1) {
      throw new ConfigurationError('preserveRecentSteps must be at least 1');
    }
    if (!Number.isInteger(options.summaryMaxChars) || options.summaryMaxChars < 0) {
      throw new ConfigurationError('summaryMaxChars must be a non-negative integer');
    }

    this.pinned = pinned.map(entry => ({ ...entry, pinned: true, step: null }));
    this.options = { ...options, summarizer: options.summarizer ?? summarizeEvictedSteps };

    const pinnedSize = measure(this.pinned);
    const available = options.budgetChars - pinnedSize - options.summaryMaxChars;
    this.unitAllowance = Math.floor(available / options.preserveRecentSteps);

    if (this.unitAllowance < MIN_UNIT_ALLOWANCE) {
      throw new ConfigurationError(
        `Context budget of ${options.budgetChars} chars leaves ${Math.max(this.unitAllowance, 0)} chars per step ` +
        `(pinned entries use ${pinnedSize}, summary reserves ${options.summaryMaxChars}); ` +
        `at least ${MIN_UNIT_ALLOWANCE} are required`,
      );
    }
  }

  /**
   * Characters available to a single step unit.
   */
  get stepAllowance(): number {
    return this.unitAllowance;
  }

  /**
   * Number of step units evicted so far.
   */
  get evictedSteps(): number {
    return this.evicted.length;
  }

  /**
   * Appends a single entry as its own unit.
   */
  append(step: number, entry: NewContextEntry): void {
    this.appendStep(step, [entry]);
  }

  /**
   * Appends the entries of one step as an atomic unit, clipping them to the
   * per-unit allowance, then evicts old units until the view fits.
   */
  appendStep(step: number, entries: ReadonlyArray<NewContextEntry>): void {
    if (entries.length === 0) return;

    const clipped = clipUnit(
      entries.map(entry => ({ ...entry, pinned: false, step })),
      this.unitAllowance,
    );
    this.units.push({ step, entries: clipped });
    this.enforceBudget();
  }

  /**
   * The bounded view: pinned entries, then the summary (if any), then the
   * retained units in order.
   */
  view(): ReadonlyArray<ContextEntry> {
    const entries: ContextEntry[] = [...this.pinned];
    if (this.summary) entries.push(this.summary);
    for (const unit of this.units) {
      entries.push(...unit.entries);
    }
    return entries;
  }

  /**
   * Total characters of content in the current view.
   */
  size(): number {
    return measure(this.view());
  }

  // ============ Private Methods ============

  private enforceBudget(): void {
    while (this.size() > this.options.budgetChars && this.units.length > this.options.preserveRecentSteps) {
      const oldest = this.units.shift();
      if (!oldest) break;
      this.evicted.push(oldest);
      this.summary = this.buildSummary();
    }
  }

  private buildSummary(): ContextEntry | null {
    if (this.options.summaryMaxChars === 0) return null;

    const content = clipSummary(
      this.options.summarizer(this.evicted.map(unit => unit.entries)),
      this.options.summaryMaxChars,
    );
    if (content === '') return null;

    return { role: 'user', kind: 'summary', content, pinned: false, step: null };
  }
}

/**
 * Total characters of content across entries.
 */
export function measure(entries: ReadonlyArray<{ readonly content: string }>): number {
  let total = 0;
  for (const entry of entries) {
    total += entry.content.length;
  }
  return total;
}

/**
 * Cuts text to at most `maxChars`, ending with a truncation marker when cut.
 */
export function clipText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  if (maxChars <= TRUNCATION_MARKER.length) return text.slice(0, Math.max(maxChars, 0));
  return text.slice(0, maxChars - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}

/**
 * Cuts a summary to at most `maxChars`, keeping its first line and the
 * newest lines. Dropped lines are replaced by a single omission line; when
 * not even the newest line fits, it is clipped.
 */
export function clipSummary(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const [header = '', ...lines] = text.split('\n');
  const omission = lines.length > 1 ? [OMITTED_LINES] : [];
  const fixed = header.length + (lines.length > 1 ? 1 + OMITTED_LINES.length : 0);

  const kept: string[] = [];
  let size = fixed;
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? '';
    if (size + 1 + line.length > maxChars) break;
    kept.unshift(line);
    size += 1 + line.length;
  }
  if (kept.length > 0) return [header, ...omission, ...kept].join('\n');

  const newest = lines[lines.length - 1];
  const room = maxChars - fixed - 1;
  if (newest === undefined || room <= 0) return clipText(text, maxChars);
  return [header, ...omission, clipText(newest, room)].join('\n');
}

/**
 * Clips a unit to `allowance` characters. Later entries (the observation)
 * give up space before earlier ones (the action).
 */
function clipUnit(entries: ReadonlyArray<ContextEntry>, allowance: number): ContextEntry[] {
  const result = [...entries];
  let excess = measure(result) - allowance;

  for (let i = result.length - 1; i >= 0 && excess > 0; i--) {
    const entry = result[i];
    if (!entry) continue;
    const target = Math.max(entry.content.length - excess, 0);
    const content = clipText(entry.content, target);
    excess -= entry.content.length - content.length;
    result[i] = { ...entry, content };
  }

  return result;
}

/**
 * Default summarizer: one line per evicted step, built from the first line
 * of each entry.
 */
export function summarizeEvictedSteps(evicted: ReadonlyArray<ReadonlyArray<ContextEntry>>): string {
  const lines = [`Earlier steps omitted from view (${evicted.length}):`];

  for (const unit of evicted) {
    const step = unit[0]?.step ?? 0;
    const parts = unit.map(entry => firstLine(entry.content, 120));
    lines.push(`- #${step} ${parts.join(' → ')}`);
  }

  return lines.join('\n');
}

function firstLine(text: string, maxChars: number): string {
  const newline = text.indexOf('\n');
  const line = newline === -1 ? text : text.slice(0, newline);
  return clipText(line.trim(), maxChars);
}
