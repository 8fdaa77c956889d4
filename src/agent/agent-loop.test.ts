/**
 * @fileoverview Unit tests for AgentLoop
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { AgentLoop } from './agent-loop.js';
import { createScriptedPlanner, type Planner, type PlannerInput } from './planner.js';
import { ModelSynthesizer } from './synthesizer.js';
import {
  ModelProvider,
  type BackendRequest,
  type BackendResponse,
  type ModelBackend,
} from '../providers/base.js';
import { ToolRegistry } from '../runtime/tool-registry.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { SpanStatus, SpanType, type RunTrace } from '../observability/tracer.js';
import type { RunConfig } from '../config/run-config.js';
import {
  BackendUnavailableError,
  ConfigurationError,
  ErrorCode,
  MalformedResponseError,
  RunPhase,
  StepOutcome,
  TerminationReason,
  type Decision,
  type Task,
} from '../types/index.js';

const TASK: Task = {
  title: 'Town population',
  instruction: 'How many people live in Exampletown?',
};

const SEARCH_RESULTS = [{ title: 'Exampletown', url: 'https://example.com/exampletown' }];
const PAGE_TEXT = 'Exampletown has 12,345 residents.';

const quiet = (): Logger => new Logger({ transports: [new MemoryTransport()] });

function createRegistry() {
  const search = vi.fn(async (_args: { query: string }) => SEARCH_RESULTS);
  const fetchPage = vi.fn(async (_args: { url: string }) => PAGE_TEXT);
  const registry = new ToolRegistry({ logger: quiet() });

  registry.register({
    name: 'web_search',
    description: 'Search the web',
    argsSchema: z.object({ query: z.string() }),
    execute: search,
  });
  registry.register({
    name: 'fetch_page',
    description: 'Fetch a page as text',
    argsSchema: z.object({ url: z.string() }),
    execute: fetchPage,
  });

  return { registry, search, fetchPage };
}

function createLoop(
  planner: Planner,
  config: Partial<RunConfig> = {},
  registry: ToolRegistry = createRegistry().registry,
): AgentLoop {
  return new AgentLoop({ registry, planner, config: { retryBackoffMs: 0, ...config }, logger: quiet() });
}

function searchCall(query = 'Exampletown population'): Extract<Decision, { kind: 'tool_call' }> {
  return { kind: 'tool_call', toolName: 'web_search', arguments: { query }, rationale: null };
}

/** Planner that calls the same tool forever */
function repeatingPlanner(decision: Decision): Planner & { readonly calls: number } {
  let calls = 0;
  return {
    get calls(): number {
      return calls;
    },
    async decide(): Promise<Decision> {
      calls++;
      return decision;
    },
  };
}

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('AgentLoop', () => {
  describe('finalizing runs', () => {
    it('should search, fetch and answer', async () => {
      const { registry, search, fetchPage } = createRegistry();
      const views: PlannerInput['view'][] = [];
      const planner = createScriptedPlanner([
        { ...searchCall(), rationale: 'Search first.' },
        { kind: 'tool_call', toolName: 'fetch_page', arguments: { url: 'https://example.com/exampletown' }, rationale: null },
        input => {
          views.push(input.view);
          return { kind: 'finalize', answer: 'About 12,345 people.' };
        },
      ]);

      const result = await createLoop(planner, {}, registry).run(TASK);

      expect(result.termination).toBe(TerminationReason.FINALIZED);
      expect(result.finalText).toBe('# Town population\n\nAbout 12,345 people.');
      expect(result.bestEffort).toBe(false);
      expect(result.error).toBeNull();
      expect(result.toolCallCount).toBe(2);
      expect(result.steps.map(step => step.action.kind)).toEqual(['tool_call', 'tool_call', 'finalize']);
      expect(result.steps.map(step => step.sequence)).toEqual([1, 2, 3]);
      expect(result.steps[0]?.observation).toBe(JSON.stringify(SEARCH_RESULTS, null, 2));
      expect(result.steps[1]?.observation).toBe(PAGE_TEXT);
      expect(result.steps[2]?.observation).toBe('About 12,345 people.');
      expect(search).toHaveBeenCalledTimes(1);
      expect(fetchPage).toHaveBeenCalledTimes(1);

      const lastView = views[0] ?? [];
      expect(lastView.map(entry => entry.kind)).toEqual([
        'instructions', 'task', 'action', 'observation', 'action', 'observation',
      ]);
      expect(lastView[2]?.content).toBe('Search first.\nStep 1: web_search({"query":"Exampletown population"})');
      expect(lastView[5]?.content).toBe(`Observation from fetch_page (step 2):\n${PAGE_TEXT}`);
    });

    it('should pin the task rule into the instructions', async () => {
      const views: PlannerInput['view'][] = [];
      const planner = createScriptedPlanner([input => {
        views.push(input.view);
        return { kind: 'finalize', answer: '42' };
      }]);

      await createLoop(planner).run({ ...TASK, rule: 'Cite every source.' });

      const instructions = views[0]?.[0]?.content ?? '';
      expect(instructions.endsWith('6. MOST IMPORTANT RULE:\nCite every source.')).toBe(true);
      expect(instructions).toContain('- web_search: Search the web');
      expect(views[0]?.[1]?.content).toBe('Task: Town population\n\nHow many people live in Exampletown?');
    });
  });

  describe('budgets', () => {
    it('should synthesize a best-effort answer when the step budget runs out', async () => {
      const planner = createScriptedPlanner([searchCall()]);

      const result = await createLoop(planner).run(TASK, { maxSteps: 1 });

      expect(result.termination).toBe(TerminationReason.MAX_STEPS_EXCEEDED);
      expect(planner.calls).toBe(1);
      expect(result.steps).toHaveLength(1);
      expect(result.bestEffort).toBe(true);
      expect(result.finalText?.startsWith(
        '[Best-effort answer: the step limit was reached before the agent finished]\n\n' +
        '# Town population\n\nFindings (1):\n1. web_search: [',
      )).toBe(true);
    });

    it('should never record more tool calls than the step budget', async () => {
      for (const maxSteps of [1, 2, 3, 5, 8]) {
        const planner = repeatingPlanner(searchCall());

        const result = await createLoop(planner).run(TASK, { maxSteps });

        expect(result.toolCallCount).toBe(maxSteps);
        expect(result.steps.filter(step => step.action.kind === 'tool_call')).toHaveLength(maxSteps);
        expect(planner.calls).toBe(maxSteps);
        expect(result.termination).toBe(TerminationReason.MAX_STEPS_EXCEEDED);
      }
    });

    it('should stop on the wall-clock budget', async () => {
      const registry = new ToolRegistry({ logger: quiet() });
      registry.register({
        name: 'slow_lookup',
        description: 'Takes a while',
        argsSchema: z.object({}),
        execute: async () => {
          await delay(60);
          return 'still looking';
        },
      });
      const planner = repeatingPlanner({ kind: 'tool_call', toolName: 'slow_lookup', arguments: {}, rationale: null });

      const result = await createLoop(planner, { maxWallTimeMs: 30 }, registry).run(TASK);

      expect(result.termination).toBe(TerminationReason.MAX_TIME_EXCEEDED);
      expect(result.steps).toHaveLength(1);
      expect(result.bestEffort).toBe(true);
      expect(result.finalText).toBe(
        '[Best-effort answer: the time limit was reached before the agent finished]\n\n' +
        '# Town population\n\nFindings (1):\n1. slow_lookup: still looking',
      );
    });

    it('should reject invalid budgets before running', async () => {
      const planner = createScriptedPlanner([]);

      expect(() => createLoop(planner, { maxSteps: 0 })).toThrow(ConfigurationError);
      await expect(createLoop(planner).run(TASK, { maxSteps: -1 })).rejects.toBeInstanceOf(ConfigurationError);
      await expect(createLoop(planner, { contextBudgetChars: 500 }).run(TASK)).rejects.toBeInstanceOf(
        ConfigurationError,
      );
      expect(planner.calls).toBe(0);
    });
  });

  describe('tool failures', () => {
    it('should keep going when a tool always fails', async () => {
      const registry = new ToolRegistry({ logger: quiet() });
      registry.register({
        name: 'flaky',
        description: 'Always fails',
        argsSchema: z.object({}),
        execute: async () => {
          throw new Error('upstream returned 503');
        },
      });
      const planner = repeatingPlanner({ kind: 'tool_call', toolName: 'flaky', arguments: {}, rationale: null });

      const result = await createLoop(planner, { maxSteps: 3 }, registry).run(TASK);

      expect(result.termination).toBe(TerminationReason.MAX_STEPS_EXCEEDED);
      expect(result.steps).toHaveLength(3);
      expect(result.steps.every(step => step.outcome === StepOutcome.TOOL_ERROR)).toBe(true);
      expect(result.steps[0]?.errorCode).toBe('TOOL_EXECUTION_ERROR');
      expect(result.steps[0]?.observation).toBe(
        "Error (TOOL_EXECUTION_ERROR): Tool 'flaky' failed: upstream returned 503",
      );
      expect(result.finalText).toBe(
        '[Best-effort answer: the step limit was reached before the agent finished]\n\n' +
        '# Town population\n\nNo tool call succeeded; there are no findings to report.',
      );
    });

    it('should record invalid arguments without calling the tool', async () => {
      const { registry, search } = createRegistry();
      const views: PlannerInput['view'][] = [];
      const planner = createScriptedPlanner([
        { kind: 'tool_call', toolName: 'web_search', arguments: { query: 42 }, rationale: null },
        input => {
          views.push(input.view);
          return { kind: 'finalize', answer: 'unknown' };
        },
      ]);

      const result = await createLoop(planner, {}, registry).run(TASK);

      expect(search).not.toHaveBeenCalled();
      expect(result.toolCallCount).toBe(1);
      expect(result.steps[0]).toMatchObject({
        outcome: StepOutcome.TOOL_ERROR,
        errorCode: 'SCHEMA_MISMATCH',
        observation:
          "Error (SCHEMA_MISMATCH): Arguments for 'web_search' do not match its schema: query: Expected string, received number",
      });
      expect(views[0]?.[3]?.content).toBe(
        "Step 1: web_search failed.\nError (SCHEMA_MISMATCH): Arguments for 'web_search' do not match its schema: " +
        'query: Expected string, received number',
      );
      expect(result.termination).toBe(TerminationReason.FINALIZED);
    });

    it('should tell the planner which tools exist when it names an unknown one', async () => {
      const planner = createScriptedPlanner([
        { kind: 'tool_call', toolName: 'calculator', arguments: { expression: '1+1' }, rationale: null },
        { kind: 'finalize', answer: '2' },
      ]);

      const result = await createLoop(planner).run(TASK);

      expect(result.steps[0]).toMatchObject({
        outcome: StepOutcome.TOOL_ERROR,
        errorCode: 'UNKNOWN_TOOL',
        observation: "Error (UNKNOWN_TOOL): Tool 'calculator' is not registered. Available tools: web_search, fetch_page",
      });
      expect(result.toolCallCount).toBe(1);
    });

    it('should record a timed-out tool as a timeout step', async () => {
      const registry = new ToolRegistry({ logger: quiet() });
      registry.register({
        name: 'hang',
        description: 'Never returns',
        argsSchema: z.object({}),
        execute: () => new Promise<string>(() => undefined),
      });
      const planner = createScriptedPlanner([
        { kind: 'tool_call', toolName: 'hang', arguments: {}, rationale: null },
        { kind: 'finalize', answer: 'gave up waiting' },
      ]);

      const result = await createLoop(planner, { toolTimeoutMs: 20 }, registry).run(TASK);

      expect(result.steps[0]).toMatchObject({
        outcome: StepOutcome.TIMEOUT,
        errorCode: 'TOOL_TIMEOUT',
        observation: "Error (TOOL_TIMEOUT): Tool 'hang' timed out after 20ms",
      });
      expect(result.termination).toBe(TerminationReason.FINALIZED);
    });
  });

  describe('planner failures', () => {
    it('should fail the run once the retries are spent', async () => {
      const planner = createScriptedPlanner([
        new BackendUnavailableError('overloaded'),
        new BackendUnavailableError('overloaded'),
        new BackendUnavailableError('overloaded'),
        { kind: 'finalize', answer: 'never reached' },
      ]);

      const result = await createLoop(planner, { maxPlannerRetries: 2 }).run(TASK);

      expect(result.termination).toBe(TerminationReason.FATAL_ERROR);
      expect(result.finalText).toBeNull();
      expect(result.bestEffort).toBe(false);
      expect(result.error).toBe('overloaded');
      expect(result.toolCallCount).toBe(0);
      expect(result.steps.map(step => step.action)).toEqual([
        { kind: 'planner_failure', attempt: 1 },
        { kind: 'planner_failure', attempt: 2 },
        { kind: 'planner_failure', attempt: 3 },
      ]);
      expect(result.steps[0]).toMatchObject({
        outcome: StepOutcome.BACKEND_ERROR,
        errorCode: 'BACKEND_UNAVAILABLE',
        observation: 'Error (BACKEND_UNAVAILABLE): overloaded',
      });
      expect(planner.calls).toBe(3);
    });

    it('should recover after a transient failure', async () => {
      const planner = createScriptedPlanner([
        new BackendUnavailableError('rate limited', 429),
        { kind: 'finalize', answer: '12,345' },
      ]);

      const result = await createLoop(planner).run(TASK);

      expect(result.termination).toBe(TerminationReason.FINALIZED);
      expect(result.steps.map(step => step.action.kind)).toEqual(['planner_failure', 'finalize']);
      expect(result.toolCallCount).toBe(0);
    });

    it('should feed a malformed reply back to the planner', async () => {
      const views: PlannerInput['view'][] = [];
      const planner = createScriptedPlanner([
        new MalformedResponseError('Backend returned neither a tool call nor a final answer'),
        input => {
          views.push(input.view);
          return { kind: 'finalize', answer: '12,345' };
        },
      ]);

      await createLoop(planner).run(TASK);

      const feedback = views[0]?.[2];
      expect(feedback?.kind).toBe('feedback');
      expect(feedback?.content).toBe(
        'Your previous reply could not be used. ' +
        'Error (MALFORMED_RESPONSE): Backend returned neither a tool call nor a final answer\n' +
        'Reply with exactly one tool call, or with the final answer as plain text.',
      );
    });

    it('should wrap a non-agent error as backend unavailable', async () => {
      const planner = createScriptedPlanner([new Error('socket hang up')]);

      const result = await createLoop(planner, { maxPlannerRetries: 0 }).run(TASK);

      expect(result.termination).toBe(TerminationReason.FATAL_ERROR);
      expect(result.error).toBe('Planner failed: socket hang up');
      expect(result.steps[0]?.errorCode).toBe('BACKEND_UNAVAILABLE');
    });

    it('should not count planner failures against the step budget', async () => {
      const planner = createScriptedPlanner([
        new BackendUnavailableError('overloaded'),
        searchCall(),
        new BackendUnavailableError('overloaded'),
        searchCall('again'),
      ]);

      const result = await createLoop(planner).run(TASK, { maxSteps: 2 });

      expect(result.termination).toBe(TerminationReason.MAX_STEPS_EXCEEDED);
      expect(result.steps).toHaveLength(4);
      expect(result.toolCallCount).toBe(2);
    });
  });

  describe('cancellation', () => {
    it('should end without a report when nothing succeeded', async () => {
      const controller = new AbortController();
      controller.abort();
      const planner = createScriptedPlanner([searchCall()]);

      const result = await createLoop(planner).run(TASK, { signal: controller.signal });

      expect(result.termination).toBe(TerminationReason.CANCELLED);
      expect(result.finalText).toBeNull();
      expect(result.bestEffort).toBe(false);
      expect(result.steps).toHaveLength(0);
      expect(planner.calls).toBe(0);
    });

    it('should synthesize from the steps that succeeded', async () => {
      const controller = new AbortController();
      const planner = createScriptedPlanner([
        searchCall(),
        () => {
          controller.abort();
          return searchCall('again');
        },
      ]);

      const result = await createLoop(planner).run(TASK, { signal: controller.signal });

      expect(result.termination).toBe(TerminationReason.CANCELLED);
      expect(result.steps).toHaveLength(1);
      expect(result.bestEffort).toBe(true);
      expect(result.finalText?.startsWith(
        '[Best-effort answer: the run was cancelled before the agent finished]\n\n# Town population\n\nFindings (1):',
      )).toBe(true);
    });

    it('should treat a planner failure caused by cancellation as cancellation', async () => {
      const controller = new AbortController();
      const planner = createScriptedPlanner([
        () => {
          controller.abort();
          throw new BackendUnavailableError('aborted');
        },
      ]);

      const result = await createLoop(planner).run(TASK, { signal: controller.signal });

      expect(result.termination).toBe(TerminationReason.CANCELLED);
      expect(result.steps).toHaveLength(0);
    });

    it('should interrupt the retry backoff', async () => {
      const controller = new AbortController();
      const planner = createScriptedPlanner([new BackendUnavailableError('overloaded')]);
      setTimeout(() => controller.abort(), 20);

      const startedAt = Date.now();
      const result = await createLoop(planner, { retryBackoffMs: 60_000 }).run(TASK, { signal: controller.signal });

      expect(Date.now() - startedAt).toBeLessThan(5_000);
      expect(result.termination).toBe(TerminationReason.CANCELLED);
      expect(result.steps.map(step => step.action.kind)).toEqual(['planner_failure']);
    });
  });

  describe('deadlines', () => {
    it('should time out a planner that never answers and retry it', async () => {
      const signals: AbortSignal[] = [];
      const planner: Planner = {
        decide: input => {
          if (input.signal) signals.push(input.signal);
          return new Promise<Decision>(() => undefined);
        },
      };

      const result = await createLoop(planner, { plannerTimeoutMs: 20, maxPlannerRetries: 1 }).run(TASK);

      expect(result.termination).toBe(TerminationReason.FATAL_ERROR);
      expect(result.error).toBe('Planner did not decide within 20ms');
      expect(result.steps.map(step => step.errorCode)).toEqual([
        ErrorCode.BACKEND_UNAVAILABLE,
        ErrorCode.BACKEND_UNAVAILABLE,
      ]);
      expect(signals).toHaveLength(2);
      expect(signals.every(signal => signal.aborted)).toBe(true);
    });

    it('should cancel a pending planner call', async () => {
      const controller = new AbortController();
      const planner: Planner = { decide: () => new Promise<Decision>(() => undefined) };
      setTimeout(() => controller.abort(), 20);

      const startedAt = Date.now();
      const result = await createLoop(planner, { plannerTimeoutMs: 60_000 }).run(TASK, { signal: controller.signal });

      expect(Date.now() - startedAt).toBeLessThan(5_000);
      expect(result.termination).toBe(TerminationReason.CANCELLED);
      expect(result.steps).toHaveLength(0);
      expect(result.finalText).toBeNull();
    });

    it('should fall back to the digest when synthesis never answers', async () => {
      const complete = vi.fn((_request: BackendRequest) => new Promise<BackendResponse>(() => undefined));
      const backend: ModelBackend = { provider: ModelProvider.ANTHROPIC, model: 'test-model', complete };
      const loop = new AgentLoop({
        registry: createRegistry().registry,
        planner: repeatingPlanner(searchCall()),
        synthesizer: new ModelSynthesizer(backend, { logger: quiet() }),
        config: { maxSteps: 1, plannerTimeoutMs: 30, retryBackoffMs: 0 },
        logger: quiet(),
      });

      const result = await loop.run(TASK);

      expect(result.termination).toBe(TerminationReason.MAX_STEPS_EXCEEDED);
      expect(result.finalText).toBe(
        '[Best-effort answer: the step limit was reached before the agent finished]\n\n' +
        '# Town population\n\nFindings (1):\n' +
        `1. web_search: ${JSON.stringify(SEARCH_RESULTS, null, 2)}`,
      );
      expect(complete).toHaveBeenCalledTimes(1);
      expect(complete.mock.calls[0]?.[0].signal?.aborted).toBe(true);
    });
  });

  describe('synthesis', () => {
    it('should fall back to the digest when the synthesizer throws', async () => {
      const { registry } = createRegistry();
      const loop = new AgentLoop({
        registry,
        planner: createScriptedPlanner([{ kind: 'finalize', answer: '42' }]),
        synthesizer: {
          synthesize: async () => {
            throw new Error('boom');
          },
        },
        logger: quiet(),
      });

      const result = await loop.run(TASK);

      expect(result.finalText).toBe('# Town population\n\n42');
      expect(result.termination).toBe(TerminationReason.FINALIZED);
    });

    it('should use the digest for a cancelled run without calling the synthesizer', async () => {
      const controller = new AbortController();
      const synthesize = vi.fn(async () => 'model report');
      const loop = new AgentLoop({
        registry: createRegistry().registry,
        planner: createScriptedPlanner([
          searchCall(),
          () => {
            controller.abort();
            return searchCall('again');
          },
        ]),
        synthesizer: { synthesize },
        config: { retryBackoffMs: 0 },
        logger: quiet(),
      });

      const result = await loop.run(TASK, { signal: controller.signal });

      expect(result.termination).toBe(TerminationReason.CANCELLED);
      expect(result.finalText?.startsWith('[Best-effort answer: the run was cancelled')).toBe(true);
      expect(synthesize).not.toHaveBeenCalled();
    });
  });

  describe('events and tracing', () => {
    it('should report phases, steps and a trace', async () => {
      const planner = createScriptedPlanner([
        searchCall(),
        { kind: 'finalize', answer: '12,345' },
      ]);
      const loop = createLoop(planner);
      const phases: RunPhase[] = [];
      const stepSequences: number[] = [];
      const traces: RunTrace[] = [];
      const onComplete = vi.fn();

      loop.on('run:phase', (_runId, _from, to) => phases.push(to));
      loop.on('run:step', (_runId, step) => stepSequences.push(step.sequence));
      loop.on('run:trace', trace => traces.push(trace));
      loop.on('run:complete', onComplete);

      const result = await loop.run(TASK);

      expect(phases).toEqual([
        RunPhase.PLANNING,
        RunPhase.ACTING,
        RunPhase.OBSERVING,
        RunPhase.PLANNING,
        RunPhase.SYNTHESIZING,
        RunPhase.COMPLETE,
      ]);
      expect(stepSequences).toEqual([1, 2]);
      expect(onComplete).toHaveBeenCalledWith(result);

      const trace = traces[0];
      expect(trace?.runId).toBe(result.runId);
      expect(trace?.termination).toBe(TerminationReason.FINALIZED);
      expect(trace?.spans.map(span => span.type)).toEqual([
        SpanType.RUN,
        SpanType.PLANNER,
        SpanType.TOOL,
        SpanType.PLANNER,
        SpanType.SYNTHESIS,
      ]);
      expect(trace?.spans.every(span => span.status === SpanStatus.OK)).toBe(true);
    });

    it('should end in FAILED for a fatal run', async () => {
      const planner = createScriptedPlanner([new BackendUnavailableError('down')]);
      const loop = createLoop(planner, { maxPlannerRetries: 0 });
      const phases: RunPhase[] = [];
      loop.on('run:phase', (_runId, _from, to) => phases.push(to));

      await loop.run(TASK);

      expect(phases).toEqual([RunPhase.PLANNING, RunPhase.FAILED]);
    });
  });

  describe('concurrency', () => {
    it('should keep concurrent runs independent', async () => {
      const { registry, search } = createRegistry();
      const seen = new Map<string, number>();
      const planner: Planner = {
        async decide(input) {
          const task = input.view[1]?.content ?? '';
          const count = seen.get(task) ?? 0;
          seen.set(task, count + 1);
          await delay(5);
          return count === 0
            ? searchCall(task)
            : { kind: 'finalize', answer: `answer for ${task.split('\n')[0] ?? ''}` };
        },
      };
      const loop = createLoop(planner, {}, registry);

      const [alpha, beta] = await Promise.all([
        loop.run({ title: 'Alpha', instruction: 'First question' }),
        loop.run({ title: 'Beta', instruction: 'Second question' }),
      ]);

      expect(alpha.runId).not.toBe(beta.runId);
      expect(alpha.finalText).toBe('# Alpha\n\nanswer for Task: Alpha');
      expect(beta.finalText).toBe('# Beta\n\nanswer for Task: Beta');
      expect(alpha.steps).toHaveLength(2);
      expect(beta.steps).toHaveLength(2);
      expect(alpha.steps[0]?.action).toMatchObject({ arguments: { query: 'Task: Alpha\n\nFirst question' } });
      expect(search).toHaveBeenCalledTimes(2);
    });
  });
});
