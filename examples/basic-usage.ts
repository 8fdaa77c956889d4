/**
 * @fileoverview Basic usage example for the research-loop runtime.
 *
 * Runs offline: the planner replays a fixed script and the search provider
 * serves canned results, so no API key or network access is needed.
 *
 * Run this example:
 *   npx tsx examples/basic-usage.ts
 */

import {
  AgentLoop,
  ConsoleTransport,
  Severity,
  ToolRegistry,
  createLogger,
  createScriptedPlanner,
  createWaitTool,
  createWebSearchTool,
  type SearchProvider,
} from '../src/index.js';

// ============ Setup Logger ============

const logger = createLogger('example', {
  minLevel: Severity.INFO,
  transports: [new ConsoleTransport(true, true)],
});

// ============ Canned Search ============

const searchProvider: SearchProvider = {
  search: async query => [
    {
      title: 'Exampletown - municipal facts',
      url: 'https://example.com/exampletown',
      snippet: `Results for "${query}": Exampletown had 12,345 residents at the last census.`,
    },
  ],
};

// ============ Main Function ============

async function main(): Promise<void> {
  const registry = new ToolRegistry({ logger: logger.child({ module: 'runtime.tools' }) });
  registry.register(createWebSearchTool(searchProvider));
  registry.register(createWaitTool({ minSeconds: 0, maxSeconds: 1 }));

  const planner = createScriptedPlanner([
    {
      kind: 'tool_call',
      toolName: 'web_search',
      arguments: { query: 'Exampletown population', limit: 3 },
      rationale: 'Look for an official figure first.',
    },
    input => ({
      kind: 'finalize',
      answer: `Exampletown has about 12,345 residents (based on ${input.view.length} context entries).`,
    }),
  ]);

  const loop = new AgentLoop({
    registry,
    planner,
    config: { maxSteps: 5 },
    logger: logger.child({ module: 'agent.loop' }),
  });

  loop.on('run:step', (_runId, step) => {
    logger.info(`Step ${step.sequence}: ${step.action.kind} → ${step.outcome}`);
  });

  const result = await loop.run({
    title: 'Exampletown population',
    instruction: 'How many people live in Exampletown?',
  });

  console.log('\n' + (result.finalText ?? `No report (${result.termination})`));
  console.log(`\nTermination: ${result.termination}, tool calls: ${result.toolCallCount}`);
}

main().catch((error: unknown) => {
  logger.fatal('Example failed', {}, error instanceof Error ? error : undefined);
  process.exitCode = 1;
});
