/**
 * @fileoverview Command-line argument parsing.
 *
 * @module research-loop/cli/args
 * @version 0.1.0
 */

import { ConfigurationError } from '../types/errors.js';

export type CliCommand = 'run' | 'tools' | 'help' | 'version';

/**
 * Parsed command line.
 */
export interface CliOptions {
  command: CliCommand;
  title: string | undefined;
  instruction: string | undefined;
  rule: string | undefined;
  maxSteps: number | undefined;
  maxWallTimeMs: number | undefined;
  model: string | undefined;
  json: boolean;
  verbose: boolean;
}

export const HELP_TEXT = `research-loop - autonomous research agent

USAGE:
  research-loop <command> [options]

COMMANDS:
  run           Research a question and print the report
  tools         List available tools
  help          Show this help message
  version       Show version

RUN OPTIONS:
  -t, --title <text>          Short title of the task (report heading)
  -i, --instruction <text>    The question to answer
  -r, --rule <text>           Extra rule that overrides every other instruction
  --max-steps <n>             Tool-call budget (default 10)
  --max-time-ms <n>           Wall-clock budget in milliseconds (default 300000)
  -m, --model <name>          Model, e.g. claude-3-5-sonnet-20241022 or gpt-4o
  --json                      Print the full run result as JSON
  --verbose                   Log at DEBUG level

ENVIRONMENT:
  RESEARCH_MODEL, ANTHROPIC_API_KEY, OPENAI_API_KEY, OPENAI_BASE_URL,
  RESEARCH_MAX_STEPS, RESEARCH_MAX_WALL_TIME_MS, RESEARCH_LOG_LEVEL

EXAMPLES:
  research-loop run -t "Exampletown" -i "How many people live in Exampletown?"
  research-loop run -t "Exampletown" -i "..." --model gpt-4o --json
`;

/**
 * Parses command line arguments (without the node and script paths).
 *
 * @throws ConfigurationError for unknown arguments, missing or malformed
 * values, and a `run` without a title or instruction
 */
export function parseArgs(args: ReadonlyArray<string>): CliOptions {
  const options: CliOptions = {
    command: 'help',
    title: undefined,
    instruction: undefined,
    rule: undefined,
    maxSteps: undefined,
    maxWallTimeMs: undefined,
    model: undefined,
    json: false,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'run':
        options.command = 'run';
        break;

      case 'tools':
        options.command = 'tools';
        break;

      case '-h':
      case '--help':
      case 'help':
        options.command = 'help';
        break;

      case '-v':
      case '--version':
      case 'version':
        options.command = 'version';
        break;

      case '-t':
      case '--title':
        options.title = takeValue(args, ++i, arg);
        break;

      case '-i':
      case '--instruction':
        options.instruction = takeValue(args, ++i, arg);
        break;

      case '-r':
      case '--rule':
        options.rule = takeValue(args, ++i, arg);
        break;

      case '--max-steps':
        options.maxSteps = parsePositiveInt(takeValue(args, ++i, arg), arg);
        break;

      case '--max-time-ms':
        options.maxWallTimeMs = parsePositiveInt(takeValue(args, ++i, arg), arg);
        break;

      case '-m':
      case '--model':
        options.model = takeValue(args, ++i, arg);
        break;

      case '--json':
        options.json = true;
        break;

      case '--verbose':
        options.verbose = true;
        break;

      default:
        throw new ConfigurationError(`Unknown argument '${arg}'`);
    }

    i++;
  }

  if (options.command === 'run' && (!options.title || !options.instruction)) {
    throw new ConfigurationError('run needs both --title and --instruction');
  }

  return options;
}

function takeValue(args: ReadonlyArray<string>, index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`Option ${flag} needs a value`);
  }
  return value;
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Option ${flag} expects a positive integer, got '${value}'`);
  }
  return parsed;
}
