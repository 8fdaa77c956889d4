/**
 * @fileoverview Error taxonomy for the research loop.
 *
 * Every failure the loop can observe is an {@link AgentError} carrying a
 * machine-readable code and a recoverability flag. Recoverable errors become
 * steps and context feedback; only {@link ConfigurationError} is thrown to the
 * caller.
 *
 * @module research-loop/types/errors
 * @version 0.1.0
 */

/**
 * Machine-readable error codes.
 */
export enum ErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  UNKNOWN_TOOL = 'UNKNOWN_TOOL',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  TOOL_EXECUTION_ERROR = 'TOOL_EXECUTION_ERROR',
  TOOL_TIMEOUT = 'TOOL_TIMEOUT',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
}

/**
 * Base class for all errors raised by the runtime.
 */
export class AgentError extends Error {
  readonly code: ErrorCode;
  readonly recoverable: boolean;

  constructor(code: ErrorCode, message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
  }
}

/**
 * Invalid setup: duplicate tool, bad budgets, bad environment.
 */
export class ConfigurationError extends AgentError {
  readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = []) {
    super(ErrorCode.CONFIGURATION, message, false);
    this.issues = issues;
  }
}

export class UnknownToolError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, available: ReadonlyArray<string>) {
    const hint = available.length > 0 ? ` Available tools: ${available.join(', ')}` : '';
    super(ErrorCode.UNKNOWN_TOOL, `Tool '${toolName}' is not registered.${hint}`, true);
    this.toolName = toolName;
  }
}

export class SchemaMismatchError extends AgentError {
  readonly toolName: string;
  readonly issues: ReadonlyArray<string>;

  constructor(toolName: string, issues: ReadonlyArray<string>) {
    super(
      ErrorCode.SCHEMA_MISMATCH,
      `Arguments for '${toolName}' do not match its schema: ${issues.join('; ')}`,
      true,
    );
    this.toolName = toolName;
    this.issues = issues;
  }
}

/**
 * Wraps whatever a tool executor threw.
 */
export class ToolExecutionError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super(
      ErrorCode.TOOL_EXECUTION_ERROR,
      `Tool '${toolName}' failed: ${describeError(cause)}`,
      true,
      { cause },
    );
    this.toolName = toolName;
  }
}

export class ToolTimeoutError extends AgentError {
  readonly toolName: string;
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(ErrorCode.TOOL_TIMEOUT, `Tool '${toolName}' timed out after ${timeoutMs}ms`, true);
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The backend answered, but not with a usable tool call or final message.
 */
export class MalformedResponseError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.MALFORMED_RESPONSE, message, true, options);
  }
}

/**
 * The backend call could not complete (network, auth, rate limit, timeout).
 */
export class BackendUnavailableError extends AgentError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(ErrorCode.BACKEND_UNAVAILABLE, message, true, options);
    this.status = status;
  }
}

/**
 * One-line description of any thrown value. Never includes a stack.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message !== '' ? error.message : error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
