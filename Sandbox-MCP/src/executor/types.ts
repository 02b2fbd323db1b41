/**
 * Core types for sandboxed code execution.
 */

import type { JsonValue } from './output-interpreter.js';

/** Connection parameters; any omitted field falls back to the configured default. */
export interface DatabaseConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
}

export interface ExecutionRequest {
  code: string;
  /** Absolute host paths, mounted read-only under /data/ */
  input_files?: readonly string[];
  database_config?: DatabaseConfig | null;
  /** Positive integer; the configured default applies when absent. */
  timeout_seconds?: number;
}

export type ExecutionStatus = 'success' | 'error' | 'timeout';

export type ExecutionErrorKind =
  | 'invalid_request'
  | 'not_provisioned'
  | 'network_unavailable'
  | 'backend_unavailable'
  | 'runtime'
  | 'internal';

interface ExecutionResultBase {
  execution_id: string;
  /** stdout and stderr interleaved, possibly truncated */
  output: string;
  execution_time_seconds: number;
  truncated: boolean;
  warnings: string[];
}

export interface ExecutionSuccess extends ExecutionResultBase {
  status: 'success';
  error: null;
  exit_code: number;
  result_data: JsonValue | null;
}

export interface ExecutionFailure extends ExecutionResultBase {
  status: 'error';
  error: string;
  error_kind: ExecutionErrorKind;
  exit_code: number | null;
  result_data: null;
}

export interface ExecutionTimeout extends ExecutionResultBase {
  status: 'timeout';
  error: string;
  exit_code: null;
  result_data: null;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure | ExecutionTimeout;

/** Orchestrator lifecycle phases, in order. */
export type ExecutionPhase =
  | 'init'
  | 'mounting'
  | 'starting'
  | 'running'
  | 'collecting'
  | 'stopping'
  | 'done';

function assertNever(value: never): never {
  throw new Error(`Unhandled execution result: ${JSON.stringify(value)}`);
}

/**
 * One-line human summary of a result, for logs and tool output.
 */
export function describeResult(result: ExecutionResult): string {
  switch (result.status) {
    case 'success':
      return `succeeded in ${result.execution_time_seconds}s`;
    case 'error':
      return `failed (${result.error_kind}) after ${result.execution_time_seconds}s: ${firstLine(result.error)}`;
    case 'timeout':
      return result.error;
    default:
      return assertNever(result);
  }
}

function firstLine(text: string): string {
  const line = text.trim().split('\n')[0] ?? '';
  return line.length > 200 ? `${line.slice(0, 200)}…` : line;
}
