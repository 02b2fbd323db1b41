/**
 * Execution orchestrator.
 *
 * Drives one sandbox instance per request through
 * init → mounting → starting → running → (collecting | stopping) → done
 * and turns every outcome into an ExecutionResult. The instance and the
 * code artifact are removed on every path before execute() returns.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { Logger } from '@datagrep/shared/Utils/logger.js';
import {
  SandboxNetworkError,
  SandboxNotProvisionedError,
  SandboxUnavailableError,
  ValidationError,
} from '@datagrep/shared/Types/errors.js';
import type { SandboxConfig } from '../config.js';
import type { MountPlanner } from '../mounts/planner.js';
import {
  SANDBOX_RESOURCE_LIMITS,
  type IsolationRuntime,
  type SandboxHandle,
  type TerminalState,
} from '../runtime/types.js';
import { elapsedSeconds, withDeadline, type DeadlineOutcome } from '../utils/deadline.js';
import { generateExecutionId } from '../utils/id-generator.js';
import { truncateOutput } from '../utils/output-truncate.js';
import { interpretOutput } from './output-interpreter.js';
import type {
  ExecutionErrorKind,
  ExecutionFailure,
  ExecutionPhase,
  ExecutionRequest,
  ExecutionResult,
  ExecutionTimeout,
} from './types.js';

const logger = new Logger('sandbox:orchestrator');

export const CODE_MOUNT_PATH = '/code/script.py';
export const SANDBOX_COMMAND: readonly string[] = ['python', CODE_MOUNT_PATH];

/** Extra time given to a backend to report its own timeout before we stop it ourselves */
export const DEADLINE_GUARD_MS = 250;

export type OrchestratorConfig = Pick<
  SandboxConfig,
  | 'sandboxImage'
  | 'scratchDir'
  | 'defaultTimeoutSeconds'
  | 'maxTimeoutSeconds'
  | 'maxOutputChars'
  | 'truncationHead'
  | 'truncationTail'
  | 'requireDatabaseNetwork'
>;

export interface OrchestratorOptions {
  runtime: IsolationRuntime;
  planner: MountPlanner;
  config: OrchestratorConfig;
}

/** Per-call state; never shared between executions. */
interface ExecutionContext {
  executionId: string;
  startedAt: number;
  phase: ExecutionPhase;
  warnings: string[];
  handle: SandboxHandle | null;
  scratchDir: string | null;
}

export class ExecutionOrchestrator {
  private readonly runtime: IsolationRuntime;
  private readonly planner: MountPlanner;
  private readonly config: OrchestratorConfig;

  constructor(opts: OrchestratorOptions) {
    this.runtime = opts.runtime;
    this.planner = opts.planner;
    this.config = opts.config;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const ctx: ExecutionContext = {
      executionId: generateExecutionId(),
      startedAt: Date.now(),
      phase: 'init',
      warnings: [],
      handle: null,
      scratchDir: null,
    };

    try {
      return await this.run(ctx, request);
    } catch (err) {
      return this.failure(ctx, err);
    } finally {
      await this.cleanup(ctx);
    }
  }

  private async run(ctx: ExecutionContext, request: ExecutionRequest): Promise<ExecutionResult> {
    const timeoutSeconds = this.normalize(ctx, request);

    this.transition(ctx, 'mounting');
    const plan = await this.planner.plan(request.input_files ?? [], request.database_config);
    ctx.warnings.push(...plan.warnings);
    if (plan.databaseRequested && plan.network === null && this.config.requireDatabaseNetwork) {
      throw new SandboxNetworkError(
        'Database access was requested but no database network is available to the sandbox',
      );
    }
    const codePath = await this.writeCode(ctx, request.code);

    this.transition(ctx, 'starting');
    ctx.handle = await this.runtime.createAndStart({
      executionId: ctx.executionId,
      image: this.config.sandboxImage,
      command: SANDBOX_COMMAND,
      mounts: [{ hostPath: codePath, sandboxPath: CODE_MOUNT_PATH, readOnly: true }, ...plan.mounts],
      env: plan.env,
      network: plan.network,
      limits: SANDBOX_RESOURCE_LIMITS,
    });

    this.transition(ctx, 'running');
    const deadline = Date.now() + timeoutSeconds * 1000;
    const terminal = await this.awaitTerminal(ctx.handle, deadline);

    if (terminal.kind === 'timed_out') {
      this.transition(ctx, 'stopping');
      // Stop explicitly; a backend is not trusted to have enforced the deadline
      try {
        await this.runtime.stop(ctx.handle);
      } catch (err) {
        // cleanup force-removes the instance regardless
        logger.warn(`Failed to stop sandbox for ${ctx.executionId}`, err);
      }
      return this.timeout(ctx, timeoutSeconds);
    }

    this.transition(ctx, 'collecting');
    const raw = await this.runtime.collectOutput(ctx.handle);
    const output = raw.toString('utf-8');
    const executionTime = elapsedSeconds(ctx.startedAt);
    const truncation = {
      maxChars: this.config.maxOutputChars,
      head: this.config.truncationHead,
      tail: this.config.truncationTail,
    };
    const { text, truncated } = truncateOutput(output, truncation);

    if (terminal.backendError !== null || terminal.exitCode !== 0) {
      const trimmed = output.trim();
      const detail =
        (trimmed && truncateOutput(trimmed, truncation).text) ||
        terminal.backendError ||
        `Process exited with code ${terminal.exitCode}`;
      return {
        status: 'error',
        execution_id: ctx.executionId,
        output: text,
        error: detail,
        error_kind: 'runtime',
        exit_code: terminal.exitCode,
        execution_time_seconds: executionTime,
        truncated,
        warnings: ctx.warnings,
        result_data: null,
      };
    }

    const interpreted = interpretOutput(output);
    if (interpreted.kind === 'malformed') {
      logger.warn(`Final output line looks like JSON but does not parse: ${interpreted.reason}`, {
        executionId: ctx.executionId,
      });
      ctx.warnings.push(`Final output line is not valid JSON: ${interpreted.reason}`);
    }

    return {
      status: 'success',
      execution_id: ctx.executionId,
      output: text,
      error: null,
      exit_code: terminal.exitCode,
      execution_time_seconds: executionTime,
      truncated,
      warnings: ctx.warnings,
      result_data: interpreted.kind === 'structured' ? interpreted.value : null,
    };
  }

  /** Validate the request and settle the effective timeout. */
  private normalize(ctx: ExecutionContext, request: ExecutionRequest): number {
    if (typeof request.code !== 'string' || request.code.trim() === '') {
      throw new ValidationError('Code must be a non-empty string');
    }

    const relative = (request.input_files ?? []).filter((p) => !isAbsolute(p));
    if (relative.length > 0) {
      throw new ValidationError(`Input file paths must be absolute: ${relative.join(', ')}`, {
        paths: relative,
      });
    }

    const requested = request.timeout_seconds ?? this.config.defaultTimeoutSeconds;
    if (!Number.isInteger(requested) || requested <= 0) {
      throw new ValidationError(`Timeout must be a positive integer, got ${requested}`);
    }
    if (requested > this.config.maxTimeoutSeconds) {
      ctx.warnings.push(
        `Timeout of ${requested} seconds exceeds the maximum; using ${this.config.maxTimeoutSeconds} seconds`,
      );
      return this.config.maxTimeoutSeconds;
    }
    return requested;
  }

  private async writeCode(ctx: ExecutionContext, code: string): Promise<string> {
    const dir = join(this.config.scratchDir, ctx.executionId);
    ctx.scratchDir = dir;
    await mkdir(dir, { recursive: true, mode: 0o755 });
    const codePath = join(dir, 'script.py');
    await writeFile(codePath, code, { encoding: 'utf-8', mode: 0o644 });
    return codePath;
  }

  private async awaitTerminal(handle: SandboxHandle, deadline: number): Promise<TerminalState> {
    let outcome: DeadlineOutcome<TerminalState>;
    try {
      outcome = await withDeadline(
        this.runtime.awaitCompletion(handle, deadline),
        deadline + DEADLINE_GUARD_MS,
      );
    } catch (err) {
      // A backend failing while it enforces the deadline does not turn a timeout into an error
      // Timers may fire a millisecond or two early
      if (Date.now() < deadline - 5) throw err;
      logger.warn(`Backend failed after the deadline of ${handle.executionId}`, err);
      return { kind: 'timed_out' };
    }
    return outcome.expired ? { kind: 'timed_out' } : outcome.value;
  }

  private timeout(ctx: ExecutionContext, timeoutSeconds: number): ExecutionTimeout {
    const message = `Execution timed out after ${timeoutSeconds} seconds`;
    logger.warn(message, { executionId: ctx.executionId });
    return {
      status: 'timeout',
      execution_id: ctx.executionId,
      // Output is discarded: the instance may have been mid-write when stopped
      output: '',
      error: message,
      exit_code: null,
      execution_time_seconds: elapsedSeconds(ctx.startedAt),
      truncated: false,
      warnings: ctx.warnings,
      result_data: null,
    };
  }

  private failure(ctx: ExecutionContext, err: unknown): ExecutionFailure {
    const [kind, message] = classifyFailure(err);
    if (kind === 'internal' || kind === 'backend_unavailable') {
      logger.error(`Execution failed during ${ctx.phase}`, { executionId: ctx.executionId, err });
    } else {
      logger.warn(`Execution rejected during ${ctx.phase}: ${message}`, {
        executionId: ctx.executionId,
      });
    }
    return {
      status: 'error',
      execution_id: ctx.executionId,
      output: '',
      error: message,
      error_kind: kind,
      exit_code: null,
      execution_time_seconds: elapsedSeconds(ctx.startedAt),
      truncated: false,
      warnings: ctx.warnings,
      result_data: null,
    };
  }

  private async cleanup(ctx: ExecutionContext): Promise<void> {
    this.transition(ctx, 'done');

    if (ctx.handle !== null) {
      try {
        await this.runtime.destroy(ctx.handle);
      } catch (err) {
        logger.warn(`Failed to destroy sandbox for ${ctx.executionId}`, err);
      }
    }

    if (ctx.scratchDir !== null) {
      try {
        await rm(ctx.scratchDir, { recursive: true, force: true });
      } catch (err) {
        logger.warn(`Failed to remove code artifact ${ctx.scratchDir}`, err);
      }
    }
  }

  private transition(ctx: ExecutionContext, next: ExecutionPhase): void {
    logger.debug(`${ctx.executionId}: ${ctx.phase} → ${next}`);
    ctx.phase = next;
  }
}

function classifyFailure(err: unknown): [ExecutionErrorKind, string] {
  if (err instanceof ValidationError) return ['invalid_request', err.message];
  if (err instanceof SandboxNotProvisionedError) return ['not_provisioned', err.message];
  if (err instanceof SandboxNetworkError) return ['network_unavailable', err.message];
  if (err instanceof SandboxUnavailableError) return ['backend_unavailable', err.message];
  const message = err instanceof Error ? err.message : String(err);
  return ['internal', `Execution failed: ${message}`];
}
