/**
 * Docker-backed isolation runtime.
 *
 * One container per execution:
 * - fixed memory ceiling and CPU quota
 * - read-only bind mounts for the code and the input files
 * - stop on deadline, force-remove on cleanup
 */

import { Readable, PassThrough } from 'node:stream';
import { finished } from 'node:stream/promises';
import Docker from 'dockerode';
import { z } from 'zod';
import { Logger } from '@datagrep/shared/Utils/logger.js';
import {
  SandboxNotProvisionedError,
  SandboxUnavailableError,
} from '@datagrep/shared/Types/errors.js';
import { withDeadline, type DeadlineOutcome } from '../utils/deadline.js';
import type {
  IsolationRuntime,
  SandboxHandle,
  SandboxSpec,
  TerminalState,
} from './types.js';

const logger = new Logger('sandbox:docker');

export const SANDBOX_LABEL = 'datagrep.sandbox';
export const CONTAINER_NAME_PREFIX = 'datagrep-sandbox-';

/** Added to the longest allowed run before a sandbox container counts as abandoned */
export const ORPHAN_GRACE_SECONDS = 60;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOENT',
  'EACCES',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
]);

const waitResponseSchema = z.object({
  StatusCode: z.number(),
  Error: z.object({ Message: z.string() }).nullish(),
});

// ── Error helpers ────────────────────────────────────────────────────────────

export function dockerStatusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err) {
    return typeof err.statusCode === 'number' ? err.statusCode : undefined;
  }
  return undefined;
}

export function isConnectionError(err: unknown): boolean {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' && CONNECTION_ERROR_CODES.has(err.code);
  }
  return false;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissingImage(err: unknown): boolean {
  return dockerStatusCode(err) === 404 && /no such image/i.test(errorMessage(err));
}

// ── Runtime ──────────────────────────────────────────────────────────────────

export interface DockerRuntimeOptions {
  /** Docker socket; dockerode's defaults (and DOCKER_HOST) apply when omitted */
  socketPath?: string;
  /** Seconds the stop signal waits before Docker kills the container */
  stopGraceSeconds: number;
}

export class DockerRuntime implements IsolationRuntime {
  readonly name = 'docker';

  constructor(
    private readonly docker: Docker,
    private readonly opts: DockerRuntimeOptions,
  ) {}

  /**
   * Build a client and check the daemon answers. Throws
   * SandboxUnavailableError when it does not: nothing can run without it.
   */
  static async connect(opts: DockerRuntimeOptions): Promise<DockerRuntime> {
    const docker = opts.socketPath ? new Docker({ socketPath: opts.socketPath }) : new Docker();
    const runtime = new DockerRuntime(docker, opts);
    try {
      await docker.ping();
    } catch (err) {
      throw new SandboxUnavailableError(
        `Failed to connect to Docker: ${errorMessage(err)}`,
        { socketPath: opts.socketPath ?? null },
      );
    }
    logger.info('Connected to Docker', { socketPath: opts.socketPath ?? 'default' });
    return runtime;
  }

  async createAndStart(spec: SandboxSpec): Promise<SandboxHandle> {
    let container: Docker.Container;
    try {
      container = await this.docker.createContainer(this.buildCreateOptions(spec));
    } catch (err) {
      throw this.translateError(err, spec.image);
    }

    const handle: SandboxHandle = { id: container.id, executionId: spec.executionId };
    try {
      await container.start();
    } catch (err) {
      await this.destroy(handle);
      throw this.translateError(err, spec.image);
    }

    logger.info(`Started container ${handle.id.slice(0, 12)}`, {
      executionId: spec.executionId,
      network: spec.network,
    });
    return handle;
  }

  async awaitCompletion(handle: SandboxHandle, deadline: number): Promise<TerminalState> {
    const container = this.docker.getContainer(handle.id);
    let outcome: DeadlineOutcome<unknown>;
    try {
      outcome = await withDeadline<unknown>(container.wait(), deadline);
    } catch (err) {
      throw this.translateError(err);
    }

    if (outcome.expired) {
      try {
        await this.stop(handle);
      } catch (err) {
        // Still a timeout; the caller stops again and force-removes on cleanup
        logger.warn(`Failed to stop container ${handle.id.slice(0, 12)} after its deadline`, err);
      }
      return { kind: 'timed_out' };
    }

    const parsed = waitResponseSchema.safeParse(outcome.value);
    if (!parsed.success) {
      throw new Error(`Unexpected wait response from Docker: ${parsed.error.message}`);
    }
    return {
      kind: 'exited',
      exitCode: parsed.data.StatusCode,
      backendError: parsed.data.Error?.Message || null,
    };
  }

  async stop(handle: SandboxHandle): Promise<void> {
    try {
      await this.docker.getContainer(handle.id).stop({ t: this.opts.stopGraceSeconds });
      logger.info(`Stopped container ${handle.id.slice(0, 12)}`);
    } catch (err) {
      // 304: already stopped, 404: already gone
      const status = dockerStatusCode(err);
      if (status === 304 || status === 404) return;
      throw this.translateError(err);
    }
  }

  async collectOutput(handle: SandboxHandle): Promise<Buffer> {
    const container = this.docker.getContainer(handle.id);
    let raw: NodeJS.ReadableStream;
    try {
      raw = await container.logs({ follow: true, stdout: true, stderr: true });
    } catch (err) {
      throw this.translateError(err);
    }

    // Both streams feed the same sink, so output keeps its interleaving
    const combined = new PassThrough();
    const chunks: Buffer[] = [];
    combined.on('data', (chunk: Buffer) => chunks.push(chunk));

    const source = Readable.from(raw);
    this.docker.modem.demuxStream(source, combined, combined);
    await finished(source);
    combined.end();
    await finished(combined);

    return Buffer.concat(chunks);
  }

  async destroy(handle: SandboxHandle): Promise<void> {
    try {
      await this.docker.getContainer(handle.id).remove({ force: true });
      logger.debug(`Removed container ${handle.id.slice(0, 12)}`);
    } catch (err) {
      if (dockerStatusCode(err) === 404) return;
      logger.warn(`Failed to remove container ${handle.id.slice(0, 12)}`, err);
    }
  }

  async listNetworks(): Promise<string[]> {
    try {
      const networks = await this.docker.listNetworks();
      return networks.map((n) => n.Name);
    } catch (err) {
      throw this.translateError(err);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.docker.ping();
      return true;
    } catch (err) {
      logger.debug('Docker ping failed', err);
      return false;
    }
  }

  async hasImage(image: string): Promise<boolean> {
    try {
      await this.docker.getImage(image).inspect();
      return true;
    } catch (err) {
      if (dockerStatusCode(err) === 404) return false;
      throw this.translateError(err, image);
    }
  }

  /**
   * Force-remove sandbox containers left by a previous process
   * (crash, SIGKILL). Other servers may share the daemon, so only
   * containers older than `olderThanSeconds` are touched: no live
   * execution keeps its container longer than its timeout plus cleanup.
   * Returns how many were removed.
   */
  async removeOrphans(olderThanSeconds: number, now: number = Date.now()): Promise<number> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [SANDBOX_LABEL] },
    });
    const cutoff = Math.floor(now / 1000) - olderThanSeconds;

    let removed = 0;
    for (const info of containers) {
      if (info.Created > cutoff) continue;
      try {
        await this.docker.getContainer(info.Id).remove({ force: true });
        removed++;
      } catch (err) {
        logger.warn(`Failed to remove orphaned container ${info.Id.slice(0, 12)}`, err);
      }
    }
    return removed;
  }

  private buildCreateOptions(spec: SandboxSpec): Docker.ContainerCreateOptions {
    const hostConfig: Docker.HostConfig = {
      Binds: spec.mounts.map((m) => `${m.hostPath}:${m.sandboxPath}:ro`),
      Memory: spec.limits.memoryBytes,
      CpuPeriod: spec.limits.cpuPeriod,
      CpuQuota: spec.limits.cpuQuota,
      // Init forwards the stop signal to the script instead of PID 1 ignoring it
      Init: true,
      AutoRemove: false,
    };
    if (spec.network !== null) {
      hostConfig.NetworkMode = spec.network;
    }

    return {
      name: `${CONTAINER_NAME_PREFIX}${spec.executionId}`,
      Image: spec.image,
      Cmd: [...spec.command],
      Env: Object.entries(spec.env).map(([key, value]) => `${key}=${value}`),
      Labels: { [SANDBOX_LABEL]: 'true', [`${SANDBOX_LABEL}.execution-id`]: spec.executionId },
      AttachStdout: true,
      AttachStderr: true,
      Tty: false,
      HostConfig: hostConfig,
    };
  }

  private translateError(err: unknown, image?: string): Error {
    if (image !== undefined && isMissingImage(err)) {
      return new SandboxNotProvisionedError(image);
    }
    if (isConnectionError(err)) {
      return new SandboxUnavailableError(`Docker is unreachable: ${errorMessage(err)}`);
    }
    return err instanceof Error ? err : new Error(String(err));
  }
}
