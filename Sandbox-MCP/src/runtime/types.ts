/**
 * Isolation backend contract.
 *
 * DockerRuntime is the production implementation; tests use an
 * in-process fake. Implementations throw SandboxNotProvisionedError when
 * the image is missing and SandboxUnavailableError when the backend
 * cannot be reached.
 */

export interface MountBinding {
  hostPath: string;
  sandboxPath: string;
  readOnly: true;
}

export interface ResourceLimits {
  memoryBytes: number;
  cpuPeriod: number;
  cpuQuota: number;
}

/** Fixed policy, not caller-configurable. */
export const SANDBOX_RESOURCE_LIMITS: ResourceLimits = {
  memoryBytes: 512 * 1024 * 1024,
  cpuPeriod: 100_000,
  cpuQuota: 50_000, // 50% of one CPU
};

export interface SandboxSpec {
  /** Used as the instance name; unique per execution */
  executionId: string;
  image: string;
  command: readonly string[];
  mounts: readonly MountBinding[];
  env: Readonly<Record<string, string>>;
  /** Named network to attach, or null for the backend's default policy */
  network: string | null;
  limits: ResourceLimits;
}

export interface SandboxHandle {
  id: string;
  executionId: string;
}

export type TerminalState =
  | {
      kind: 'exited';
      exitCode: number;
      /** Error reported by the backend itself, distinct from a non-zero exit */
      backendError: string | null;
    }
  | { kind: 'timed_out' };

export interface IsolationRuntime {
  readonly name: string;

  /** Create and start one sandbox instance. The instance is not left behind if start fails. */
  createAndStart(spec: SandboxSpec): Promise<SandboxHandle>;

  /**
   * Wait until the instance exits or the deadline (epoch ms) passes.
   * On expiry the instance is stopped before `timed_out` is returned.
   */
  awaitCompletion(handle: SandboxHandle, deadline: number): Promise<TerminalState>;

  /** Send the stop signal. Idempotent. */
  stop(handle: SandboxHandle): Promise<void>;

  /** Combined stdout+stderr, interleaved in emission order. */
  collectOutput(handle: SandboxHandle): Promise<Buffer>;

  /** Force-remove the instance. Idempotent; never throws. */
  destroy(handle: SandboxHandle): Promise<void>;

  /** Names of the networks visible to the backend. */
  listNetworks(): Promise<string[]>;

  ping(): Promise<boolean>;

  hasImage(image: string): Promise<boolean>;
}
