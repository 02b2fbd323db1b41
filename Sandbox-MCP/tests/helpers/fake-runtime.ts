/**
 * In-process isolation backend for tests.
 *
 * Each "container" reads its mounted script and asks the test's script
 * function how to behave: what to print, how long to run, how to exit.
 */

import { readFile } from 'node:fs/promises';
import {
  SandboxNotProvisionedError,
  SandboxUnavailableError,
} from '@datagrep/shared/Types/errors.js';
import { CODE_MOUNT_PATH } from '../../src/executor/orchestrator.js';
import type {
  IsolationRuntime,
  SandboxHandle,
  SandboxSpec,
  TerminalState,
} from '../../src/runtime/types.js';
import { withDeadline } from '../../src/utils/deadline.js';

export interface FakeBehaviour {
  output?: string;
  exitCode?: number;
  backendError?: string | null;
  /** How long the script runs; Infinity runs until stopped */
  durationMs?: number;
  startError?: Error;
  collectError?: Error;
  destroyError?: Error;
}

export type FakeScript = (code: string, spec: SandboxSpec) => FakeBehaviour;

type InstanceState = 'running' | 'exited' | 'stopped' | 'removed';

interface FakeInstance {
  spec: SandboxSpec;
  behaviour: FakeBehaviour;
  state: InstanceState;
  finished: Promise<void>;
  finish: () => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export const FAKE_IMAGE = 'datagrep-sandbox:latest';

export class FakeRuntime implements IsolationRuntime {
  readonly name = 'fake';

  readonly created: SandboxSpec[] = [];
  readonly scripts: string[] = [];
  readonly stopped: string[] = [];
  readonly destroyed: string[] = [];

  /** When false, awaitCompletion ignores the deadline entirely */
  honourDeadline = true;
  reachable = true;
  /** Thrown by every stop() while set */
  stopError: Error | null = null;
  images = new Set<string>([FAKE_IMAGE]);
  networks: string[] = [];

  private readonly instances = new Map<string, FakeInstance>();
  private nextId = 1;

  constructor(private readonly script: FakeScript = () => ({})) {}

  /** Ids of instances still running */
  running(): string[] {
    return [...this.instances.entries()]
      .filter(([, instance]) => instance.state === 'running')
      .map(([id]) => id);
  }

  /** Ids of instances not yet removed */
  alive(): string[] {
    return [...this.instances.entries()]
      .filter(([, instance]) => instance.state !== 'removed')
      .map(([id]) => id);
  }

  async createAndStart(spec: SandboxSpec): Promise<SandboxHandle> {
    if (!this.reachable) {
      throw new SandboxUnavailableError('Docker is unreachable: connect ECONNREFUSED');
    }
    if (!this.images.has(spec.image)) {
      throw new SandboxNotProvisionedError(spec.image);
    }

    const codeMount = spec.mounts.find((m) => m.sandboxPath === CODE_MOUNT_PATH);
    const code = codeMount ? await readFile(codeMount.hostPath, 'utf-8') : '';
    this.scripts.push(code);

    const behaviour = this.script(code, spec);
    if (behaviour.startError) {
      throw behaviour.startError;
    }

    const id = `fake-${this.nextId++}`;
    let finish: () => void = () => undefined;
    const finished = new Promise<void>((resolve) => {
      finish = resolve;
    });
    const instance: FakeInstance = { spec, behaviour, state: 'running', finished, finish, timer: null };

    const duration = behaviour.durationMs ?? 5;
    if (Number.isFinite(duration)) {
      instance.timer = setTimeout(() => {
        if (instance.state === 'running') instance.state = 'exited';
        instance.finish();
      }, duration);
    }

    this.instances.set(id, instance);
    this.created.push(spec);
    return { id, executionId: spec.executionId };
  }

  async awaitCompletion(handle: SandboxHandle, deadline: number): Promise<TerminalState> {
    const instance = this.get(handle);

    if (this.honourDeadline) {
      const outcome = await withDeadline(instance.finished, deadline);
      if (outcome.expired) {
        await this.stop(handle);
        return { kind: 'timed_out' };
      }
    } else {
      await instance.finished;
    }

    if (instance.state === 'stopped') {
      return { kind: 'exited', exitCode: 143, backendError: null };
    }
    return {
      kind: 'exited',
      exitCode: instance.behaviour.exitCode ?? 0,
      backendError: instance.behaviour.backendError ?? null,
    };
  }

  async stop(handle: SandboxHandle): Promise<void> {
    if (this.stopError) throw this.stopError;
    const instance = this.get(handle);
    if (instance.state !== 'running') return;
    instance.state = 'stopped';
    this.stopped.push(handle.id);
    if (instance.timer) clearTimeout(instance.timer);
    instance.finish();
  }

  async collectOutput(handle: SandboxHandle): Promise<Buffer> {
    const instance = this.get(handle);
    if (instance.behaviour.collectError) {
      throw instance.behaviour.collectError;
    }
    return Buffer.from(instance.behaviour.output ?? '', 'utf-8');
  }

  async destroy(handle: SandboxHandle): Promise<void> {
    this.destroyed.push(handle.id);
    const instance = this.instances.get(handle.id);
    if (instance?.behaviour.destroyError) {
      throw instance.behaviour.destroyError;
    }
    if (!instance || instance.state === 'removed') return;
    if (instance.timer) clearTimeout(instance.timer);
    instance.state = 'removed';
    instance.finish();
  }

  async listNetworks(): Promise<string[]> {
    return [...this.networks];
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }

  async hasImage(image: string): Promise<boolean> {
    return this.images.has(image);
  }

  private get(handle: SandboxHandle): FakeInstance {
    const instance = this.instances.get(handle.id);
    if (!instance) {
      throw new Error(`No such container: ${handle.id}`);
    }
    return instance;
  }
}
