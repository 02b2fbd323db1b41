/**
 * Resource mount planner.
 *
 * Maps requested input files onto read-only bindings under /data/ and,
 * when database access is requested, fills the connection variables and
 * looks up the network to join.
 */

import { stat } from 'node:fs/promises';
import { basename, posix } from 'node:path';
import { Logger } from '@datagrep/shared/Utils/logger.js';
import type { DatabaseDefaults } from '../config.js';
import type { DatabaseConfig } from '../executor/types.js';
import type { MountBinding } from '../runtime/types.js';
import type { NetworkResolver } from './network.js';

const logger = new Logger('sandbox:mounts');

export const SANDBOX_DATA_DIR = '/data';

export interface MountPlan {
  mounts: MountBinding[];
  env: Record<string, string>;
  /** Network to attach; null means the backend's default policy */
  network: string | null;
  databaseRequested: boolean;
  warnings: string[];
}

export interface MountPlannerOptions {
  databaseDefaults: DatabaseDefaults;
  networkResolver: NetworkResolver;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/** A config that sets no field asks for nothing, like no config at all */
function isEmpty(config: DatabaseConfig): boolean {
  return Object.values(config).every((value) => value === undefined);
}

export class MountPlanner {
  constructor(private readonly opts: MountPlannerOptions) {}

  async plan(
    inputFiles: readonly string[],
    databaseConfig: DatabaseConfig | null | undefined,
  ): Promise<MountPlan> {
    const warnings: string[] = [];
    const mounts = await this.planFiles(inputFiles, warnings);

    if (!databaseConfig || isEmpty(databaseConfig)) {
      return { mounts, env: {}, network: null, databaseRequested: false, warnings };
    }

    const env = this.databaseEnv(databaseConfig);
    const network = await this.opts.networkResolver.resolveDatabaseNetwork();
    if (network === null) {
      warnings.push('No database network found; the sandbox runs on the default network');
    }
    return { mounts, env, network, databaseRequested: true, warnings };
  }

  private async planFiles(
    inputFiles: readonly string[],
    warnings: string[],
  ): Promise<MountBinding[]> {
    const mounts: MountBinding[] = [];
    const used = new Set<string>();

    for (const hostPath of inputFiles) {
      // Missing files surface later as an ordinary execution error
      if (!(await exists(hostPath))) {
        logger.debug(`Skipping missing input file ${hostPath}`);
        continue;
      }

      const sandboxPath = posix.join(SANDBOX_DATA_DIR, basename(hostPath));
      if (used.has(sandboxPath)) {
        warnings.push(`Skipped ${hostPath}: ${sandboxPath} is already mounted`);
        continue;
      }
      used.add(sandboxPath);
      mounts.push({ hostPath, sandboxPath, readOnly: true });
    }
    return mounts;
  }

  private databaseEnv(config: DatabaseConfig): Record<string, string> {
    const defaults = this.opts.databaseDefaults;
    return {
      POSTGRES_HOST: config.host ?? defaults.host,
      POSTGRES_PORT: String(config.port ?? defaults.port),
      POSTGRES_DB: config.database ?? defaults.database,
      POSTGRES_USER: config.user ?? defaults.user,
      POSTGRES_PASSWORD: config.password ?? defaults.password,
    };
  }
}
