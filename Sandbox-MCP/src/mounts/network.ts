/**
 * Resolution of the network a sandbox joins when it needs the database.
 *
 * The orchestrator only knows the NetworkResolver interface; the naming
 * rules of a particular deployment live in an adapter.
 */

import { basename } from 'node:path';
import { Logger } from '@datagrep/shared/Utils/logger.js';

const logger = new Logger('sandbox:network');

export interface NetworkResolver {
  /** Network name to attach for database access, or null if none is available. */
  resolveDatabaseNetwork(): Promise<string | null>;
}

export interface ComposeNetworkResolverOptions {
  /** Base network name as declared in the compose file */
  networkName: string;
  /** Compose project name (compose prefixes networks with it) */
  projectName?: string;
  /** Lists networks visible to the isolation backend */
  listNetworks: () => Promise<string[]>;
  /** Working directory; compose's default project name is its basename */
  cwd?: string;
}

/**
 * Matches the names docker compose gives a declared network: the bare
 * name, `<project>_<name>` and `<dirname>_<name>`.
 */
export class ComposeNetworkResolver implements NetworkResolver {
  constructor(private readonly opts: ComposeNetworkResolverOptions) {}

  candidates(): string[] {
    const { networkName, projectName } = this.opts;
    const dirName = basename(this.opts.cwd ?? process.cwd());
    const names = [networkName];
    if (projectName) names.push(`${projectName}_${networkName}`);
    names.push(`${dirName}_${networkName}`);
    return [...new Set(names)];
  }

  async resolveDatabaseNetwork(): Promise<string | null> {
    let available: Set<string>;
    try {
      available = new Set(await this.opts.listNetworks());
    } catch (err) {
      logger.warn('Could not list networks; continuing without one', err);
      return null;
    }

    const match = this.candidates().find((name) => available.has(name)) ?? null;
    if (match === null) {
      logger.warn('No database network found', { candidates: this.candidates() });
    } else {
      logger.debug(`Resolved database network ${match}`);
    }
    return match;
  }
}

/** Resolver for deployments where the sandbox never joins a named network. */
export class NoNetworkResolver implements NetworkResolver {
  async resolveDatabaseNetwork(): Promise<string | null> {
    return null;
  }
}
