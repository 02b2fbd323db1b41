import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { MountPlanner } from '../../src/mounts/planner.js';
import { ComposeNetworkResolver, NoNetworkResolver } from '../../src/mounts/network.js';

const DB_DEFAULTS = {
  host: 'db',
  port: 5432,
  database: 'datagrep',
  user: 'datagrep',
  password: 'test-secret',
};

let dir: string;

beforeEach(async () => {
  dir = join(tmpdir(), `sandbox-test-mounts-${randomUUID().slice(0, 8)}`);
  await mkdir(join(dir, 'archive'), { recursive: true });
  await writeFile(join(dir, 'sales.csv'), 'a,b\n1,2\n');
  await writeFile(join(dir, 'regions.csv'), 'id,name\n1,north\n');
  await writeFile(join(dir, 'archive', 'sales.csv'), 'a,b\n3,4\n');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('MountPlanner', () => {
  it('should bind existing files read-only under /data in request order', async () => {
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: new NoNetworkResolver() });
    const plan = await planner.plan([join(dir, 'regions.csv'), join(dir, 'sales.csv')], null);

    expect(plan.mounts).toEqual([
      { hostPath: join(dir, 'regions.csv'), sandboxPath: '/data/regions.csv', readOnly: true },
      { hostPath: join(dir, 'sales.csv'), sandboxPath: '/data/sales.csv', readOnly: true },
    ]);
    expect(plan.warnings).toEqual([]);
  });

  it('should skip missing files without a warning', async () => {
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: new NoNetworkResolver() });
    const plan = await planner.plan([join(dir, 'nope.csv'), join(dir, 'sales.csv')], null);

    expect(plan.mounts.map((m) => m.sandboxPath)).toEqual(['/data/sales.csv']);
    expect(plan.warnings).toEqual([]);
  });

  it('should keep the first of two files with the same name', async () => {
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: new NoNetworkResolver() });
    const duplicate = join(dir, 'archive', 'sales.csv');
    const plan = await planner.plan([join(dir, 'sales.csv'), duplicate], null);

    expect(plan.mounts).toHaveLength(1);
    expect(plan.mounts[0].hostPath).toBe(join(dir, 'sales.csv'));
    expect(plan.warnings).toEqual([`Skipped ${duplicate}: /data/sales.csv is already mounted`]);
  });

  it('should attach no environment or network without a database config', async () => {
    const resolver = { resolveDatabaseNetwork: vi.fn(async () => 'datagrep-network') };
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: resolver });
    const plan = await planner.plan([], undefined);

    expect(plan.env).toEqual({});
    expect(plan.network).toBeNull();
    expect(plan.databaseRequested).toBe(false);
    expect(resolver.resolveDatabaseNetwork).not.toHaveBeenCalled();
  });

  it('should fill connection variables from the request and the defaults', async () => {
    const resolver = { resolveDatabaseNetwork: vi.fn(async () => 'datagrep-network') };
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: resolver });
    const plan = await planner.plan([], { host: 'warehouse', port: 6543, user: 'analyst' });

    expect(plan.env).toEqual({
      POSTGRES_HOST: 'warehouse',
      POSTGRES_PORT: '6543',
      POSTGRES_DB: 'datagrep',
      POSTGRES_USER: 'analyst',
      POSTGRES_PASSWORD: 'test-secret',
    });
    expect(plan.network).toBe('datagrep-network');
    expect(plan.databaseRequested).toBe(true);
    expect(plan.warnings).toEqual([]);
  });

  it('should use every default for fields the request leaves out', async () => {
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: new NoNetworkResolver() });
    const plan = await planner.plan([], { port: undefined, database: 'datagrep' });

    expect(plan.env).toEqual({
      POSTGRES_HOST: 'db',
      POSTGRES_PORT: '5432',
      POSTGRES_DB: 'datagrep',
      POSTGRES_USER: 'datagrep',
      POSTGRES_PASSWORD: 'test-secret',
    });
    expect(plan.network).toBeNull();
    expect(plan.warnings).toEqual([
      'No database network found; the sandbox runs on the default network',
    ]);
  });

  it.each([[{}], [{ host: undefined }]])('should treat %o as no database config', async (config) => {
    const resolver = { resolveDatabaseNetwork: vi.fn(async () => 'datagrep-network') };
    const planner = new MountPlanner({ databaseDefaults: DB_DEFAULTS, networkResolver: resolver });
    const plan = await planner.plan([], config);

    expect(plan.env).toEqual({});
    expect(plan.network).toBeNull();
    expect(plan.databaseRequested).toBe(false);
    expect(resolver.resolveDatabaseNetwork).not.toHaveBeenCalled();
  });
});

describe('ComposeNetworkResolver', () => {
  it('should try the bare name, the project prefix and the directory prefix', () => {
    const resolver = new ComposeNetworkResolver({
      networkName: 'datagrep-network',
      projectName: 'analytics',
      cwd: '/srv/datagrep',
      listNetworks: async () => [],
    });

    expect(resolver.candidates()).toEqual([
      'datagrep-network',
      'analytics_datagrep-network',
      'datagrep_datagrep-network',
    ]);
  });

  it('should not repeat a candidate when project and directory agree', () => {
    const resolver = new ComposeNetworkResolver({
      networkName: 'datagrep-network',
      projectName: 'datagrep',
      cwd: '/srv/datagrep',
      listNetworks: async () => [],
    });

    expect(resolver.candidates()).toEqual(['datagrep-network', 'datagrep_datagrep-network']);
  });

  it('should pick the first candidate the backend knows', async () => {
    const resolver = new ComposeNetworkResolver({
      networkName: 'datagrep-network',
      projectName: 'analytics',
      cwd: '/srv/datagrep',
      listNetworks: async () => ['bridge', 'datagrep_datagrep-network', 'analytics_datagrep-network'],
    });

    expect(await resolver.resolveDatabaseNetwork()).toBe('analytics_datagrep-network');
  });

  it('should resolve to null when nothing matches', async () => {
    const resolver = new ComposeNetworkResolver({
      networkName: 'datagrep-network',
      cwd: '/srv/datagrep',
      listNetworks: async () => ['bridge', 'host'],
    });

    expect(await resolver.resolveDatabaseNetwork()).toBeNull();
  });

  it('should resolve to null when networks cannot be listed', async () => {
    const resolver = new ComposeNetworkResolver({
      networkName: 'datagrep-network',
      listNetworks: async () => {
        throw new Error('permission denied');
      },
    });

    expect(await resolver.resolveDatabaseNetwork()).toBeNull();
  });
});
