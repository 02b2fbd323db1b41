/**
 * Sandbox MCP Configuration
 *
 * Zod-validated environment config plus the process-wide database
 * defaults used when a request omits connection fields.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@datagrep/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  sandboxImage: z.string().min(1).default('datagrep-sandbox:latest'),
  scratchDir: z.string().min(1).default('~/.datagrep/sandbox/scratch'),
  defaultTimeoutSeconds: z.coerce.number().int().positive().default(60),
  maxTimeoutSeconds: z.coerce.number().int().positive().default(600),
  stopGraceSeconds: z.coerce.number().int().nonnegative().default(1),
  maxOutputChars: z.coerce.number().int().positive().default(100_000),
  truncationHead: z.coerce.number().int().positive().default(40_000),
  truncationTail: z.coerce.number().int().positive().default(40_000),
  dockerSocketPath: z.string().min(1).optional(),
  databaseNetwork: z.string().min(1).default('datagrep-network'),
  composeProject: z.string().min(1).default('datagrep'),
  requireDatabaseNetwork: booleanFlag.default('false'),
  database: z.object({
    host: z.string().min(1).default('db'),
    port: z.coerce.number().int().min(1).max(65_535).default(5432),
    database: z.string().min(1).default('datagrep'),
    user: z.string().min(1).default('datagrep'),
    password: z.string().default('datagrep_dev'),
  }),
});

export type SandboxConfig = z.infer<typeof configSchema>;
export type DatabaseDefaults = SandboxConfig['database'];

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

/** Drop undefined keys so Zod defaults kick in */
function defined(raw: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined) cleaned[key] = value;
  }
  return cleaned;
}

/**
 * Parse a config from an environment map. Exposed separately from
 * getConfig() so callers can build one without touching process.env.
 */
export function parseConfig(env: Record<string, string | undefined>): SandboxConfig {
  const raw = {
    ...defined({
      sandboxImage: env.SANDBOX_IMAGE,
      scratchDir: env.SANDBOX_SCRATCH_DIR,
      defaultTimeoutSeconds: env.SANDBOX_DEFAULT_TIMEOUT_SECONDS,
      maxTimeoutSeconds: env.SANDBOX_MAX_TIMEOUT_SECONDS,
      stopGraceSeconds: env.SANDBOX_STOP_GRACE_SECONDS,
      maxOutputChars: env.SANDBOX_MAX_OUTPUT_CHARS,
      truncationHead: env.SANDBOX_TRUNCATION_HEAD,
      truncationTail: env.SANDBOX_TRUNCATION_TAIL,
      dockerSocketPath: env.SANDBOX_DOCKER_SOCKET,
      databaseNetwork: env.SANDBOX_DATABASE_NETWORK,
      composeProject: env.SANDBOX_COMPOSE_PROJECT,
      requireDatabaseNetwork: env.SANDBOX_REQUIRE_DATABASE_NETWORK,
    }),
    database: defined({
      host: env.POSTGRES_HOST,
      port: env.POSTGRES_PORT,
      database: env.POSTGRES_DB,
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
    }),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Sandbox config error: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }

  const config = result.data;
  if (config.defaultTimeoutSeconds > config.maxTimeoutSeconds) {
    throw new ConfigurationError(
      `Sandbox config error: default timeout (${config.defaultTimeoutSeconds}s) exceeds max timeout (${config.maxTimeoutSeconds}s)`,
    );
  }
  config.scratchDir = resolve(expandHome(config.scratchDir));
  return config;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: SandboxConfig | null = null;

export function getConfig(): SandboxConfig {
  if (cached) return cached;
  cached = parseConfig(process.env);
  return cached;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}
