/**
 * Sandbox MCP Server
 *
 * Wires the isolation runtime, mount planner and orchestrator together
 * and registers the tools on an McpServer instance.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTool } from '@datagrep/shared/Utils/register-tool.js';
import { createSuccess } from '@datagrep/shared/Types/StandardResponse.js';
import type { SandboxConfig } from './config.js';
import { ExecutionOrchestrator } from './executor/orchestrator.js';
import { ComposeNetworkResolver, type NetworkResolver } from './mounts/network.js';
import { MountPlanner } from './mounts/planner.js';
import type { IsolationRuntime } from './runtime/types.js';
import { executeCodeSchema, handleExecuteCode } from './tools/execute-code.js';
import { sandboxStatusSchema, handleSandboxStatus } from './tools/sandbox-status.js';

export interface CreateServerOptions {
  runtime: IsolationRuntime;
  config: SandboxConfig;
  /** Defaults to compose-style probing of the backend's networks */
  networkResolver?: NetworkResolver;
}

export function createServer(opts: CreateServerOptions): {
  server: McpServer;
  orchestrator: ExecutionOrchestrator;
} {
  const { runtime, config } = opts;

  const networkResolver =
    opts.networkResolver ??
    new ComposeNetworkResolver({
      networkName: config.databaseNetwork,
      projectName: config.composeProject,
      listNetworks: () => runtime.listNetworks(),
    });

  const orchestrator = new ExecutionOrchestrator({
    runtime,
    planner: new MountPlanner({ databaseDefaults: config.database, networkResolver }),
    config,
  });

  const server = new McpServer({
    name: 'datagrep-sandbox',
    version: '1.0.0',
  });

  // ── Execution ───────────────────────────────────────────────────────────

  const executeCode = handleExecuteCode(orchestrator);
  registerTool(server, {
    name: 'execute_code',
    description:
      'Run generated Python in a one-shot, resource-limited sandbox container. Input files are mounted read-only under /data/. ' +
      'Print a final JSON line to return structured data.\n\n' +
      'Args:\n' +
      '  - code (string): Python code to execute\n' +
      '  - input_files (string[], optional): Absolute host paths of input files\n' +
      '  - database_config (object, optional): { host, port, database, user, password }, exposed as POSTGRES_* variables\n' +
      `  - timeout_seconds (number, optional): Timeout in seconds (default: ${config.defaultTimeoutSeconds}, max: ${config.maxTimeoutSeconds})\n\n` +
      'Returns: { execution_id, status ("success" | "error" | "timeout"), output, error, error_kind?, exit_code, execution_time_seconds, result_data, truncated, warnings }',
    inputSchema: executeCodeSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    handler: async (params) => createSuccess(await executeCode(params)),
  });

  // ── Health ──────────────────────────────────────────────────────────────

  const sandboxStatus = handleSandboxStatus(runtime, config.sandboxImage);
  registerTool(server, {
    name: 'sandbox_status',
    description:
      'Check that the isolation backend answers and the sandbox image is built.\n\n' +
      'Returns: { backend, reachable, image, image_present, ready }',
    inputSchema: sandboxStatusSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    handler: async () => createSuccess(await sandboxStatus()),
  });

  return { server, orchestrator };
}
