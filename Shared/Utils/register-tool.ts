/**
 * Tool registration wrapper for McpServer.
 *
 * Handlers return a StandardResponse; the wrapper serialises it into MCP
 * text content and turns thrown errors into error envelopes, so no raw
 * stack trace crosses the protocol boundary.
 */

import type { z } from 'zod';
import type { StandardResponse } from '../Types/StandardResponse.js';
import { createErrorFromException } from '../Types/StandardResponse.js';
import { logger } from './logger.js';

/**
 * Structural interface for McpServer, so the helper does not pin an SDK version.
 */
export interface McpServerLike {
  registerTool(...args: unknown[]): unknown;
}

/**
 * Tool annotations as defined by MCP.
 */
export interface ToolAnnotations extends Record<string, unknown> {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolRegistration<T extends z.AnyZodObject> {
  name: string;
  description: string;
  inputSchema: T;
  annotations?: ToolAnnotations;
  handler: (input: z.infer<T>) => Promise<StandardResponse>;
}

/**
 * Register a tool. The SDK validates arguments against `inputSchema.shape`;
 * the wrapper parses them again so the handler gets zod defaults and
 * transforms applied.
 */
export function registerTool<T extends z.AnyZodObject>(
  server: McpServerLike,
  config: ToolRegistration<T>,
): void {
  const log = logger.child(`tool:${config.name}`);

  server.registerTool(
    config.name,
    {
      description: config.description,
      inputSchema: config.inputSchema.shape,
      annotations: config.annotations,
    },
    async (args: Record<string, unknown>) => {
      let response: StandardResponse;
      try {
        const input: z.infer<T> = config.inputSchema.parse(args);
        response = await config.handler(input);
      } catch (error) {
        log.warn('Tool call failed', error);
        response = createErrorFromException(error, false);
      }
      return {
        content: [{ type: 'text' as const, text: JSON.stringify(response) }],
      };
    }
  );
}
