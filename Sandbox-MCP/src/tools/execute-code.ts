/**
 * execute_code tool: run generated Python against the requested inputs.
 */

import { z } from 'zod';
import { Logger } from '@datagrep/shared/Utils/logger.js';
import type { ExecutionOrchestrator } from '../executor/orchestrator.js';
import { describeResult, type ExecutionResult } from '../executor/types.js';

const logger = new Logger('sandbox:exec');

export const databaseConfigSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65_535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
});

export const executeCodeSchema = z.object({
  code: z.string().min(1)
    .describe('Python code to execute'),
  input_files: z.array(z.string().min(1)).nullish()
    .describe('Absolute paths of input files, mounted read-only under /data/<file name>'),
  database_config: databaseConfigSchema.nullish()
    .describe('PostgreSQL connection parameters; omitted fields use the server defaults'),
  timeout_seconds: z.number().int().positive().nullish()
    .describe('Execution timeout in seconds (default: 60)'),
});

export type ExecuteCodeInput = z.infer<typeof executeCodeSchema>;

export function handleExecuteCode(orchestrator: ExecutionOrchestrator) {
  return async (input: ExecuteCodeInput): Promise<ExecutionResult> => {
    const result = await orchestrator.execute({
      code: input.code,
      input_files: input.input_files ?? [],
      database_config: input.database_config ?? null,
      timeout_seconds: input.timeout_seconds ?? undefined,
    });

    logger.info(`${result.execution_id} ${describeResult(result)}`);
    return result;
  };
}
