/**
 * Execution ids. They also name the sandbox container and the scratch
 * directory, so they stay short and filesystem-safe.
 */

import { randomUUID } from 'node:crypto';

export function generateExecutionId(): string {
  return `exec_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
