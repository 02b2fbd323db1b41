/**
 * sandbox_status tool: is the backend reachable and the image built?
 */

import { z } from 'zod';
import type { IsolationRuntime } from '../runtime/types.js';

export const sandboxStatusSchema = z.object({});

export interface SandboxStatus {
  backend: string;
  reachable: boolean;
  image: string;
  image_present: boolean | null;
  ready: boolean;
}

export function handleSandboxStatus(runtime: IsolationRuntime, image: string) {
  return async (): Promise<SandboxStatus> => {
    const reachable = await runtime.ping();
    // No point asking for the image when the daemon does not answer
    const imagePresent = reachable ? await runtime.hasImage(image) : null;
    return {
      backend: runtime.name,
      reachable,
      image,
      image_present: imagePresent,
      ready: reachable && imagePresent === true,
    };
  };
}
