/**
 * Head+tail truncation of captured sandbox output.
 *
 * Keeps the start (usually the printed results) and the end (the final
 * JSON line or the traceback) with a marker in between.
 */

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export function truncateOutput(output: string, config: TruncateConfig): TruncateResult {
  if (output.length <= config.maxChars) {
    return { text: output, truncated: false };
  }

  // head + tail never exceed the limit, whatever the configuration says
  const budget = Math.min(config.head + config.tail, config.maxChars);
  const head = Math.floor((budget * config.head) / (config.head + config.tail));
  const tail = budget - head;

  const dropped = output.length - head - tail;
  const marker = `\n\n[... truncated ${dropped} characters ...]\n\n`;
  const end = tail > 0 ? output.slice(-tail) : '';
  return { text: output.slice(0, head) + marker + end, truncated: true };
}
