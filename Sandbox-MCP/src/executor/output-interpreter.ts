/**
 * Best-effort recovery of structured data from captured sandbox output.
 *
 * Generated code is told to print its structured result as a final JSON
 * line. The last non-empty line is tried first, then the whole output.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type InterpretedOutput =
  | { kind: 'structured'; value: JsonValue }
  | { kind: 'text' }
  /** The last line looked like JSON but did not parse. */
  | { kind: 'malformed'; line: string; reason: string };

type ParseAttempt = { ok: true; value: JsonValue } | { ok: false; reason: string };

function tryParse(text: string): ParseAttempt {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

function looksLikeJson(line: string): boolean {
  return (
    (line.startsWith('{') && line.endsWith('}')) ||
    (line.startsWith('[') && line.endsWith(']'))
  );
}

export function interpretOutput(output: string): InterpretedOutput {
  const trimmed = output.trim();
  if (trimmed === '') {
    return { kind: 'text' };
  }

  const lines = trimmed.split(/\r?\n/).map((l) => l.trim()).filter((l) => l !== '');
  const lastLine = lines[lines.length - 1] ?? '';

  const fromLastLine = tryParse(lastLine);
  if (fromLastLine.ok) {
    return { kind: 'structured', value: fromLastLine.value };
  }

  const fromWhole = tryParse(trimmed);
  if (fromWhole.ok) {
    return { kind: 'structured', value: fromWhole.value };
  }

  if (looksLikeJson(lastLine)) {
    return { kind: 'malformed', line: lastLine, reason: fromLastLine.reason };
  }
  return { kind: 'text' };
}

/**
 * Structured value recovered from the output, or null for plain text.
 */
export function interpret(output: string): JsonValue | null {
  const result = interpretOutput(output);
  return result.kind === 'structured' ? result.value : null;
}
