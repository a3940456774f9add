import type { ReturnStatus } from '../types';

export type Anchor = 'full' | 'prefix';

export type PatternResult = { ok: true; matched: boolean } | { ok: false; message: string };

/**
 * Match `output` against `pattern` read as a regular expression. `full` anchors
 * both ends, `prefix` only the start. No flags are set, so `^`/`$` bind to the
 * whole string and embedded newlines in `output` must be matched explicitly.
 */
export function matchPattern(output: string, pattern: string, anchor: Anchor): PatternResult {
  const source = anchor === 'full' ? `^(?:${pattern})$` : `^(?:${pattern})`;
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
  return { ok: true, matched: regex.test(output) };
}

export function statusOf(value: ReturnStatus): number | null {
  return typeof value === 'number' ? value : value.status;
}

export function formatStatus(status: number | null): string {
  return status === null ? '(signal)' : String(status);
}
