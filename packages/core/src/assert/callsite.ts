const FRAME_LOCATION = /:(\d+):\d+\)?\s*$/;

function isInternalFrame(frame: string): boolean {
  return frame.includes('(node:') || frame.includes(' node:');
}

export function parseFrameLine(frame: string): number | undefined {
  const match = FRAME_LOCATION.exec(frame);
  if (!match) return undefined;
  const line = Number(match[1]);
  return Number.isInteger(line) && line > 0 ? line : undefined;
}

/**
 * Line of the first non-internal `at ...` frame of a V8 stack, 0 when none.
 */
export function firstFrameLine(stack: string | undefined): number {
  if (!stack) return 0;
  for (const frame of stack.split('\n')) {
    const trimmed = frame.trimStart();
    if (!trimmed.startsWith('at ') || isInternalFrame(trimmed)) continue;
    const line = parseFrameLine(trimmed);
    if (line !== undefined) return line;
  }
  return 0;
}

/**
 * Line from which `boundary` was called. Frames of `boundary` and everything
 * it called are dropped from the captured stack.
 */
export function callerLine(boundary: Function): number {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  return firstFrameLine(holder.stack);
}
