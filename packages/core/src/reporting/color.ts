import type { ColorMode } from '../types';

export const ANSI = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  boldWhite: '\x1b[37;1m',
  reset: '\x1b[0m'
} as const;

type ColorStream = { isTTY?: boolean };

export function useColor(
  stream: ColorStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR !== undefined) return false;
  const force = env.FORCE_COLOR;
  if (force !== undefined && force !== '0' && force !== 'false') return true;
  return stream.isTTY === true;
}

export function resolveColor(
  mode: ColorMode,
  stream: ColorStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  switch (mode) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'auto':
      return useColor(stream, env);
  }
}

export function paint(text: string, code: string, color: boolean): string {
  return color ? `${code}${text}${ANSI.reset}` : text;
}
