import { Verbosity } from './types';

export interface ParsedFlags {
  verbosity?: Verbosity;
  help: boolean;
  color?: boolean;
  timeoutMs?: number;
  /** Tokens that were not recognised; they have no effect */
  ignored: string[];
}

const VERBOSITY_FLAGS: ReadonlyMap<string, Verbosity> = new Map<string, Verbosity>([
  ['-v', Verbosity.Verbose],
  ['--verbose', Verbosity.Verbose],
  ['-s', Verbosity.Summary],
  ['--summary', Verbosity.Summary],
  ['-q', Verbosity.Quiet],
  ['--quiet', Verbosity.Quiet]
]);

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const ms = Number(value);
  return ms > 0 ? ms : undefined;
}

/**
 * Parse the flags of a self-running test script, left to right.
 *
 * The last verbosity flag wins, `-h`/`--help` stops parsing, and unknown tokens
 * are collected in `ignored` rather than rejected.
 */
export function parseFlags(argv: readonly string[]): ParsedFlags {
  const flags: ParsedFlags = { help: false, ignored: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    const verbosity = VERBOSITY_FLAGS.get(arg);
    if (verbosity !== undefined) {
      flags.verbosity = verbosity;
      continue;
    }

    switch (arg) {
      case '-h':
      case '--help':
        flags.help = true;
        return flags;
      case '--color':
        flags.color = true;
        continue;
      case '--no-color':
        flags.color = false;
        continue;
      case '--timeout': {
        const ms = parseTimeout(argv[i + 1]);
        if (ms === undefined) {
          flags.ignored.push(arg);
        } else {
          flags.timeoutMs = ms;
          i++;
        }
        continue;
      }
    }

    if (arg.startsWith('--timeout=')) {
      const ms = parseTimeout(arg.slice('--timeout='.length));
      if (ms !== undefined) {
        flags.timeoutMs = ms;
        continue;
      }
    }

    flags.ignored.push(arg);
  }

  return flags;
}
