import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import {
  collectTests,
  defaultSuite,
  mergeTests,
  parseFlags,
  runTests,
  ScriptNotFoundError,
  type TestCase,
  type Writer
} from '@scriptunit/core';
import { loadConfig, resolveRunSettings, type SettingsOverrides } from '@scriptunit/core/config';
import type { CommandModule } from 'yargs';
import { dirname, isFile, resolveFrom } from '../utils';

interface RunOptions {
  file: string;
  verbose?: boolean;
  summary?: boolean;
  quiet?: boolean;
  color?: boolean;
  timeout?: number;
  failOnError?: boolean;
  config?: string;
}

export interface RunScriptOptions {
  file: string;
  cwd?: string;
  /** Explicit config file; otherwise searched upwards from the script */
  configPath?: string;
  overrides?: SettingsOverrides;
  out?: Writer;
  err?: Writer;
  stream?: { isTTY?: boolean };
  env?: NodeJS.ProcessEnv;
}

// A script module is evaluated once per process, so its test() calls only
// happen on the first import; later runs reuse what it registered then.
const registrations = new Map<string, TestCase[]>();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Load a test script, collect its exported and registered tests, and run them.
 * Resolves to the process exit code.
 */
export async function runScript(options: RunScriptOptions): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const file = resolveFrom(cwd, options.file);
  if (!isFile(file)) {
    throw new ScriptNotFoundError(options.file);
  }

  const { config } = await loadConfig(
    options.configPath
      ? { path: resolveFrom(cwd, options.configPath) }
      : { startDir: dirname(file) }
  );
  const settings = resolveRunSettings({
    config,
    overrides: options.overrides,
    stream: options.stream,
    env: options.env
  });

  // The script's own main() must not start a second run
  const suite = defaultSuite();
  suite.claim();
  suite.clear();

  const source = await readFile(file, 'utf-8');
  const url = pathToFileURL(file).href;
  const mod: unknown = await import(url);
  const registered = registrations.get(url) ?? suite.list();
  registrations.set(url, registered);
  const tests = mergeTests(collectTests(isRecord(mod) ? mod : {}, source), registered);

  const { exitCode } = await runTests(tests, {
    ...settings,
    out: options.out,
    err: options.err
  });
  return exitCode;
}

/**
 * Verbosity is read from the raw arguments so that the last of -v, -s and -q
 * wins; yargs booleans do not keep their order.
 */
export function createRunCommand(rawArgs: readonly string[]): CommandModule<object, RunOptions> {
  return {
    command: 'run <file>',
    describe: 'Run the tests in a script',
    builder: {
      file: {
        type: 'string',
        describe: 'Path to the test script',
        demandOption: true
      },
      verbose: {
        type: 'boolean',
        describe: 'Show expected and provided values of failed assertions',
        alias: 'v'
      },
      summary: {
        type: 'boolean',
        describe: 'Only print the summary line',
        alias: 's'
      },
      quiet: {
        type: 'boolean',
        describe: 'Print nothing; the exit code still counts failures',
        alias: 'q'
      },
      color: {
        type: 'boolean',
        describe: 'Force colored output on, or off with --no-color'
      },
      timeout: {
        type: 'number',
        describe: 'Timeout for async tests in milliseconds'
      },
      'fail-on-error': {
        type: 'boolean',
        describe: 'Count a test that throws as a failed assertion'
      },
      config: {
        type: 'string',
        describe: 'Path to a scriptunit.json(c) config file'
      }
    },
    handler: async (argv) => {
      const overrides: SettingsOverrides = {};
      const { verbosity } = parseFlags(rawArgs);
      if (verbosity !== undefined) overrides.verbosity = verbosity;
      if (argv.color !== undefined) overrides.color = argv.color;
      if (argv.timeout !== undefined && Number.isInteger(argv.timeout) && argv.timeout > 0) {
        overrides.timeoutMs = argv.timeout;
      }
      if (argv.failOnError !== undefined) overrides.failOnError = argv.failOnError;

      let exitCode: number;
      try {
        exitCode = await runScript({ file: argv.file, configPath: argv.config, overrides });
      } catch (err) {
        if (err instanceof ScriptNotFoundError) {
          console.error(err.message);
        } else {
          console.error('Fatal error:', err instanceof Error ? err.message : String(err));
        }
        process.exit(1);
      }
      process.exit(exitCode);
    }
  };
}
