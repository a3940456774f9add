import { readFile } from 'node:fs/promises';
import {
  ScriptNotFoundError,
  scanTestDefinitions,
  type TestCaseDescriptor
} from '@scriptunit/core';
import type { CommandModule } from 'yargs';
import { isFile, resolveFrom } from '../utils';

interface ListOptions {
  file: string;
}

/**
 * Test definitions of a script, found without loading it.
 */
export async function listTests(file: string, cwd = process.cwd()): Promise<TestCaseDescriptor[]> {
  const resolved = resolveFrom(cwd, file);
  if (!isFile(resolved)) {
    throw new ScriptNotFoundError(file);
  }
  return scanTestDefinitions(await readFile(resolved, 'utf-8'));
}

export const listCommand: CommandModule<object, ListOptions> = {
  command: 'list <file>',
  describe: 'List the tests defined in a script',
  builder: {
    file: {
      type: 'string',
      describe: 'Path to the test script',
      demandOption: true
    }
  },
  handler: async (argv) => {
    let tests: TestCaseDescriptor[];
    try {
      tests = await listTests(argv.file);
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }

    if (tests.length === 0) {
      console.error(`No tests found in ${argv.file}`);
      return;
    }
    for (const { name, line } of tests) {
      console.log(`${name}:${line}`);
    }
  }
};
