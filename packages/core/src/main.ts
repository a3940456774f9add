import * as path from 'node:path';
import { loadConfig } from './config/load';
import { type RunSettings, resolveRunSettings } from './config/resolve';
import { errorMessage } from './errors';
import { parseFlags } from './flags';
import { defaultSuite } from './registry';
import { USAGE } from './reporting/format';
import { runTests } from './runner';

/**
 * Entry point for a self-running test script. Call it once, after all
 * `test()` registrations:
 *
 * ```typescript
 * test('testEcho', (t) => t.assertEqual(capture('echo foo').output, 'foo'));
 * await main();
 * ```
 *
 * Parses the process arguments, runs the default suite and exits with the
 * failed-assertion count. Does nothing when a host runner has claimed the suite.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const suite = defaultSuite();
  if (suite.claimed) return;

  const flags = parseFlags(argv);
  if (flags.help) {
    process.stdout.write(`${USAGE}\n`);
    process.exit(0);
  }

  const script = process.argv[1];
  let settings: RunSettings;
  try {
    const { config } = await loadConfig({
      startDir: script ? path.dirname(path.resolve(script)) : process.cwd()
    });
    settings = resolveRunSettings({ config, overrides: flags });
  } catch (err) {
    console.error('Fatal error:', errorMessage(err));
    process.exit(1);
  }

  const { exitCode } = await runTests(suite.list(), settings);
  process.exit(exitCode);
}
