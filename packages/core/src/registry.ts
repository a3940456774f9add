import { callerLine } from './assert/callsite';
import { isTestName } from './discovery/scan';
import { InvalidTestNameError } from './errors';
import type { TestCase, TestFn } from './types';

export interface Suite {
  /** Register a named function; its `name` is the test name. */
  test(fn: TestFn): void;
  test(name: string, fn: TestFn): void;
  /** Register with an explicit definition line. */
  add(name: string, fn: TestFn, line?: number): void;
  /** Registered tests in registration order. */
  list(): TestCase[];
  /**
   * Mark the suite as driven by a host runner; `main()` then leaves it alone.
   */
  claim(): void;
  readonly claimed: boolean;
  clear(): void;
}

function resolveRegistration(nameOrFn: string | TestFn, fn: TestFn | undefined): [string, TestFn] {
  if (typeof nameOrFn === 'function') return [nameOrFn.name, nameOrFn];
  if (fn === undefined) {
    throw new TypeError(`Test '${nameOrFn}' was registered without a function`);
  }
  return [nameOrFn, fn];
}

export function createSuite(): Suite {
  // Re-registering a name replaces the function but keeps its slot
  const tests = new Map<string, TestCase>();
  let claimed = false;

  const add = (name: string, fn: TestFn, line = 0): void => {
    if (!isTestName(name)) throw new InvalidTestNameError(name);
    tests.set(name, { name, line, fn });
  };

  function test(fn: TestFn): void;
  function test(name: string, fn: TestFn): void;
  function test(nameOrFn: string | TestFn, fn?: TestFn): void {
    const [name, body] = resolveRegistration(nameOrFn, fn);
    add(name, body, callerLine(test));
  }

  return {
    test,
    add,
    list: () => [...tests.values()],
    claim() {
      claimed = true;
    },
    get claimed() {
      return claimed;
    },
    clear() {
      tests.clear();
    }
  };
}

// Shared through globalThis so the CLI and the script it loads agree on one suite
// even if they end up with separate instances of this module.
const SUITE_KEY = Symbol.for('scriptunit.suite');

type SuiteHost = typeof globalThis & { [SUITE_KEY]?: Suite };

export function defaultSuite(): Suite {
  const host: SuiteHost = globalThis;
  const existing = host[SUITE_KEY];
  if (existing) return existing;
  const suite = createSuite();
  host[SUITE_KEY] = suite;
  return suite;
}

/**
 * Register a test case on the default suite.
 *
 * @example
 * ```typescript
 * test('testEcho', (t) => {
 *   t.assertEqual(capture('echo foo').output, 'foo');
 * });
 * ```
 */
export function test(fn: TestFn): void;
export function test(name: string, fn: TestFn): void;
export function test(nameOrFn: string | TestFn, fn?: TestFn): void {
  const [name, body] = resolveRegistration(nameOrFn, fn);
  defaultSuite().add(name, body, callerLine(test));
}
