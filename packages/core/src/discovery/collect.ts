import type { TestCase, TestFn } from '../types';
import { scanTestDefinitions } from './scan';

function isTestFn(value: unknown): value is TestFn {
  return typeof value === 'function';
}

/**
 * Pair the test definitions found in `source` with the module's exports.
 * Scan order wins; definitions that are not exported as functions are dropped.
 */
export function collectTests(moduleExports: Record<string, unknown>, source: string): TestCase[] {
  const tests: TestCase[] = [];
  for (const descriptor of scanTestDefinitions(source)) {
    const fn = moduleExports[descriptor.name];
    if (!isTestFn(fn)) continue;
    tests.push({ ...descriptor, fn });
  }
  return tests;
}

/**
 * Merge test lists by name, keeping the first position of each name.
 */
export function mergeTests(...lists: TestCase[][]): TestCase[] {
  const byName = new Map<string, TestCase>();
  for (const list of lists) {
    for (const test of list) {
      if (!byName.has(test.name)) byName.set(test.name, test);
    }
  }
  return [...byName.values()];
}
