import type { Reporter } from '../reporting/reporter';
import { recordOutcome } from '../state';
import type {
  AssertionOutcome,
  Locate,
  ReturnStatus,
  RunState,
  TestContext
} from '../types';
import { callerLine } from './callsite';
import { type Anchor, formatStatus, matchPattern, statusOf } from './compare';

export interface TestContextOptions {
  state: RunState;
  reporter: Reporter;
  testName: string;
  locate?: Locate;
  /** False once the runner has moved past this test case */
  isOpen?: () => boolean;
}

/**
 * Build the assertion surface handed to one test case. Each primitive records
 * exactly one outcome against `state`; mismatches never throw.
 * Outcomes arriving after `isOpen()` turns false are logged and not counted.
 */
export function createTestContext(options: TestContextOptions): TestContext {
  const { state, reporter, testName } = options;
  const locate = options.locate ?? callerLine;
  const isOpen = options.isOpen ?? (() => true);

  const record = (outcome: AssertionOutcome): void => {
    if (!isOpen()) {
      console.error(
        `${testName}:${outcome.line}: ${outcome.status} after the test finished; not counted`
      );
      return;
    }
    recordOutcome(state, reporter, outcome);
  };

  const verdict = (
    boundary: Function,
    passed: boolean,
    expected: string,
    provided: string
  ): void => {
    const line = locate(boundary);
    record(
      passed
        ? { status: 'passed', testName, line }
        : { status: 'failed', testName, line, expected, provided }
    );
  };

  const patternVerdict = (
    boundary: Function,
    output: string,
    pattern: string,
    anchor: Anchor,
    negate: boolean
  ): void => {
    const result = matchPattern(output, pattern, anchor);
    if (!result.ok) {
      verdict(boundary, false, `${pattern} (invalid pattern: ${result.message})`, output);
      return;
    }
    verdict(boundary, result.matched !== negate, pattern, output);
  };

  const assertEqual = (output: string, expected: string): void => {
    verdict(assertEqual, output === expected, expected, output);
  };

  const assertNotEqual = (output: string, expected: string): void => {
    verdict(assertNotEqual, output !== expected, expected, output);
  };

  const assertMatches = (output: string, pattern: string): void => {
    patternVerdict(assertMatches, output, pattern, 'full', false);
  };

  const assertNotMatches = (output: string, pattern: string): void => {
    patternVerdict(assertNotMatches, output, pattern, 'full', true);
  };

  const assertStartsWith = (output: string, expected: string): void => {
    patternVerdict(assertStartsWith, output, expected, 'prefix', false);
  };

  const assertReturn = (status: ReturnStatus, expected: number): void => {
    const code = statusOf(status);
    verdict(assertReturn, code === expected, String(expected), formatStatus(code));
  };

  const assertNotReturn = (status: ReturnStatus, expected: number): void => {
    const code = statusOf(status);
    verdict(assertNotReturn, code !== expected, String(expected), formatStatus(code));
  };

  const skip = (): void => {
    record({ status: 'skipped', testName, line: locate(skip) });
  };

  return {
    name: testName,
    assertEqual,
    assertNotEqual,
    assertMatches,
    assertNotMatches,
    assertStartsWith,
    assertReturn,
    assertNotReturn,
    skip
  };
}
