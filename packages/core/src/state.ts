import type { Reporter } from './reporting/reporter';
import { type AssertionOutcome, DEFAULT_VERBOSITY, type RunState, type Verbosity } from './types';

/** POSIX exit statuses stop at 255; larger failure counts saturate. */
export const MAX_EXIT_CODE = 255;

export function createRunState(verbosity: Verbosity = DEFAULT_VERBOSITY): RunState {
  return { passed: 0, failed: 0, skipped: 0, verbosity, errors: [] };
}

/**
 * Count one assertion outcome and hand it to the reporter.
 * Every assertion call goes through here exactly once.
 */
export function recordOutcome(
  state: RunState,
  reporter: Reporter,
  outcome: AssertionOutcome
): void {
  switch (outcome.status) {
    case 'passed':
      state.passed++;
      break;
    case 'failed':
      state.failed++;
      break;
    case 'skipped':
      state.skipped++;
      break;
  }
  reporter.outcome(outcome);
}

export function exitCodeFor(state: RunState): number {
  return Math.min(state.failed, MAX_EXIT_CODE);
}
