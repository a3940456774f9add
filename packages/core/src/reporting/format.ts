import type { AssertionOutcome, OutcomeStatus, RunState, TestError } from '../types';
import { ANSI, paint } from './color';

const STATUS_WORD: Record<OutcomeStatus, string> = {
  passed: 'Passed',
  failed: 'Failed',
  skipped: 'Skipped'
};

const STATUS_COLOR: Record<OutcomeStatus, string> = {
  passed: ANSI.green,
  failed: ANSI.red,
  skipped: ANSI.yellow
};

export const USAGE = [
  'Usage: <testscript> [options...]',
  '',
  'Options:',
  '  -v, --verbose  Print expected and provided values',
  '  -s, --summary  Only print summary omitting individual test results',
  '  -q, --quiet    Do not print anything to standard output',
  '  -h, --help     Show usage screen'
].join('\n');

/**
 * `<testName>:<line>:<Passed|Failed|Skipped>`
 */
export function formatOutcomeLine(outcome: AssertionOutcome, color: boolean): string {
  const name = paint(outcome.testName, ANSI.boldWhite, color);
  const status = paint(STATUS_WORD[outcome.status], STATUS_COLOR[outcome.status], color);
  return `${name}:${outcome.line}:${status}`;
}

export function formatFailureDetail(outcome: AssertionOutcome, color: boolean): string[] {
  return [
    `${paint('Expected', ANSI.red, color)}: ${outcome.expected ?? ''}`,
    `${paint('Provided', ANSI.red, color)}: ${outcome.provided ?? ''}`
  ];
}

export function formatErrorLine(entry: TestError, color: boolean): string {
  const name = paint(entry.testName, ANSI.boldWhite, color);
  return `${name}:${entry.line}:${paint('Errored', ANSI.red, color)} ${entry.message}`;
}

export function formatSummary(state: Pick<RunState, 'passed' | 'failed' | 'skipped'>): string {
  return `Done. ${state.passed} passed. ${state.failed} failed. ${state.skipped} skipped.`;
}
