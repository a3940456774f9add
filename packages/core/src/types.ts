// ============================================================================
// Verbosity
// ============================================================================

export const Verbosity = {
  Quiet: 0,
  Summary: 1,
  Normal: 2,
  Verbose: 3
} as const;

export type Verbosity = (typeof Verbosity)[keyof typeof Verbosity];

export type VerbosityName = 'quiet' | 'summary' | 'normal' | 'verbose';

export const VERBOSITY_BY_NAME: Readonly<Record<VerbosityName, Verbosity>> = {
  quiet: Verbosity.Quiet,
  summary: Verbosity.Summary,
  normal: Verbosity.Normal,
  verbose: Verbosity.Verbose
};

export const DEFAULT_VERBOSITY: Verbosity = Verbosity.Normal;

// ============================================================================
// Run State
// ============================================================================

export interface TestError {
  testName: string;
  line: number;
  message: string;
  error: unknown;
}

/**
 * Counters and verbosity for a single run. Only assertion primitives touch the
 * counters; verbosity is fixed before the first test starts.
 */
export interface RunState {
  passed: number;
  failed: number;
  skipped: number;
  verbosity: Verbosity;
  errors: TestError[];
}

export type OutcomeStatus = 'passed' | 'failed' | 'skipped';

export interface AssertionOutcome {
  status: OutcomeStatus;
  testName: string;
  line: number;
  expected?: string;
  provided?: string;
}

// ============================================================================
// Test Cases
// ============================================================================

export interface TestCaseDescriptor {
  name: string;
  /** 1-based line of the definition, 0 when unknown */
  line: number;
}

export type TestFn = (t: TestContext) => void | Promise<void>;

export interface TestCase extends TestCaseDescriptor {
  fn: TestFn;
}

/**
 * A value carrying a command's exit status. `null` means the command was
 * terminated by a signal and never compares equal to a code.
 */
export type ReturnStatus = number | { status: number | null };

export interface TestContext {
  readonly name: string;
  assertEqual(output: string, expected: string): void;
  assertNotEqual(output: string, expected: string): void;
  /** Whole-string match of `pattern` as a regular expression */
  assertMatches(output: string, pattern: string): void;
  assertNotMatches(output: string, pattern: string): void;
  /** Prefix match of `expected` as a regular expression */
  assertStartsWith(output: string, expected: string): void;
  assertReturn(status: ReturnStatus, expected: number): void;
  assertNotReturn(status: ReturnStatus, expected: number): void;
  skip(): void;
}

// ============================================================================
// Output
// ============================================================================

export interface Writer {
  write(text: string): void;
}

export type ColorMode = 'auto' | 'always' | 'never';

/** Resolves the source line of the user code that called `boundary`. */
export type Locate = (boundary: Function) => number;
