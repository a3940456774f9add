import { firstFrameLine } from './assert/callsite';
import { createTestContext } from './assert/context';
import { errorMessage, TestTimeoutError } from './errors';
import { createReporter, type Reporter } from './reporting/reporter';
import { createRunState, exitCodeFor, recordOutcome } from './state';
import {
  DEFAULT_VERBOSITY,
  type Locate,
  type RunState,
  type TestCase,
  type TestError,
  Verbosity,
  type Writer
} from './types';

export interface RunOptions {
  verbosity?: Verbosity;
  color?: boolean;
  out?: Writer;
  err?: Writer;
  /** Limit for async test bodies; sync bodies cannot be interrupted */
  timeoutMs?: number;
  /** Count a throwing test body as one failed assertion */
  failOnError?: boolean;
  locate?: Locate;
}

export interface RunResult {
  exitCode: number;
  state: RunState;
  /** Number of test cases invoked */
  ran: number;
}

function isPromiseLike(value: unknown): value is PromiseLike<void> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

async function settle(
  pending: PromiseLike<void>,
  testName: string,
  timeoutMs: number | undefined
): Promise<void> {
  if (timeoutMs === undefined) {
    await pending;
    return;
  }

  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;
  const body = Promise.resolve(pending);
  // A body that rejects after its timeout has already been reported
  void body.catch((err: unknown) => {
    if (timedOut) {
      console.error(`${testName}: rejected after timeout: ${errorMessage(err)}`);
    }
  });

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new TestTimeoutError(testName, timeoutMs));
    }, timeoutMs);
  });

  try {
    await Promise.race([body, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function recordTestError(
  state: RunState,
  reporter: Reporter,
  test: TestCase,
  err: unknown,
  failOnError: boolean
): void {
  // A timeout is raised by the runner itself, so its stack says nothing useful
  const stackLine =
    err instanceof Error && !(err instanceof TestTimeoutError) ? firstFrameLine(err.stack) : 0;
  const entry: TestError = {
    testName: test.name,
    line: stackLine || test.line,
    message: errorMessage(err),
    error: err
  };
  state.errors.push(entry);

  if (failOnError) {
    recordOutcome(state, reporter, {
      status: 'failed',
      testName: entry.testName,
      line: entry.line,
      expected: 'no error',
      provided: entry.message
    });
  } else {
    reporter.error(entry);
  }
}

/**
 * Run test cases one after another and print the summary.
 *
 * With no test cases the usage text is printed instead and the exit code is 0.
 * Otherwise the exit code is the failed-assertion count, capped at 255.
 */
export async function runTests(
  tests: readonly TestCase[],
  options: RunOptions = {}
): Promise<RunResult> {
  const verbosity = options.verbosity ?? DEFAULT_VERBOSITY;
  const state = createRunState(verbosity);
  const reporter = createReporter({
    verbosity,
    color: options.color ?? false,
    out: options.out,
    err: options.err
  });

  if (tests.length === 0) {
    if (verbosity > Verbosity.Quiet) reporter.usage();
    return { exitCode: 0, state, ran: 0 };
  }

  for (const test of tests) {
    let open = true;
    const ctx = createTestContext({
      state,
      reporter,
      testName: test.name,
      locate: options.locate,
      isOpen: () => open
    });

    try {
      const result = test.fn(ctx);
      if (isPromiseLike(result)) {
        await settle(result, test.name, options.timeoutMs);
      }
    } catch (err) {
      recordTestError(state, reporter, test, err, options.failOnError ?? false);
    } finally {
      open = false;
    }
  }

  reporter.summary(state);
  return { exitCode: exitCodeFor(state), state, ran: tests.length };
}
