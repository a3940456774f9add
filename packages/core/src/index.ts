// Assertions
export { type CaptureOptions, type CaptureResult, capture } from './assert/capture';
export { callerLine, firstFrameLine, parseFrameLine } from './assert/callsite';
export { matchPattern, statusOf } from './assert/compare';
export { createTestContext, type TestContextOptions } from './assert/context';
// Discovery
export { collectTests, mergeTests } from './discovery/collect';
export { isTestName, scanTestDefinitions, TEST_NAME_PATTERN } from './discovery/scan';
// Errors
export {
  ConfigError,
  errorMessage,
  InvalidTestNameError,
  ScriptNotFoundError,
  ScriptunitError,
  TestTimeoutError
} from './errors';
// Front-end
export { type ParsedFlags, parseFlags } from './flags';
export { main } from './main';
// Registry
export { createSuite, defaultSuite, type Suite, test } from './registry';
// Reporting
export { ANSI, resolveColor, useColor } from './reporting/color';
export {
  formatErrorLine,
  formatFailureDetail,
  formatOutcomeLine,
  formatSummary,
  USAGE
} from './reporting/format';
export {
  createBufferWriter,
  createReporter,
  type Reporter,
  type ReporterOptions
} from './reporting/reporter';
// Running
export { type RunOptions, type RunResult, runTests } from './runner';
export { createRunState, exitCodeFor, MAX_EXIT_CODE, recordOutcome } from './state';
// Types
export {
  type AssertionOutcome,
  type ColorMode,
  DEFAULT_VERBOSITY,
  type Locate,
  type OutcomeStatus,
  type ReturnStatus,
  type RunState,
  type TestCase,
  type TestCaseDescriptor,
  type TestContext,
  type TestError,
  type TestFn,
  Verbosity,
  VERBOSITY_BY_NAME,
  type VerbosityName,
  type Writer
} from './types';
