// ============================================================================
// Error Taxonomy
// ============================================================================

/**
 * Base error class for all scriptunit errors.
 * Carries a stable code next to the human-readable message.
 */
export class ScriptunitError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'ScriptunitError';
  }

  toObject() {
    return { error: { code: this.code, message: this.message } };
  }
}

export class InvalidTestNameError extends ScriptunitError {
  constructor(name: string) {
    super(
      'INVALID_TEST_NAME',
      `Test name '${name}' must start with 'test' followed by letters, digits or '_'`
    );
    this.name = 'InvalidTestNameError';
  }
}

export class ConfigError extends ScriptunitError {
  constructor(
    public readonly configPath: string,
    message: string
  ) {
    super('CONFIG_INVALID', `Invalid config at ${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class TestTimeoutError extends ScriptunitError {
  constructor(testName: string, timeoutMs: number) {
    super('TEST_TIMEOUT', `Test '${testName}' did not finish within ${timeoutMs}ms`);
    this.name = 'TestTimeoutError';
  }
}

export class ScriptNotFoundError extends ScriptunitError {
  constructor(path: string) {
    super('SCRIPT_NOT_FOUND', `File not found: ${path}`);
    this.name = 'ScriptNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
