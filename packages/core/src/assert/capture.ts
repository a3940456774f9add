import { spawnSync } from 'node:child_process';

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024; // 16MB

export interface CaptureOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Text written to the command's stdin */
  input?: string;
}

export interface CaptureResult {
  /** stdout with trailing newlines removed */
  output: string;
  stderr: string;
  /** Exit status, `null` when the command was killed by a signal */
  status: number | null;
}

/**
 * Run `command` through the system shell and wait for it, in the manner of a
 * shell's `$(command)` substitution. Pass the result straight to
 * `assertReturn` to check its status.
 *
 * @throws when the shell itself cannot be spawned
 */
export function capture(command: string, options: CaptureOptions = {}): CaptureResult {
  const result = spawnSync(command, {
    shell: true,
    encoding: 'utf-8',
    cwd: options.cwd,
    env: options.env ?? process.env,
    input: options.input,
    maxBuffer: MAX_OUTPUT_BYTES
  });

  if (result.error) {
    throw result.error;
  }

  return {
    output: result.stdout.replace(/\n+$/, ''),
    stderr: result.stderr,
    status: result.status
  };
}
