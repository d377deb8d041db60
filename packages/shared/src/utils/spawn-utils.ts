import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;

  /**
   * Exit code, or `null` when the call returned before the process exited
   */
  code: number | null;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Wait for the process to exit (default: true).
   *
   * When false the promise resolves as soon as the process has started and
   * the child is unref'd, so a long-lived viewer never holds the caller.
   */
  waitForExit?: boolean;
}

/**
 * Execute a command asynchronously and return the result
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('xdg-open', ['/tmp/report.pdf']);
 *
 * // Launch and leave running
 * await spawnAsync('open', ['report.docx'], {
 *   detached: true,
 *   stdio: 'ignore',
 *   waitForExit: false,
 * });
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    waitForExit = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    if (waitForExit) {
      proc.on('close', (code) => {
        resolve({ stdout, stderr, code: code ?? 0 });
      });
    } else {
      proc.on('spawn', () => {
        proc.unref();
        resolve({ stdout, stderr, code: null });
      });
    }

    proc.on('error', reject);
  });
}
