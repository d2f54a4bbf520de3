import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
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
}

/**
 * Execute a command asynchronously and return its captured output.
 *
 * Output is decoded as UTF-8 once the process closes, so multi-byte
 * characters split across chunks (Cyrillic OCR output) stay intact.
 * Rejects only when the process cannot be started (e.g. ENOENT);
 * a non-zero exit code resolves normally.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/invoice.pdf']);
 * if (result.code !== 0) {
 *   logger.warn(result.stderr);
 * }
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
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });
    }

    proc.on('close', (code) => {
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        code: code ?? 0,
      });
    });

    proc.on('error', reject);
  });
}

/**
 * Check whether a command-line tool can be started.
 *
 * Runs the command with harmless probe arguments (usually a version
 * flag). Any exit code counts as available, since several tools print
 * their version with a non-zero status; only a failure to start does not.
 */
export async function isCommandAvailable(
  command: string,
  probeArgs: string[] = ['--version'],
): Promise<boolean> {
  try {
    await spawnAsync(command, probeArgs, {
      captureStdout: false,
      captureStderr: false,
    });
    return true;
  } catch {
    return false;
  }
}
