/**
 * Hook command runner
 *
 * Runs a hook command through `sh -c` with JSON on stdin.
 * Exit codes: 0 = ok, 2 = block, anything else = failed (fail open).
 */

import { spawn } from 'child_process';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('hooks');

export interface CommandRunOptions {
  cwd: string;
  env: Record<string, string>;
  /** Written to the command's stdin, then stdin is closed */
  stdin: string;
  /** Milliseconds before SIGTERM */
  timeout: number;
  signal?: AbortSignal;
}

export interface CommandRunResult {
  /** Exit code; 124 after a timeout, 130 after an abort */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned, timed out or was aborted */
  error?: string;
}

export interface CommandRunner {
  run(command: string, options: CommandRunOptions): Promise<CommandRunResult>;
}

export const TIMEOUT_EXIT_CODE = 124;
export const ABORT_EXIT_CODE = 130;

export class ShellCommandRunner implements CommandRunner {
  run(command: string, options: CommandRunOptions): Promise<CommandRunResult> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let aborted = false;
      let settled = false;

      const finish = (result: CommandRunResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        options.signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const child = spawn('sh', ['-c', command], {
        cwd: options.cwd,
        env: options.env,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, options.timeout);

      const onAbort = (): void => {
        aborted = true;
        child.kill('SIGTERM');
      };
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      // The command may exit without reading stdin
      child.stdin.on('error', (error) => {
        logger.debug(`Hook command stdin closed early: ${error.message}`);
      });
      child.stdin.end(options.stdin);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        finish({ exitCode: 1, stdout, stderr, error: error.message });
      });

      child.on('close', (code) => {
        if (timedOut) {
          finish({ exitCode: TIMEOUT_EXIT_CODE, stdout, stderr, error: `Command timed out after ${options.timeout}ms` });
        } else if (aborted) {
          finish({ exitCode: ABORT_EXIT_CODE, stdout, stderr, error: 'Command interrupted' });
        } else {
          finish({ exitCode: code ?? 1, stdout, stderr });
        }
      });
    });
  }
}
