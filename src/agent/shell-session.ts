import path from 'path';
import { execa } from 'execa';

export interface ExecuteResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export const DEFAULT_SHELL_TIMEOUT = 120_000;

/**
 * Runs shell commands for the bash tool, always from the session's working directory
 */
export class ShellSession {
  private readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = path.resolve(cwd);
  }

  async execute(command: string, options: { timeout?: number; signal?: AbortSignal } = {}): Promise<ExecuteResult> {
    const result = await execa(command, {
      cwd: this.cwd,
      shell: true,
      timeout: options.timeout ?? DEFAULT_SHELL_TIMEOUT,
      signal: options.signal,
      reject: false,
      stdin: 'ignore',
    });

    return {
      // undefined when killed by a signal
      code: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
    };
  }

  getCwd(): string {
    return this.cwd;
  }
}
