import readline from 'readline';
import { Writable } from 'stream';
import type { HookInteraction } from '../hooks/types.js';

/**
 * Output stream for readline that can stop echoing (secret input)
 */
export class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream = process.stdout) {
    super();
  }

  get columns(): number | undefined {
    return 'columns' in this.target && typeof this.target.columns === 'number' ? this.target.columns : undefined;
  }

  /**
   * Write past the mute, for prompt text around a secret answer
   */
  writeThrough(text: string): void {
    this.target.write(text);
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

/**
 * Interactive answers read from the REPL's readline
 */
export class ConsoleInteraction implements HookInteraction {
  constructor(
    private readonly rl: readline.Interface,
    private readonly output: MutableOutput,
  ) {}

  async confirm(prompt: string, signal?: AbortSignal): Promise<boolean> {
    const answer = await this.ask(`${prompt} [y/N] `, signal);
    return answer !== undefined && /^y(es)?$/i.test(answer.trim());
  }

  async prompt(prompt: string, signal?: AbortSignal): Promise<string | undefined> {
    return this.ask(`${prompt} `, signal);
  }

  async secretPrompt(prompt: string, signal?: AbortSignal): Promise<string | undefined> {
    this.output.writeThrough(`${prompt} `);
    this.output.muted = true;
    try {
      return await this.ask('', signal);
    } finally {
      this.output.muted = false;
      this.output.writeThrough('\n');
    }
  }

  /**
   * One line of input; '' when readline closes, undefined when `signal` aborts
   */
  private ask(question: string, signal?: AbortSignal): Promise<string | undefined> {
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      const cleanup = (): void => {
        this.rl.off('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };
      const onClose = (): void => {
        cleanup();
        resolve('');
      };
      const onAbort = (): void => {
        cleanup();
        resolve(undefined);
      };
      this.rl.once('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
      const done = (answer: string): void => {
        cleanup();
        resolve(answer);
      };
      if (signal) {
        this.rl.question(question, { signal }, done);
      } else {
        this.rl.question(question, done);
      }
    });
  }
}

/**
 * Scripted runs: nothing is approved and prompts get no answer
 */
export class NonInteractiveInteraction implements HookInteraction {
  async confirm(): Promise<boolean> {
    return false;
  }

  async prompt(): Promise<string | undefined> {
    return undefined;
  }

  async secretPrompt(): Promise<string | undefined> {
    return undefined;
  }
}
