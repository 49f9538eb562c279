import chalk from 'chalk';
import type { AgentObserver } from '../agent/agent.js';
import { observationTitle, type Observation } from '../agent/observations.js';
import type { ToolCallRequest } from '../core/llm/provider.js';
import type { ToolError } from '../core/errors/index.js';
import { truncate } from '../utils/index.js';

const RESULT_PREVIEW_LENGTH = 200;

export interface RendererOptions {
  /** Hide tool call lines and hook messages */
  quiet?: boolean;
}

/**
 * Formats one line describing a tool call, e.g. "read_file(path=README.md)"
 */
export function formatToolCall(call: Pick<ToolCallRequest, 'name' | 'args'>): string {
  const args = Object.entries(call.args)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? truncate(value, 60) : JSON.stringify(value)}`)
    .join(', ');
  return `${call.name}(${args})`;
}

/**
 * Terminal output for the agent and hooks
 */
export class TerminalRenderer {
  constructor(
    private readonly out: NodeJS.WritableStream = process.stdout,
    private readonly options: RendererOptions = {},
  ) {}

  private line(text: string): void {
    this.out.write(text + '\n');
  }

  assistantText(text: string): void {
    this.line(text);
  }

  toolCall(call: ToolCallRequest): void {
    if (this.options.quiet) return;
    this.line(chalk.cyan(`● ${formatToolCall(call)}`));
  }

  toolResult(output: string): void {
    if (this.options.quiet) return;
    const firstLine = output.split('\n')[0] ?? '';
    const more = output.includes('\n') ? chalk.dim(' …') : '';
    this.line(chalk.dim(`  ⎿ ${truncate(firstLine, RESULT_PREVIEW_LENGTH)}`) + more);
  }

  toolError(error: ToolError): void {
    this.line(chalk.red(`  ⎿ ${error.code}: ${truncate(error.message, RESULT_PREVIEW_LENGTH)}`));
  }

  toolDenied(reason: string): void {
    this.line(chalk.yellow(`  ⎿ denied: ${reason}`));
  }

  hookMessage(text: string): void {
    if (this.options.quiet) return;
    this.line(chalk.magenta(text));
  }

  /**
   * Startup list of the previous sessions' observations, newest first
   */
  recentObservations(observations: readonly Observation[]): void {
    if (this.options.quiet || observations.length === 0) return;
    this.line(chalk.dim('Recent observations:'));
    observations.forEach((observation, i) => {
      this.line(`  ${chalk.cyan(String(i + 1))} ${chalk.dim(observationTitle(observation))}`);
    });
  }

  observationsSaved(count: number): void {
    if (this.options.quiet || count === 0) return;
    this.line(chalk.green(`✓ Saved ${count} observation(s)`));
  }

  info(text: string): void {
    this.line(text);
  }

  dim(text: string): void {
    this.line(chalk.dim(text));
  }

  warning(text: string): void {
    this.line(chalk.yellow(`Warning: ${text}`));
  }

  error(text: string, suggestion?: string): void {
    this.line(chalk.red(`Error: ${text}`));
    if (suggestion) {
      this.line(chalk.dim(suggestion));
    }
  }

  /**
   * Agent callbacks routed to this renderer
   */
  observer(): AgentObserver {
    return {
      onAssistantText: (text) => this.assistantText(text),
      onToolCall: (call) => this.toolCall(call),
      onToolResult: (_call, output) => this.toolResult(output),
      onToolError: (_call, error) => this.toolError(error),
      onToolDenied: (_call, reason) => this.toolDenied(reason),
      onError: (message) => this.error(message),
      onWarning: (message) => this.warning(message),
    };
  }
}
