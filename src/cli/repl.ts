import readline from 'readline';
import chalk from 'chalk';
import type { Agent } from '../agent/agent.js';
import type { HookRegistry } from '../core/hooks/registry.js';
import type { TerminalRenderer } from './renderer.js';

export interface SlashCommand {
  name: string;
  description: string;
}

export const SLASH_COMMANDS: SlashCommand[] = [
  { name: '/help', description: 'Show this help' },
  { name: '/clear', description: 'Clear the conversation history' },
  { name: '/hooks', description: 'List loaded hooks' },
  { name: '/context', description: 'Show session context and hook-injected context' },
  { name: '/exit', description: 'Exit agentloop' },
];

/**
 * Lines for /hooks: "<trigger>  <name>  (<source>)", grouped in load order
 */
export function describeHooks(registry: HookRegistry): string[] {
  const hooks = registry.all();
  if (hooks.length === 0) {
    return ['No hooks loaded.'];
  }
  return hooks.map((hook) => {
    const condition = hook.condition ? ` if ${hook.condition}` : '';
    return `${hook.trigger.padEnd(17)} ${hook.name}${condition}  (${hook.source})`;
  });
}

export class REPL {
  private abortController: AbortController | null = null;
  private closed = false;

  constructor(
    private readonly agent: Agent,
    private readonly hooks: HookRegistry,
    private readonly renderer: TerminalRenderer,
    private readonly rl: readline.Interface,
  ) {
    this.rl.setPrompt(this.getPrompt());
    this.setupSignalHandlers();
  }

  private getPrompt(): string {
    return `${chalk.blue('›')} `;
  }

  async start(): Promise<void> {
    console.log(chalk.bold('\nWelcome to agentloop'));
    console.log(chalk.dim(`${this.agent.providerName} · Type /help for available commands or start typing to chat.\n`));

    this.rl.on('close', () => {
      this.closed = true;
    });
    this.rl.prompt();

    for await (const line of this.rl) {
      const input = line.trim();

      if (!input) {
        this.rl.prompt();
        continue;
      }

      if (this.isSlashCommand(input)) {
        if (this.handleSlashCommand(input) === 'exit') {
          break;
        }
      } else {
        await this.handleNormalInput(input);
      }

      if (this.closed) break;
      this.rl.prompt();
    }
  }

  isSlashCommand(input: string): boolean {
    return input.startsWith('/');
  }

  private handleSlashCommand(input: string): 'exit' | 'continue' {
    const [command] = input.split(/\s+/);
    switch (command) {
      case '/help':
        for (const entry of SLASH_COMMANDS) {
          this.renderer.info(`${entry.name.padEnd(10)} ${chalk.dim(entry.description)}`);
        }
        break;
      case '/clear':
        this.agent.clearHistory();
        this.renderer.dim('Conversation cleared.');
        break;
      case '/hooks':
        for (const line of describeHooks(this.hooks)) {
          this.renderer.info(line);
        }
        break;
      case '/context':
        this.renderer.info(this.agent.getSystemPrompt());
        break;
      case '/exit':
        return 'exit';
      default:
        this.renderer.error(`Unknown command: ${command}`, 'Type /help for available commands.');
    }
    return 'continue';
  }

  private async handleNormalInput(input: string): Promise<void> {
    this.abortController = new AbortController();
    try {
      await this.agent.runTurn(input, this.abortController.signal);
    } finally {
      this.abortController = null;
    }
  }

  private setupSignalHandlers(): void {
    // Ctrl+C: interrupt the running turn, or leave when idle
    this.rl.on('SIGINT', () => {
      if (this.abortController) {
        this.abortController.abort();
      } else {
        this.rl.close();
      }
    });
  }
}
