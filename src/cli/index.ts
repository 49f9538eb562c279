import readline from 'readline';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import { ROUTER_MODES, type RouterMode } from '../core/config/types.js';
import { ConfigError, errorMessage } from '../core/errors/index.js';
import { createProvider } from '../core/llm/provider.js';
import { collectSessionContext } from '../core/session-context.js';
import type { TurnOutcome } from '../agent/agent.js';
import { loadRecentObservations } from '../agent/observations.js';
import { ConsoleInteraction, MutableOutput, NonInteractiveInteraction } from './interaction.js';
import { TerminalRenderer } from './renderer.js';
import { REPL } from './repl.js';
import { createAgentSession } from './session.js';

const RECENT_OBSERVATIONS = 5;

export interface CliOptions {
  prompt?: string;
  mode?: RouterMode;
  hooks: boolean;
  quiet: boolean;
  json: boolean;
  debug: boolean;
}

function parseMode(value: string): RouterMode {
  const mode = ROUTER_MODES.find((m) => m === value);
  if (!mode) {
    throw new InvalidArgumentError(`Must be one of: ${ROUTER_MODES.join(', ')}`);
  }
  return mode;
}

export function createProgram(): Command {
  return new Command()
    .name('agentloop')
    .description('Agentic coding REPL with YAML lifecycle hooks')
    .version('0.1.0')
    .option('-p, --prompt <text>', 'Run a single turn non-interactively and exit')
    .option('--mode <mode>', 'Router mode (opus, sonnet, haiku)', parseMode)
    .option('--no-hooks', 'Do not load or run any hooks')
    .option('-q, --quiet', 'Hide tool calls and hook messages', false)
    .option('--json', 'With --prompt, print the turn outcome as JSON', false)
    .option('--debug', 'Log each hook execution', false);
}

/**
 * Exit status for a scripted turn
 */
export function exitCodeFor(outcome: TurnOutcome): number {
  switch (outcome.status) {
    case 'completed':
      return 0;
    case 'interrupted':
      return 130;
    default:
      return 1;
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const cwd = process.cwd();
  const interactive = options.prompt === undefined;

  // JSON output owns stdout; everything else moves to stderr
  const renderer = new TerminalRenderer(options.json ? process.stderr : process.stdout, { quiet: options.quiet });

  let rl: readline.Interface | undefined;
  let output: MutableOutput | undefined;
  if (interactive) {
    output = new MutableOutput(process.stdout);
    rl = readline.createInterface({ input: process.stdin, output, terminal: Boolean(process.stdin.isTTY) });
  }

  try {
    const config = await loadConfig({ cwd });
    const mode = options.mode ?? config.settings.defaultMode;
    const provider = createProvider(config, mode);
    const sessionContext = await collectSessionContext(cwd);

    const session = await createAgentSession({
      cwd,
      config,
      provider,
      interaction: rl && output ? new ConsoleInteraction(rl, output) : new NonInteractiveInteraction(),
      observer: options.json ? undefined : renderer.observer(),
      onHookMessage: (text) => renderer.hookMessage(text),
      hooksEnabled: options.hooks ? undefined : false,
      hooksDebug: options.debug,
      sessionContext,
    });
    const { agent } = session;

    await agent.startSession();
    try {
      if (rl) {
        renderer.recentObservations(await loadRecentObservations(session.observations.filePath, RECENT_OBSERVATIONS));
        await new REPL(agent, session.registry, renderer, rl).start();
        return 0;
      }

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);
      let outcome: TurnOutcome;
      try {
        outcome = await agent.runTurn(options.prompt ?? '', controller.signal);
      } finally {
        process.off('SIGINT', onSigint);
      }

      if (options.json) {
        process.stdout.write(JSON.stringify({ provider: agent.providerName, ...outcome }, null, 2) + '\n');
      }
      return exitCodeFor(outcome);
    } finally {
      renderer.observationsSaved(await agent.endSession());
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      renderer.error(error.message, error.suggestion);
    } else {
      renderer.error(errorMessage(error));
    }
    return 1;
  } finally {
    rl?.close();
  }
}
