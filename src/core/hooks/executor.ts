/**
 * HookExecutor
 *
 * Runs one hook: checks its condition, then interprets its actions in order
 * against a fresh hook-local context. Nothing escapes `execute`; a failing
 * action is logged and the next one runs.
 *
 * Command protocol:
 * - Input: `{ event, hook, context }` as JSON on stdin, AGENTLOOP_* variables in the environment
 * - Output: trimmed stdout, injected into the system prompt when `inject_as` is set
 * - Exit codes: 0=ok, 2=block, other=failed (fail open)
 */

import type { EventContext } from '../events/context.js';
import type { ConfigValue, Hook, HookAction, HookInteraction, HookResult } from '../../hooks/types.js';
import { ShellCommandRunner, type CommandRunner } from '../../hooks/runner.js';
import { createLogger } from '../../utils/logger.js';
import { takeChars } from '../../utils/index.js';
import { errorMessage } from '../errors/index.js';
import type { ConditionEvaluator, HookLocalContext } from './conditions.js';

export const DEFAULT_MAX_INJECT_LENGTH = 2000;
export const DEFAULT_COMMAND_TIMEOUT = 60_000;
export const BLOCK_EXIT_CODE = 2;

const logger = createLogger('hooks');

/**
 * Writes app-managed config flags for `set_config`
 */
export interface ConfigFlagWriter {
  setFlag(flagPath: string, value: ConfigValue): Promise<void>;
}

export interface HookExecutorOptions {
  /** Working directory for hook commands */
  cwd: string;
  sessionId: string;
  conditions: ConditionEvaluator;
  configStore: ConfigFlagWriter;
  interaction: HookInteraction;
  runner?: CommandRunner;
  /** Where `message` actions are shown (default: stdout) */
  onMessage?: (text: string, hook: Hook) => void;
  maxInjectLength?: number;
  commandTimeout?: number;
}

/** State shared by every action of one hook execution */
interface ExecutionState {
  hook: Hook;
  context: EventContext;
  local: HookLocalContext;
  results: HookResult[];
  signal?: AbortSignal;
}

export class HookExecutor {
  private readonly runner: CommandRunner;
  private readonly maxInjectLength: number;
  private readonly commandTimeout: number;
  private readonly onMessage: (text: string, hook: Hook) => void;

  constructor(private readonly options: HookExecutorOptions) {
    this.runner = options.runner ?? new ShellCommandRunner();
    this.maxInjectLength = options.maxInjectLength ?? DEFAULT_MAX_INJECT_LENGTH;
    this.commandTimeout = options.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT;
    this.onMessage = options.onMessage ?? ((text) => console.log(text));
  }

  /**
   * Run a hook for the event in `context`. Returns one result per action with
   * observable output; an unmet condition returns no results.
   */
  async execute(hook: Hook, context: EventContext, signal?: AbortSignal): Promise<HookResult[]> {
    if (hook.condition && !(await this.options.conditions.evaluate(hook.condition))) {
      logger.debug(`Hook "${hook.name}" skipped: condition "${hook.condition}" not met`);
      return [];
    }

    const state: ExecutionState = { hook, context, local: new Map(), results: [], signal };
    for (const [index, action] of hook.actions.entries()) {
      if (signal?.aborted) {
        logger.debug(`Hook "${hook.name}" interrupted before action ${index}`);
        break;
      }
      await this.runAction(action, index, state);
    }
    return state.results;
  }

  private async runAction(action: HookAction, actionIndex: number, state: ExecutionState): Promise<void> {
    try {
      await this.dispatch(action, actionIndex, state);
    } catch (error) {
      logger.warn(`Hook "${state.hook.name}" ${action.type} action failed: ${errorMessage(error)}`);
    }
  }

  private async dispatch(action: HookAction, actionIndex: number, state: ExecutionState): Promise<void> {
    const { hook, local, results } = state;
    const interaction = this.options.interaction;

    switch (action.type) {
      case 'message':
        results.push({ hookName: hook.name, actionIndex, output: action.text, status: 'ok' });
        this.onMessage(action.text, hook);
        return;

      case 'command':
        await this.runCommand(action, actionIndex, state);
        return;

      case 'conditional':
        if (await this.options.conditions.evaluate(action.condition, local)) {
          for (const nested of action.then) {
            await this.runAction(nested, actionIndex, state);
          }
        }
        return;

      case 'confirm':
        local.set(action.set_key, String(await interaction.confirm(action.prompt, state.signal)));
        return;

      case 'prompt':
        local.set(action.set_key, (await interaction.prompt(action.prompt, state.signal)) ?? '');
        return;

      case 'secret_prompt':
        local.set(action.set_key, (await interaction.secretPrompt(action.prompt, state.signal)) ?? '');
        return;

      case 'set_env': {
        const value = local.get(action.from_key);
        if (!value) {
          logger.warn(`Hook "${hook.name}": "${action.from_key}" is empty, ${action.name} not set`);
          return;
        }
        // Process-wide: visible to later conditions, hooks and subprocesses
        process.env[action.name] = value;
        logger.debug(`Hook "${hook.name}" set ${action.name}`);
        return;
      }

      case 'set_config':
        await this.options.configStore.setFlag(action.path, action.value);
        return;

      default: {
        const unhandled: never = action;
        logger.warn(`Hook "${hook.name}": unsupported action ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async runCommand(
    action: Extract<HookAction, { type: 'command' }>,
    actionIndex: number,
    state: ExecutionState,
  ): Promise<void> {
    const { hook, context, results } = state;

    if (action.requires_approval) {
      const approved = await this.options.interaction.confirm(
        action.approval_prompt ?? `Run hook command: ${action.command}?`,
        state.signal,
      );
      if (!approved) {
        results.push({
          hookName: hook.name,
          actionIndex,
          output: `Skipped (not approved): ${action.command}`,
          status: 'declined',
        });
        return;
      }
    }

    const result = await this.runner.run(action.command, {
      cwd: this.options.cwd,
      env: this.commandEnv(hook, context),
      stdin: JSON.stringify({ event: hook.trigger, hook: hook.name, context: context.toJSON() }),
      timeout: this.commandTimeout,
      signal: state.signal,
    });

    if (result.exitCode === BLOCK_EXIT_CODE && !result.error) {
      results.push({ hookName: hook.name, actionIndex, output: result.stderr.trim(), status: 'blocked' });
      return;
    }

    if (result.error || result.exitCode !== 0) {
      logger.warn(
        `Hook "${hook.name}" command failed (exit ${result.exitCode}): ${result.error ?? result.stderr.trim()}`,
      );
      results.push({ hookName: hook.name, actionIndex, output: '', status: 'failed' });
      return;
    }

    const output = result.stdout.trim();
    if (action.inject_as) {
      results.push({
        hookName: hook.name,
        actionIndex,
        output: takeChars(output, this.maxInjectLength),
        injectKey: action.inject_as,
        status: 'ok',
      });
    } else {
      results.push({ hookName: hook.name, actionIndex, output, status: 'ok' });
    }
  }

  private commandEnv(hook: Hook, context: EventContext): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) env[key] = value;
    }
    env.AGENTLOOP_EVENT = hook.trigger;
    env.AGENTLOOP_HOOK = hook.name;
    env.AGENTLOOP_CWD = this.options.cwd;
    env.AGENTLOOP_SESSION_ID = this.options.sessionId;
    if (context.toolName) {
      env.AGENTLOOP_TOOL_NAME = context.toolName;
    }
    return env;
  }
}
