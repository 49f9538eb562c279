/**
 * Hook System Types
 *
 * A hook is a YAML file bound to one lifecycle event. When the event fires the
 * hook's optional condition is checked, then its actions run in order against
 * a hook-local key/value context.
 */

import type { HookEvent } from '../core/events/types.js';

export type { HookEvent } from '../core/events/types.js';

/**
 * Where a hook was loaded from. Repo hooks replace user hooks of the same name.
 */
export type HookSource = 'user' | 'repo';

export interface CommandAction {
  type: 'command';
  command: string;
  /** Capture stdout under this key for prompt injection */
  inject_as?: string;
  requires_approval?: boolean;
  approval_prompt?: string;
}

export interface MessageAction {
  type: 'message';
  text: string;
}

export interface ConditionalAction {
  type: 'conditional';
  condition: string;
  then: HookAction[];
}

export interface ConfirmAction {
  type: 'confirm';
  prompt: string;
  set_key: string;
}

export interface PromptAction {
  type: 'prompt';
  prompt: string;
  set_key: string;
}

export interface SecretPromptAction {
  type: 'secret_prompt';
  prompt: string;
  set_key: string;
}

export interface SetEnvAction {
  type: 'set_env';
  name: string;
  from_key: string;
}

export type ConfigValue = string | number | boolean;

export interface SetConfigAction {
  type: 'set_config';
  path: string;
  value: ConfigValue;
}

export type HookAction =
  | CommandAction
  | MessageAction
  | ConditionalAction
  | ConfirmAction
  | PromptAction
  | SecretPromptAction
  | SetEnvAction
  | SetConfigAction;

export type HookActionType = HookAction['type'];

/**
 * Hook definition as written in a hook file
 */
export interface HookDefinition {
  name: string;
  trigger: HookEvent;
  condition?: string;
  actions: HookAction[];
}

/**
 * A hook after loading, tagged with its origin
 */
export interface Hook extends HookDefinition {
  source: HookSource;
  filePath?: string;
}

/**
 * Outcome of one action that produced observable output
 *
 * - ok: ran normally
 * - skipped: nothing ran (e.g. no interaction available)
 * - declined: the user refused an approval-gated command
 * - failed: the command could not be spawned or exited non-zero
 * - blocked: the command exited with code 2, which vetoes the triggering operation
 */
export type HookResultStatus = 'ok' | 'skipped' | 'declined' | 'failed' | 'blocked';

export interface HookResult {
  hookName: string;
  /** Index of the top-level action this result came from */
  actionIndex: number;
  output: string;
  /** Key under which `output` is injected into the system prompt */
  injectKey?: string;
  status: HookResultStatus;
}

/**
 * User interaction used by approval-gated commands and the confirm/prompt actions.
 * Interactive sessions read the terminal; scripted runs answer with fixed defaults.
 */
export interface HookInteraction {
  /** An aborted signal (Ctrl+C during the turn) answers no */
  confirm(prompt: string, signal?: AbortSignal): Promise<boolean>;
  /** An aborted signal answers undefined */
  prompt(prompt: string, signal?: AbortSignal): Promise<string | undefined>;
  /** Like prompt, but the answer must not be echoed */
  secretPrompt(prompt: string, signal?: AbortSignal): Promise<string | undefined>;
}

/**
 * Aggregated outcome of running every hook for one event firing
 */
export interface HookEventResult {
  event: HookEvent;
  results: HookResult[];
  /** inject key -> output, later writes win */
  injections: Map<string, string>;
  /** True when a hook declined or blocked the triggering operation */
  denied: boolean;
  denialReason?: string;
  totalDuration: number;
}

/**
 * Hook manager options
 */
export interface HookManagerOptions {
  /** Run no hooks at all (the --no-hooks flag) */
  disabled?: boolean;
  /** Debug mode - log each hook execution */
  debug?: boolean;
}
