/**
 * Session wiring
 *
 * Builds the object graph for one agentloop process: hook registry and
 * executor, event manager, tools, observation capture and agent. The CLI passes real collaborators;
 * tests pass fakes for the provider, interaction, command runner and
 * condition environment.
 */

import path from 'path';
import { Agent, type AgentObserver } from '../agent/agent.js';
import { FileReferenceResolver } from '../agent/file-refs.js';
import { ObservationManager, observationsPath } from '../agent/observations.js';
import { ToolRegistry } from '../agent/tool-registry.js';
import { createTools } from '../agent/tools.js';
import type { AgentLoopConfig } from '../core/config/types.js';
import { ConfigStore } from '../core/config/store.js';
import { EventManager } from '../core/events/manager.js';
import {
  ConditionEvaluator,
  SystemConditionEnvironment,
  type ConditionEnvironment,
} from '../core/hooks/conditions.js';
import { HookExecutor } from '../core/hooks/executor.js';
import { HookRegistry } from '../core/hooks/registry.js';
import type { LLMProvider } from '../core/llm/provider.js';
import { HookManager } from '../hooks/manager.js';
import type { CommandRunner } from '../hooks/runner.js';
import type { HookInteraction } from '../hooks/types.js';
import { generateSessionId, getProjectDir, getUserDir } from '../utils/index.js';

export const HOOKS_DIR_NAME = 'hooks';

export interface AgentSessionOptions {
  cwd: string;
  config: AgentLoopConfig;
  provider: LLMProvider;
  interaction: HookInteraction;
  observer?: AgentObserver;
  /** Where hook `message` actions go */
  onHookMessage?: (text: string) => void;
  /** Overrides config.settings.hooks.enabled (the --no-hooks flag) */
  hooksEnabled?: boolean;
  hooksDebug?: boolean;
  /** Default: ~/.agentloop/hooks */
  userHooksDir?: string;
  /** Default: <cwd>/.agentloop/hooks */
  repoHooksDir?: string;
  runner?: CommandRunner;
  conditions?: ConditionEnvironment;
  sessionContext?: string;
  sessionId?: string;
}

export interface AgentSession {
  sessionId: string;
  agent: Agent;
  events: EventManager;
  hooks: HookManager;
  registry: HookRegistry;
  configStore: ConfigStore;
  observations: ObservationManager;
}

export async function createAgentSession(options: AgentSessionOptions): Promise<AgentSession> {
  const { cwd, config } = options;
  const sessionId = options.sessionId ?? generateSessionId();
  const hookSettings = config.settings.hooks;
  const hooksEnabled = options.hooksEnabled ?? hookSettings.enabled;

  const registry = hooksEnabled
    ? await HookRegistry.load({
        userDir: options.userHooksDir ?? path.join(getUserDir(), HOOKS_DIR_NAME),
        repoDir: options.repoHooksDir ?? path.join(getProjectDir(cwd), HOOKS_DIR_NAME),
      })
    : new HookRegistry();

  const configStore = new ConfigStore(cwd);
  const executor = new HookExecutor({
    cwd,
    sessionId,
    conditions: new ConditionEvaluator(options.conditions ?? new SystemConditionEnvironment(cwd, configStore)),
    configStore,
    interaction: options.interaction,
    runner: options.runner,
    onMessage: options.onHookMessage,
    maxInjectLength: hookSettings.maxInjectLength,
    commandTimeout: hookSettings.commandTimeout,
  });
  const hooks = new HookManager(registry, executor, { disabled: !hooksEnabled, debug: options.hooksDebug });

  const tools = new ToolRegistry();
  tools.registerAll(createTools(cwd));

  const observations = new ObservationManager(sessionId, observationsPath(cwd));
  const events = new EventManager();
  const agent = new Agent({
    provider: options.provider,
    tools,
    events,
    hooks,
    sessionContext: options.sessionContext,
    maxIterations: config.settings.maxIterations,
    observer: options.observer,
    fileReferences: new FileReferenceResolver(cwd, config.settings.fileReferences),
    observations,
  });

  return { sessionId, agent, events, hooks, registry, configStore, observations };
}
