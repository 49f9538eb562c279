/**
 * Agent
 *
 * Drives one turn at a time: the user message goes in, the provider is called
 * until it stops asking for tools, and lifecycle events fire along the way.
 *
 * Turn flow:
 *   UserPromptSubmit -> infer -> (PreToolUse -> tool -> PostToolUse | OnError)* -> infer ... -> InferenceComplete
 *
 * Hooks observe each event through the EventManager. Their injections land in
 * the session's InjectedContext; a PreToolUse denial is picked up right after
 * the firing and replaces the tool call with a denied result.
 *
 * @path references in the input are inlined after UserPromptSubmit, so hooks
 * see the message as typed. Successful tool runs are captured as observations
 * and saved at SessionEnd.
 */

import { HumanMessage, ToolMessage, type BaseMessage } from '@langchain/core/messages';
import { EventContext } from '../core/events/context.js';
import type { EventHandler, EventManager } from '../core/events/manager.js';
import { HOOK_EVENTS, type HookEvent } from '../core/events/types.js';
import { errorMessage, type ToolError } from '../core/errors/index.js';
import { DEFAULT_MAX_ITERATIONS } from '../core/config/loader.js';
import type { InferenceResponse, LLMProvider, ToolCallRequest } from '../core/llm/provider.js';
import type { HookManager } from '../hooks/manager.js';
import { createLogger } from '../utils/logger.js';
import type { FileReferenceResolver } from './file-refs.js';
import { InjectedContext } from './injected-context.js';
import type { ObservationManager } from './observations.js';
import type { ToolRegistry } from './tool-registry.js';

export const DEFAULT_SYSTEM_PROMPT = `You are agentloop, a coding assistant working in the user's project directory.
Use the tools to inspect and change files and to run commands. Paths are relative to the working directory.
Prefer small, verifiable steps and report what you changed.`;

const logger = createLogger('agent');

/**
 * UI callbacks; every method is optional
 */
export interface AgentObserver {
  onAssistantText?(text: string): void;
  onToolCall?(call: ToolCallRequest): void;
  onToolResult?(call: ToolCallRequest, output: string): void;
  onToolError?(call: ToolCallRequest, error: ToolError): void;
  onToolDenied?(call: ToolCallRequest, reason: string): void;
  onError?(message: string): void;
  onWarning?(message: string): void;
}

export interface AgentOptions {
  provider: LLMProvider;
  tools: ToolRegistry;
  events: EventManager;
  hooks?: HookManager;
  /** VCS summary passed to every event and the system prompt */
  sessionContext?: string;
  systemPrompt?: string;
  maxIterations?: number;
  observer?: AgentObserver;
  /** Inlines @path references; input is sent as typed without one */
  fileReferences?: FileReferenceResolver;
  observations?: ObservationManager;
}

export type TurnOutcome =
  | { status: 'completed'; text: string; iterations: number; toolCalls: number }
  | { status: 'max_iterations'; text: string; iterations: number; toolCalls: number }
  | { status: 'error'; error: string }
  | { status: 'interrupted' };

/**
 * System prompt: base text, session context, then one section per injected key
 */
export function buildSystemPrompt(base: string, sessionContext: string | undefined, injected: InjectedContext): string {
  const sections = [base];
  if (sessionContext) {
    sections.push(`## Session Context\n${sessionContext}`);
  }
  if (injected.size > 0) {
    sections.push(`## Additional Context from Hooks\n${injected.render()}`);
  }
  return sections.join('\n\n');
}

export class Agent {
  readonly injected = new InjectedContext();
  private history: BaseMessage[] = [];
  private readonly provider: LLMProvider;
  private readonly tools: ToolRegistry;
  private readonly events: EventManager;
  private readonly hooks?: HookManager;
  private readonly sessionContext?: string;
  private readonly systemPrompt: string;
  private readonly maxIterations: number;
  private readonly observer: AgentObserver;
  private readonly fileReferences?: FileReferenceResolver;
  private readonly observations?: ObservationManager;

  private activeSignal?: AbortSignal;
  private pendingDenial?: string;
  private sessionStarted = false;
  private sessionEnded = false;

  constructor(options: AgentOptions) {
    this.provider = options.provider;
    this.tools = options.tools;
    this.events = options.events;
    this.hooks = options.hooks;
    this.sessionContext = options.sessionContext;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.observer = options.observer ?? {};
    this.fileReferences = options.fileReferences;
    this.observations = options.observations;

    if (this.hooks) {
      for (const event of HOOK_EVENTS) {
        this.events.on(event, this.runHooks);
      }
    }
  }

  getHistory(): readonly BaseMessage[] {
    return this.history;
  }

  /**
   * Forget the conversation; injected hook context stays
   */
  clearHistory(): void {
    this.history = [];
  }

  getSystemPrompt(): string {
    return buildSystemPrompt(this.systemPrompt, this.sessionContext, this.injected);
  }

  get providerName(): string {
    return `${this.provider.name}:${this.provider.model}`;
  }

  /**
   * Fire SessionStart (once per agent)
   */
  async startSession(): Promise<void> {
    if (this.sessionStarted) return;
    this.sessionStarted = true;
    await this.events.fire('SessionStart', this.baseContext());
  }

  /**
   * Fire SessionEnd and save captured observations (once per agent)
   *
   * @returns how many observations were saved
   */
  async endSession(): Promise<number> {
    if (this.sessionEnded) return 0;
    this.sessionEnded = true;
    await this.events.fire('SessionEnd', this.baseContext().withMetadata('messages', String(this.history.length)));

    if (!this.observations) return 0;
    try {
      return await this.observations.save();
    } catch (error) {
      const message = `Failed to save observations: ${errorMessage(error)}`;
      logger.warn(message);
      this.observer.onWarning?.(message);
      return 0;
    }
  }

  /**
   * Run one turn. Never throws: failures come back as an outcome and leave the
   * history as it was before the turn.
   */
  async runTurn(input: string, signal?: AbortSignal): Promise<TurnOutcome> {
    const snapshot = this.history.length;
    this.activeSignal = signal;

    try {
      await this.events.fire('UserPromptSubmit', this.baseContext().withUserMessage(input));
      if (signal?.aborted) return await this.interrupt(snapshot);

      const message = this.fileReferences ? (await this.fileReferences.expand(input)).text : input;
      this.history.push(new HumanMessage(message));

      let iterations = 0;
      let toolCalls = 0;
      let lastText = '';

      while (iterations < this.maxIterations) {
        iterations++;

        let response: InferenceResponse;
        try {
          response = await this.provider.infer({
            system: this.getSystemPrompt(),
            messages: [...this.history],
            tools: this.tools.getAll(),
            signal,
          });
        } catch (error) {
          if (signal?.aborted) return await this.interrupt(snapshot);
          return await this.fail(snapshot, errorMessage(error));
        }

        this.history.push(response.message);
        lastText = response.text;
        if (response.text) {
          this.observer.onAssistantText?.(response.text);
        }

        if (response.toolCalls.length === 0) {
          await this.complete(input, iterations);
          return { status: 'completed', text: response.text, iterations, toolCalls };
        }

        for (const call of response.toolCalls) {
          if (signal?.aborted) return await this.interrupt(snapshot);
          toolCalls++;
          this.history.push(await this.runToolCall(call, signal));
        }
        if (signal?.aborted) return await this.interrupt(snapshot);
      }

      await this.warn(`Stopped after ${this.maxIterations} iterations without a final answer`);
      await this.complete(input, iterations);
      return { status: 'max_iterations', text: lastText, iterations, toolCalls };
    } finally {
      this.activeSignal = undefined;
      this.pendingDenial = undefined;
    }
  }

  private async runToolCall(call: ToolCallRequest, signal?: AbortSignal): Promise<ToolMessage> {
    this.observer.onToolCall?.(call);
    const base = this.baseContext().withToolName(call.name);

    this.pendingDenial = undefined;
    await this.events.fire(
      'PreToolUse',
      base.withMetadata('tool_call_id', call.id).withMetadata('tool_args', JSON.stringify(call.args)),
    );
    const denial = this.pendingDenial;
    this.pendingDenial = undefined;

    if (denial !== undefined) {
      logger.debug(`Tool ${call.name} denied: ${denial}`);
      this.observer.onToolDenied?.(call, denial);
      return new ToolMessage({
        content: `Tool call denied: ${denial}`,
        tool_call_id: call.id,
        name: call.name,
        status: 'error',
      });
    }

    const result = await this.tools.execute(call.name, call.args, signal);
    if (result.ok) {
      this.observations?.capture(call.name, call.args, result.output, call.id);
      this.observer.onToolResult?.(call, result.output);
      await this.events.fire('PostToolUse', base.withToolOutput(result.output));
      return new ToolMessage({ content: result.output, tool_call_id: call.id, name: call.name });
    }

    const message = `${result.error.code}: ${result.error.message}`;
    this.observer.onToolError?.(call, result.error);
    await this.events.fire('OnError', base.withError(message));
    return new ToolMessage({
      content: `Error: ${message}`,
      tool_call_id: call.id,
      name: call.name,
      status: 'error',
    });
  }

  private async complete(input: string, iterations: number): Promise<void> {
    await this.events.fire(
      'InferenceComplete',
      this.baseContext().withUserMessage(input).withMetadata('iterations', String(iterations)),
    );
  }

  private async fail(snapshot: number, message: string): Promise<TurnOutcome> {
    this.history.splice(snapshot);
    logger.debug(`Turn failed: ${message}`);
    this.observer.onError?.(message);
    await this.events.fire('OnError', this.baseContext().withError(message));
    return { status: 'error', error: message };
  }

  private async interrupt(snapshot: number): Promise<TurnOutcome> {
    this.history.splice(snapshot);
    // Hooks for the warning itself must not see the aborted signal
    this.activeSignal = undefined;
    await this.warn('Turn interrupted');
    return { status: 'interrupted' };
  }

  private async warn(message: string): Promise<void> {
    this.observer.onWarning?.(message);
    await this.events.fire('OnWarning', this.baseContext().withWarning(message));
  }

  private baseContext(): EventContext {
    return this.sessionContext ? EventContext.empty().withSessionContext(this.sessionContext) : EventContext.empty();
  }

  private readonly runHooks: EventHandler = async (event: HookEvent, context: EventContext) => {
    if (!this.hooks) return;
    const outcome = await this.hooks.run(event, context, this.activeSignal);
    this.injected.merge(outcome.injections);
    if (outcome.denied) {
      this.pendingDenial = outcome.denialReason ?? 'Denied by hook';
    }
  };
}
