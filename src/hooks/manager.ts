/**
 * Hook Manager
 *
 * Runs every registered hook for an event firing and folds the per-action
 * results into one HookEventResult: the injections to merge into the system
 * prompt and, for PreToolUse, whether the tool call is denied.
 */

import type { EventContext } from '../core/events/context.js';
import type { HookEvent } from '../core/events/types.js';
import type { HookExecutor } from '../core/hooks/executor.js';
import type { HookRegistry } from '../core/hooks/registry.js';
import { createLogger } from '../utils/logger.js';
import type { HookEventResult, HookManagerOptions, HookResult } from './types.js';

const logger = createLogger('hooks');

/**
 * Events on which a declined or blocked command vetoes the operation
 */
const DENIABLE_EVENTS: ReadonlySet<HookEvent> = new Set<HookEvent>(['PreToolUse']);

export class HookManager {
  private readonly options: Required<HookManagerOptions>;

  constructor(
    readonly registry: HookRegistry,
    private readonly executor: HookExecutor,
    options: HookManagerOptions = {},
  ) {
    this.options = {
      disabled: options.disabled ?? false,
      debug: options.debug ?? false,
    };
  }

  get enabled(): boolean {
    return !this.options.disabled;
  }

  /**
   * Execute all hooks for an event, one after another in registry order
   */
  async run(event: HookEvent, context: EventContext, signal?: AbortSignal): Promise<HookEventResult> {
    const startTime = Date.now();
    const results: HookResult[] = [];

    if (this.options.disabled) {
      return this.aggregate(event, results, startTime);
    }

    for (const hook of this.registry.hooksFor(event)) {
      if (signal?.aborted) break;
      if (this.options.debug) {
        logger.info(`Executing hook "${hook.name}" (${hook.source}) for ${event}`);
      }
      results.push(...(await this.executor.execute(hook, context, signal)));
    }

    return this.aggregate(event, results, startTime);
  }

  private aggregate(event: HookEvent, results: HookResult[], startTime: number): HookEventResult {
    const injections = new Map<string, string>();
    for (const result of results) {
      if (result.status === 'ok' && result.injectKey) {
        injections.set(result.injectKey, result.output);
      }
    }

    const veto = DENIABLE_EVENTS.has(event)
      ? results.find((r) => r.status === 'declined' || r.status === 'blocked')
      : undefined;

    return {
      event,
      results,
      injections,
      denied: veto !== undefined,
      denialReason: veto ? describeVeto(veto) : undefined,
      totalDuration: Date.now() - startTime,
    };
  }
}

function describeVeto(result: HookResult): string {
  if (result.status === 'declined') {
    return `Hook "${result.hookName}" was not approved`;
  }
  return result.output
    ? `Blocked by hook "${result.hookName}": ${result.output}`
    : `Blocked by hook "${result.hookName}"`;
}
