/**
 * HookRegistry
 *
 * Loads hook files from the user directory (~/.agentloop/hooks) and the repo
 * directory (<cwd>/.agentloop/hooks) and indexes them by trigger event.
 * A repo hook with the same name and trigger as a user hook takes the user
 * hook's place in the list.
 */

import path from 'path';
import fs from 'fs-extra';
import type { HookEvent } from '../events/types.js';
import type { Hook, HookDefinition, HookSource } from '../../hooks/types.js';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../errors/index.js';
import { isHookFileName, parseHookFile } from './parser.js';

const logger = createLogger('hooks');

export interface HookLoadOptions {
  userDir?: string;
  repoDir?: string;
}

export class HookRegistry {
  private readonly hooks: Map<HookEvent, Hook[]> = new Map();

  /**
   * Load and merge both hook directories. Missing directories load nothing.
   */
  static async load(options: HookLoadOptions): Promise<HookRegistry> {
    const registry = new HookRegistry();

    if (options.userDir) {
      for (const hook of await loadHooksFromDirectory(options.userDir, 'user')) {
        registry.register(hook);
      }
    }
    if (options.repoDir) {
      for (const hook of await loadHooksFromDirectory(options.repoDir, 'repo')) {
        registry.register(hook);
      }
    }

    return registry;
  }

  /**
   * Add a hook. A hook with the same name for the same trigger is replaced in place.
   */
  register(hook: Hook): void {
    const existing = this.hooks.get(hook.trigger) || [];
    const index = existing.findIndex((h) => h.name === hook.name);
    if (index === -1) {
      existing.push(hook);
    } else {
      const replaced = existing[index];
      if (replaced && replaced.source !== hook.source) {
        logger.debug(`Hook "${hook.name}" from ${hook.source} overrides ${replaced.source} hook`);
      }
      existing[index] = hook;
    }
    this.hooks.set(hook.trigger, existing);
  }

  /**
   * Hooks for an event in merge order (empty when none)
   */
  hooksFor(event: HookEvent): readonly Hook[] {
    return this.hooks.get(event) || [];
  }

  hasHooksFor(event: HookEvent): boolean {
    return this.hooksFor(event).length > 0;
  }

  /**
   * First hook with this name, in any trigger
   */
  getHook(name: string): Hook | undefined {
    for (const hooks of this.hooks.values()) {
      const found = hooks.find((h) => h.name === name);
      if (found) return found;
    }
    return undefined;
  }

  all(): Hook[] {
    return Array.from(this.hooks.values()).flat();
  }

  get size(): number {
    return this.all().length;
  }

  /**
   * Get statistics about registered hooks
   */
  getStats(): { total: number; byEvent: Partial<Record<HookEvent, number>> } {
    const byEvent: Partial<Record<HookEvent, number>> = {};
    let total = 0;
    for (const [event, hooks] of this.hooks.entries()) {
      byEvent[event] = hooks.length;
      total += hooks.length;
    }
    return { total, byEvent };
  }

  clear(): void {
    this.hooks.clear();
  }
}

/**
 * Parse every hook file directly inside `dir` (no recursion), in file-name order.
 * Files that fail to parse are logged and skipped.
 */
export async function loadHooksFromDirectory(dir: string, source: HookSource): Promise<Hook[]> {
  let entries: fs.Dirent[];
  try {
    if (!(await fs.pathExists(dir))) {
      return [];
    }
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Cannot read hook directory ${dir}: ${errorMessage(error)}`);
    return [];
  }

  const files = entries
    .filter((entry) => entry.isFile() && isHookFileName(entry.name))
    .map((entry) => entry.name)
    .sort();

  const hooks: Hook[] = [];
  for (const file of files) {
    const filePath = path.join(dir, file);
    let definition: HookDefinition;
    try {
      definition = await parseHookFile(filePath);
    } catch (error) {
      logger.warn(`Skipping hook file: ${errorMessage(error)}`);
      continue;
    }
    hooks.push({ ...definition, source, filePath });
  }
  return hooks;
}
