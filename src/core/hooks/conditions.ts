/**
 * Hook condition evaluation
 *
 * Conditions are `<prefix>:<argument>` strings:
 *
 * - `on_branch:<name>`          current git branch equals name (`*` matches any)
 * - `has_tool:<bin>`            an executable named bin is on PATH
 * - `equals:<key>:<value>`      hook-local value at key equals value
 * - `env_set:<VAR>`             VAR is set and non-empty
 * - `config_flag:<path>=<value>` stored config flag formats to value
 *
 * Anything else evaluates to false. Evaluation never throws.
 */

import path from 'path';
import fs from 'fs-extra';
import { execa } from 'execa';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../errors/index.js';

const logger = createLogger('hooks');

/**
 * Hook-local key/value state, scoped to one hook execution
 */
export type HookLocalContext = Map<string, string>;

/**
 * Everything a condition may look at outside the hook-local context
 */
export interface ConditionEnvironment {
  currentBranch(): Promise<string | undefined>;
  hasTool(bin: string): Promise<boolean>;
  getEnv(name: string): string | undefined;
  readConfigFlag(flagPath: string): Promise<string | undefined>;
}

/**
 * Reads flag values for `config_flag:` conditions
 */
export interface ConfigFlagReader {
  readFlag(flagPath: string): Promise<string | undefined>;
}

export class SystemConditionEnvironment implements ConditionEnvironment {
  constructor(
    private readonly cwd: string,
    private readonly flags?: ConfigFlagReader,
  ) {}

  async currentBranch(): Promise<string | undefined> {
    const result = await execa('git', ['rev-parse', '--abbrev-ref', 'HEAD'], {
      cwd: this.cwd,
      reject: false,
    });
    if (result.exitCode !== 0) {
      return undefined;
    }
    const branch = result.stdout.trim();
    return branch || undefined;
  }

  async hasTool(bin: string): Promise<boolean> {
    if (!bin || bin.includes('/') || bin.includes(path.sep)) {
      return false;
    }
    const dirs = (process.env.PATH || '').split(path.delimiter).filter(Boolean);
    for (const dir of dirs) {
      try {
        await fs.access(path.join(dir, bin), fs.constants.X_OK);
        return true;
      } catch {
        // not in this directory
      }
    }
    return false;
  }

  getEnv(name: string): string | undefined {
    return process.env[name];
  }

  async readConfigFlag(flagPath: string): Promise<string | undefined> {
    return this.flags ? this.flags.readFlag(flagPath) : undefined;
  }
}

function splitOnce(value: string, separator: string): [string, string] | undefined {
  const index = value.indexOf(separator);
  if (index === -1) {
    return undefined;
  }
  return [value.slice(0, index), value.slice(index + separator.length)];
}

export class ConditionEvaluator {
  constructor(private readonly environment: ConditionEnvironment) {}

  /**
   * Evaluate a condition string against the hook-local context
   */
  async evaluate(condition: string, local: ReadonlyMap<string, string> = new Map()): Promise<boolean> {
    try {
      return await this.evaluateUnchecked(condition.trim(), local);
    } catch (error) {
      logger.warn(`Hook condition "${condition}" could not be evaluated: ${errorMessage(error)}`);
      return false;
    }
  }

  private async evaluateUnchecked(condition: string, local: ReadonlyMap<string, string>): Promise<boolean> {
    const parts = splitOnce(condition, ':');
    if (!parts) {
      logger.warn(`Unknown hook condition "${condition}"`);
      return false;
    }
    const [prefix, argument] = parts;

    switch (prefix) {
      case 'on_branch': {
        if (!argument) return false;
        if (argument === '*') return true;
        const branch = await this.environment.currentBranch();
        return branch === argument;
      }
      case 'has_tool':
        return argument ? this.environment.hasTool(argument) : false;
      case 'equals': {
        const pair = splitOnce(argument, ':');
        if (!pair || !pair[0]) return false;
        return local.get(pair[0]) === pair[1];
      }
      case 'env_set': {
        if (!argument) return false;
        const value = this.environment.getEnv(argument);
        return value !== undefined && value !== '';
      }
      case 'config_flag': {
        const pair = splitOnce(argument, '=');
        if (!pair || !pair[0]) return false;
        const stored = await this.environment.readConfigFlag(pair[0]);
        return stored !== undefined && stored === pair[1];
      }
      default:
        logger.warn(`Unknown hook condition "${condition}"`);
        return false;
    }
  }
}
