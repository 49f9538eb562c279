/**
 * ConfigStore
 *
 * Application-managed flags in <cwd>/.agentloop/state.json. Only the flags
 * listed in ALLOWED_FLAGS can be read or written; every other key in the file
 * is preserved untouched on write.
 */

import path from 'path';
import fs from 'fs-extra';
import type { ConfigValue } from '../../hooks/types.js';
import { ConfigError, ConfigErrorCode, errorMessage } from '../errors/index.js';
import { createLogger } from '../../utils/logger.js';
import { getProjectDir } from '../../utils/index.js';

const STATE_FILE_NAME = 'state.json';

type FlagKind = 'boolean';

/**
 * Dotted flag path -> value kind
 */
export const ALLOWED_FLAGS: Readonly<Record<string, FlagKind>> = {
  'onboarding.demo_seen': 'boolean',
};

const FLAG_DEFAULTS: Readonly<Record<FlagKind, ConfigValue>> = {
  boolean: false,
};

type JsonObject = { [key: string]: unknown };

const logger = createLogger('config');

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerceFlag(flagPath: string, kind: FlagKind, value: ConfigValue): ConfigValue {
  switch (kind) {
    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      throw new ConfigError(
        `Invalid value for ${flagPath}: ${String(value)}`,
        ConfigErrorCode.INVALID_FLAG_VALUE,
        `${flagPath} takes true or false`,
      );
  }
}

export class ConfigStore {
  readonly filePath: string;

  constructor(cwd: string) {
    this.filePath = path.join(getProjectDir(cwd), STATE_FILE_NAME);
  }

  /**
   * Stored value of an allowed flag formatted as a string, its default when
   * unset, or undefined for flags that are not allowed.
   */
  async readFlag(flagPath: string): Promise<string | undefined> {
    const kind = ALLOWED_FLAGS[flagPath];
    if (!kind) {
      return undefined;
    }

    const state = await this.readState();
    const stored = getPath(state, flagPath);
    if (typeof stored === 'string' || typeof stored === 'number' || typeof stored === 'boolean') {
      return String(stored);
    }
    return String(FLAG_DEFAULTS[kind]);
  }

  /**
   * Write one allowed flag, keeping every other key in the file
   *
   * @throws ConfigError for unknown flags, values of the wrong kind, or a
   * state file that is not a JSON object (the file is left as it is)
   */
  async setFlag(flagPath: string, value: ConfigValue): Promise<void> {
    const kind = ALLOWED_FLAGS[flagPath];
    if (!kind) {
      throw new ConfigError(
        `Unknown config flag: ${flagPath}`,
        ConfigErrorCode.UNKNOWN_CONFIG_FLAG,
        `Allowed flags: ${Object.keys(ALLOWED_FLAGS).join(', ')}`,
      );
    }

    const coerced = coerceFlag(flagPath, kind, value);
    const state = await this.readStateStrict();
    setPath(state, flagPath, coerced);
    await this.writeState(state);
  }

  async readState(): Promise<JsonObject> {
    if (!(await fs.pathExists(this.filePath))) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
      return isJsonObject(parsed) ? parsed : {};
    } catch (error) {
      logger.warn(`Ignoring unreadable state file ${this.filePath}: ${errorMessage(error)}`);
      return {};
    }
  }

  private async readStateStrict(): Promise<JsonObject> {
    if (!(await fs.pathExists(this.filePath))) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Invalid JSON in ${this.filePath}: ${errorMessage(error)}`,
        ConfigErrorCode.INVALID_JSON,
        'Fix or remove the state file',
      );
    }
    if (!isJsonObject(parsed)) {
      throw new ConfigError(
        `State file ${this.filePath} must hold a JSON object`,
        ConfigErrorCode.INVALID_JSON,
        'Fix or remove the state file',
      );
    }
    return parsed;
  }

  private async writeState(state: JsonObject): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }
}

function getPath(state: JsonObject, flagPath: string): unknown {
  let current: unknown = state;
  for (const segment of flagPath.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function setPath(state: JsonObject, flagPath: string, value: ConfigValue): void {
  const segments = flagPath.split('.');
  const last = segments.pop();
  if (last === undefined) return;

  let current = state;
  for (const segment of segments) {
    const next = current[segment];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: JsonObject = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}
