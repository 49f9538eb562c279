import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import type { AgentLoopConfig, ProviderConfig } from './types.js';
import { ROUTER_MODES } from './types.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { validateRouterModels } from './parser.js';
import { getProjectDir, getUserDir } from '../../utils/index.js';
import { DEFAULT_COMMAND_TIMEOUT, DEFAULT_MAX_INJECT_LENGTH } from '../hooks/executor.js';
import { DEFAULT_FILE_REFERENCE_EXTENSIONS, DEFAULT_FILE_REFERENCE_MAX_SIZE } from '../../agent/file-refs.js';

const CONFIG_FILE_NAME = 'config.json';

export const DEFAULT_MAX_ITERATIONS = 25;

const ProviderSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'openai-compatible', 'ollama']).optional(),
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  models: z.array(z.string()).optional(),
});

/**
 * Shape of one config.json. Every section is optional; unknown keys are ignored.
 */
const ConfigFileSchema = z.object({
  providers: z.array(ProviderSchema).optional(),
  router: z
    .object({
      opus: z.string(),
      sonnet: z.string(),
      haiku: z.string(),
      default: z.string(),
    })
    .partial()
    .optional(),
  settings: z
    .object({
      defaultMode: z.enum(ROUTER_MODES).optional(),
      maxIterations: z.number().int().positive().optional(),
      hooks: z
        .object({
          enabled: z.boolean(),
          commandTimeout: z.number().int().positive(),
          maxInjectLength: z.number().int().positive(),
        })
        .partial()
        .optional(),
      fileReferences: z
        .object({
          enabled: z.boolean(),
          maxSize: z.number().int().positive(),
          allowedExtensions: z.array(z.string().min(1)),
        })
        .partial()
        .optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Load and merge configuration from all sources
 *
 * Loading order (priority):
 * 1. Defaults
 * 2. Global config (~/.agentloop/config.json)
 * 3. Project config (<cwd>/.agentloop/config.json) - overrides global
 */
export async function loadConfig(options: { cwd?: string; userDir?: string } = {}): Promise<AgentLoopConfig> {
  const cwd = options.cwd || process.cwd();
  const userDir = options.userDir || getUserDir();

  let config = getDefaultConfig();

  const globalConfig = await readConfigFile(path.join(userDir, CONFIG_FILE_NAME));
  if (globalConfig) {
    config = mergeConfigs(config, globalConfig);
  }

  const projectConfig = await readConfigFile(path.join(getProjectDir(cwd), CONFIG_FILE_NAME));
  if (projectConfig) {
    config = mergeConfigs(config, projectConfig);
  }

  validateRouterModels(config);
  return config;
}

/**
 * Merge a config file over a base configuration
 * - providers: deduplicated by name, later file wins
 * - router: shallow merge
 * - settings: deep merge (hooks and fileReferences merged key by key)
 */
export function mergeConfigs(base: AgentLoopConfig, file: ConfigFile): AgentLoopConfig {
  const settings = file.settings ?? {};
  return {
    providers: mergeProviders(base.providers, file.providers ?? []),
    router: { ...base.router, ...file.router },
    settings: {
      defaultMode: settings.defaultMode ?? base.settings.defaultMode,
      maxIterations: settings.maxIterations ?? base.settings.maxIterations,
      hooks: { ...base.settings.hooks, ...settings.hooks },
      fileReferences: { ...base.settings.fileReferences, ...settings.fileReferences },
    },
  };
}

export function getDefaultConfig(): AgentLoopConfig {
  // No providers or routes by default; the environment fills the gap
  return {
    providers: [],
    router: {
      opus: '',
      sonnet: '',
      haiku: '',
      default: '',
    },
    settings: {
      defaultMode: 'sonnet',
      maxIterations: DEFAULT_MAX_ITERATIONS,
      hooks: {
        enabled: true,
        commandTimeout: DEFAULT_COMMAND_TIMEOUT,
        maxInjectLength: DEFAULT_MAX_INJECT_LENGTH,
      },
      fileReferences: {
        enabled: true,
        maxSize: DEFAULT_FILE_REFERENCE_MAX_SIZE,
        allowedExtensions: [...DEFAULT_FILE_REFERENCE_EXTENSIONS],
      },
    },
  };
}

/**
 * Parse config.json text
 *
 * @throws ConfigError on invalid JSON or a value of the wrong shape
 */
export function parseConfigText(content: string, filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(
      `Invalid JSON in config file: ${filePath}`,
      ConfigErrorCode.INVALID_JSON,
      'Check the configuration file syntax.',
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(
      `Invalid config file ${filePath}: ${where}: ${issue?.message ?? 'invalid value'}`,
      ConfigErrorCode.MISSING_REQUIRED_FIELD,
      'Check the configuration file against the documented fields.',
    );
  }
  return parsed.data;
}

async function readConfigFile(filePath: string): Promise<ConfigFile | null> {
  if (!(await fs.pathExists(filePath))) {
    return null;
  }
  const stats = await fs.stat(filePath);
  if (!stats.isFile()) return null;

  const content = await fs.readFile(filePath, 'utf-8');
  return parseConfigText(content, filePath);
}

function mergeProviders(baseList: ProviderConfig[], fileList: ProviderConfig[]): ProviderConfig[] {
  const providerMap = new Map<string, ProviderConfig>();
  baseList.forEach((p) => providerMap.set(p.name, p));
  fileList.forEach((p) => providerMap.set(p.name, p));
  return Array.from(providerMap.values());
}
