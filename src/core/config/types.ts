/**
 * agentloop Config Types
 */

/**
 * Supported provider types
 */
export type ProviderType = 'anthropic' | 'openai-compatible' | 'ollama';

export const ROUTER_MODES = ['opus', 'sonnet', 'haiku'] as const;

/**
 * Router mode for quick switching between models
 */
export type RouterMode = (typeof ROUTER_MODES)[number];

/**
 * Configuration for a specific AI provider
 */
export interface ProviderConfig {
  /** Unique name for this provider instance (e.g., "anthropic", "openrouter") */
  name: string;

  /** Type of the provider (inferred from the name if not provided) */
  type?: ProviderType;

  baseUrl?: string;

  /** API key or environment variable reference (e.g., "$ANTHROPIC_API_KEY") */
  apiKey?: string;

  /** Models this provider serves; when set, routes must name one of them */
  models?: string[];
}

/**
 * Router configuration mapping modes to "provider:model" routes.
 * An empty string means the mode is not configured.
 */
export interface RouterConfig {
  opus: string;
  sonnet: string;
  haiku: string;
  default: string;
}

export interface HookSettings {
  /** False disables every hook, like --no-hooks */
  enabled: boolean;

  /** Milliseconds before a hook command is killed */
  commandTimeout: number;

  /** Longest command output injected into the system prompt */
  maxInjectLength: number;
}

export interface FileReferenceSettings {
  /** False leaves @path references in user input as typed */
  enabled: boolean;

  /** Largest file inlined, in bytes */
  maxSize: number;

  /** Extensions (without the dot) that may be inlined */
  allowedExtensions: string[];
}

export interface SettingsConfig {
  defaultMode: RouterMode;

  /** Provider round trips allowed in one turn */
  maxIterations: number;

  hooks: HookSettings;

  fileReferences: FileReferenceSettings;
}

export interface AgentLoopConfig {
  providers: ProviderConfig[];
  router: RouterConfig;
  settings: SettingsConfig;
}

/**
 * Represents a resolved route (provider and model)
 */
export interface ResolvedRoute {
  providerName: string;
  modelId: string;
}
