import type { AgentLoopConfig, ProviderType, ResolvedRoute } from './types.js';
import { ROUTER_MODES } from './types.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';

const ENV_FORMAT_HINT = 'Use $VAR, ${VAR}, or ${VAR:-default} format';

/**
 * Parses a "provider:model" string into its components.
 * Only the first colon separates, so "ollama:qwen2.5:32b" keeps the tag in the model.
 *
 * @throws ConfigError if format is invalid
 */
export function parseRoute(route: string): ResolvedRoute {
  const separator = route.indexOf(':');
  if (separator === -1) {
    throw new ConfigError(
      `Invalid route format: "${route}"`,
      ConfigErrorCode.INVALID_ROUTE_FORMAT,
      'Route must contain a colon separator (e.g., "provider:model")',
    );
  }

  const providerName = route.slice(0, separator);
  const modelId = route.slice(separator + 1);
  if (!providerName || !modelId) {
    throw new ConfigError(
      `Invalid route format: "${route}"`,
      ConfigErrorCode.INVALID_ROUTE_FORMAT,
      'Both provider and model must be specified',
    );
  }

  return { providerName, modelId };
}

/**
 * Resolves an environment variable reference in a config string.
 * Supports `$VAR`, `${VAR}` and `${VAR:-default}`; other strings pass through.
 *
 * @throws ConfigError if the variable is unset and has no default
 */
export function resolveEnvVar(value: string): string {
  if (!value.startsWith('$')) {
    return value;
  }

  const match =
    value.match(/^\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-(.*))?\}$/) ?? value.match(/^\$([A-Za-z_][A-Za-z0-9_]*)$/);
  if (!match || !match[1]) {
    throw new ConfigError(`Invalid environment variable format: "${value}"`, ConfigErrorCode.ENV_VAR_NOT_SET, ENV_FORMAT_HINT);
  }

  const varName = match[1];
  const fallback = match[2];
  const envValue = process.env[varName];
  if (fallback !== undefined) {
    return envValue || fallback;
  }
  if (envValue === undefined) {
    throw new ConfigError(
      `Environment variable ${varName} is not set`,
      ConfigErrorCode.ENV_VAR_NOT_SET,
      `Please set ${varName} in your environment`,
    );
  }
  return envValue;
}

/**
 * Infers the provider type from the provider name
 */
export function inferProviderType(name: string): ProviderType {
  const lowerName = name.toLowerCase();
  if (lowerName.includes('anthropic')) {
    return 'anthropic';
  }
  if (lowerName.includes('ollama')) {
    return 'ollama';
  }
  return 'openai-compatible';
}

/**
 * Validates that every configured route names a defined provider and,
 * where the provider lists its models, one of those models.
 */
export function validateRouterModels(config: AgentLoopConfig): void {
  const { router, providers } = config;

  for (const key of [...ROUTER_MODES, 'default'] as const) {
    const routeString = router[key];
    if (!routeString) {
      continue;
    }

    const { providerName, modelId } = parseRoute(routeString);
    const provider = providers.find((p) => p.name === providerName);
    if (!provider) {
      throw new ConfigError(
        `Provider "${providerName}" referenced in router.${key} not found`,
        ConfigErrorCode.PROVIDER_NOT_FOUND,
        `Define a provider named "${providerName}" in the providers list`,
      );
    }

    if (provider.models && provider.models.length > 0 && !provider.models.includes(modelId)) {
      throw new ConfigError(
        `Model "${modelId}" not found in provider "${providerName}" configuration`,
        ConfigErrorCode.MODEL_NOT_FOUND,
        `Available models for ${providerName}: ${provider.models.join(', ')}`,
      );
    }
  }
}
