import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOpenAI } from '@langchain/openai';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { AgentLoopConfig, ProviderType, RouterMode } from '../config/types.js';
import { resolveEnvVar, parseRoute, inferProviderType } from '../config/parser.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export const DEFAULT_MODELS: Readonly<Record<ProviderType, string>> = {
  anthropic: 'claude-3-5-sonnet-latest',
  'openai-compatible': 'gpt-4o',
  ollama: 'llama3.1',
};

/**
 * A chat model plus the names it was resolved from
 */
export interface ResolvedModel {
  model: BaseChatModel;
  providerName: string;
  modelId: string;
}

export class ModelResolver {
  /**
   * Resolve a chat model based on provider type and configuration
   */
  static resolve(
    type: ProviderType,
    modelName: string,
    options?: {
      apiKey?: string;
      baseUrl?: string;
    },
  ): BaseChatModel {
    switch (type) {
      case 'anthropic':
        return new ChatAnthropic({
          apiKey: options?.apiKey,
          model: modelName,
        });

      case 'openai-compatible':
        return new ChatOpenAI({
          apiKey: options?.apiKey,
          model: modelName,
          configuration: {
            baseURL: options?.baseUrl,
          },
        });

      case 'ollama':
        return new ChatOllama({
          baseUrl: options?.baseUrl || DEFAULT_OLLAMA_URL,
          model: modelName,
        });

      default: {
        const unsupported: never = type;
        throw new ConfigError(
          `Unsupported provider type: ${String(unsupported)}`,
          ConfigErrorCode.UNSUPPORTED_PROVIDER_TYPE,
          'Supported types: anthropic, openai-compatible, ollama',
        );
      }
    }
  }

  /**
   * Route for a mode: the mode's own route, else router.default, else undefined
   */
  static routeFor(config: AgentLoopConfig, mode: RouterMode): string | undefined {
    return config.router[mode] || config.router.default || undefined;
  }

  /**
   * Resolve a chat model from a configured "provider:model" route
   */
  static resolveRoute(config: AgentLoopConfig, route: string): ResolvedModel {
    const { providerName, modelId } = parseRoute(route);

    const provider = config.providers.find((p) => p.name === providerName);
    if (!provider) {
      throw new ConfigError(
        `Provider "${providerName}" not found`,
        ConfigErrorCode.PROVIDER_NOT_FOUND,
        `Available: ${config.providers.map((p) => p.name).join(', ')}`,
      );
    }

    const apiKey = provider.apiKey ? resolveEnvVar(provider.apiKey) : undefined;
    const providerType = provider.type || inferProviderType(provider.name);

    return {
      model: ModelResolver.resolve(providerType, modelId, { apiKey, baseUrl: provider.baseUrl }),
      providerName,
      modelId,
    };
  }

  /**
   * Pick a provider from the environment when no route is configured:
   * PROVIDER, then ANTHROPIC_API_KEY, then OPENAI_API_KEY, then local Ollama.
   * MODEL overrides the default model name.
   */
  static resolveFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedModel {
    const type = ModelResolver.providerTypeFromEnv(env);
    const modelId = env.MODEL || DEFAULT_MODELS[type];

    switch (type) {
      case 'anthropic':
        return { model: ModelResolver.resolve(type, modelId, { apiKey: env.ANTHROPIC_API_KEY }), providerName: 'anthropic', modelId };
      case 'openai-compatible':
        return {
          model: ModelResolver.resolve(type, modelId, { apiKey: env.OPENAI_API_KEY, baseUrl: env.OPENAI_BASE_URL }),
          providerName: 'openai',
          modelId,
        };
      case 'ollama':
        return { model: ModelResolver.resolve(type, modelId, { baseUrl: env.OLLAMA_BASE_URL }), providerName: 'ollama', modelId };
    }
  }

  static providerTypeFromEnv(env: NodeJS.ProcessEnv): ProviderType {
    const explicit = env.PROVIDER?.trim().toLowerCase();
    if (explicit) {
      switch (explicit) {
        case 'anthropic':
          return 'anthropic';
        case 'openai':
          return 'openai-compatible';
        case 'ollama':
        case 'local':
          return 'ollama';
        default:
          throw new ConfigError(
            `Unsupported PROVIDER: ${explicit}`,
            ConfigErrorCode.UNSUPPORTED_PROVIDER_TYPE,
            'Set PROVIDER to anthropic, openai, ollama or local',
          );
      }
    }
    if (env.ANTHROPIC_API_KEY) return 'anthropic';
    if (env.OPENAI_API_KEY) return 'openai-compatible';
    return 'ollama';
  }
}
