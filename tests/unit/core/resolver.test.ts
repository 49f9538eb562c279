/**
 * ModelResolver Tests
 *
 * Models are constructed but never called
 */

import { describe, it, expect } from 'vitest';
import { ChatOllama } from '@langchain/ollama';
import { DEFAULT_MODELS, ModelResolver } from '../../../src/core/llm/resolver.js';
import { getDefaultConfig, mergeConfigs } from '../../../src/core/config/loader.js';
import { ConfigErrorCode } from '../../../src/core/errors/index.js';
import { contentText } from '../../../src/core/llm/provider.js';

describe('ModelResolver', () => {
  describe('providerTypeFromEnv()', () => {
    it('should prefer an explicit PROVIDER', () => {
      expect(ModelResolver.providerTypeFromEnv({ PROVIDER: 'OpenAI', ANTHROPIC_API_KEY: 'test-key' })).toBe(
        'openai-compatible',
      );
      expect(ModelResolver.providerTypeFromEnv({ PROVIDER: 'local' })).toBe('ollama');
    });

    it('should fall back on which API key is set', () => {
      expect(ModelResolver.providerTypeFromEnv({ ANTHROPIC_API_KEY: 'test-key' })).toBe('anthropic');
      expect(ModelResolver.providerTypeFromEnv({ OPENAI_API_KEY: 'test-key' })).toBe('openai-compatible');
      expect(ModelResolver.providerTypeFromEnv({})).toBe('ollama');
    });

    it('should reject an unknown PROVIDER', () => {
      expect(() => ModelResolver.providerTypeFromEnv({ PROVIDER: 'mystery' })).toThrow('Unsupported PROVIDER: mystery');
    });
  });

  describe('resolveFromEnv()', () => {
    it('should use local Ollama with its default model', () => {
      const resolved = ModelResolver.resolveFromEnv({});

      expect(resolved.providerName).toBe('ollama');
      expect(resolved.modelId).toBe(DEFAULT_MODELS.ollama);
      expect(resolved.model).toBeInstanceOf(ChatOllama);
    });

    it('should let MODEL override the model name', () => {
      expect(ModelResolver.resolveFromEnv({ PROVIDER: 'ollama', MODEL: 'qwen2.5:7b' }).modelId).toBe('qwen2.5:7b');
    });
  });

  describe('routeFor()', () => {
    it('should use the mode route, then the default route', () => {
      const config = mergeConfigs(getDefaultConfig(), {
        router: { opus: 'local:big', default: 'local:small' },
      });

      expect(ModelResolver.routeFor(config, 'opus')).toBe('local:big');
      expect(ModelResolver.routeFor(config, 'haiku')).toBe('local:small');
      expect(ModelResolver.routeFor(getDefaultConfig(), 'haiku')).toBeUndefined();
    });
  });

  describe('resolveRoute()', () => {
    it('should build the configured provider', () => {
      const config = mergeConfigs(getDefaultConfig(), {
        providers: [{ name: 'local-ollama', baseUrl: 'http://127.0.0.1:11434' }],
      });

      const resolved = ModelResolver.resolveRoute(config, 'local-ollama:llama3.1:8b');

      expect(resolved.providerName).toBe('local-ollama');
      expect(resolved.modelId).toBe('llama3.1:8b');
      expect(resolved.model).toBeInstanceOf(ChatOllama);
    });

    it('should reject an unknown provider', () => {
      const config = getDefaultConfig();
      expect(() => ModelResolver.resolveRoute(config, 'ghost:model')).toThrow('Provider "ghost" not found');
      try {
        ModelResolver.resolveRoute(config, 'ghost:model');
      } catch (error) {
        expect(error).toMatchObject({ code: ConfigErrorCode.PROVIDER_NOT_FOUND });
      }
    });
  });
});

describe('contentText()', () => {
  it('should join text parts and skip others', () => {
    expect(contentText('plain')).toBe('plain');
    expect(
      contentText([
        { type: 'text', text: 'Hello, ' },
        { type: 'image_url', image_url: 'data:image/png;base64,AAAA' },
        { type: 'text', text: 'world' },
      ]),
    ).toBe('Hello, world');
  });
});
