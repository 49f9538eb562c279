/**
 * LLM provider seam
 *
 * The agent talks to an LLMProvider; LangChainProvider adapts any langchain
 * chat model with tool calling. Tests substitute a scripted provider.
 */

import { v4 as uuidv4 } from 'uuid';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  AIMessage,
  SystemMessage,
  type AIMessageChunk,
  type BaseMessage,
  type MessageContent,
} from '@langchain/core/messages';
import type { StructuredTool } from '@langchain/core/tools';
import type { AgentLoopConfig, RouterMode } from '../config/types.js';
import { ProviderError, errorMessage } from '../errors/index.js';
import { ModelResolver, type ResolvedModel } from './resolver.js';

export interface ToolCallRequest {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export interface InferenceRequest {
  system: string;
  messages: BaseMessage[];
  tools: StructuredTool[];
  signal?: AbortSignal;
}

export interface InferenceResponse {
  text: string;
  toolCalls: ToolCallRequest[];
  /** Assistant message to append to history */
  message: AIMessage;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  infer(request: InferenceRequest): Promise<InferenceResponse>;
}

/**
 * Plain text of a message's content, skipping non-text parts
 */
export function contentText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => {
      if (typeof part === 'string') return part;
      return 'text' in part && typeof part.text === 'string' ? part.text : '';
    })
    .join('');
}

export class LangChainProvider implements LLMProvider {
  constructor(
    private readonly chatModel: BaseChatModel,
    readonly name: string,
    readonly model: string,
  ) {}

  static fromResolved(resolved: ResolvedModel): LangChainProvider {
    return new LangChainProvider(resolved.model, resolved.providerName, resolved.modelId);
  }

  async infer(request: InferenceRequest): Promise<InferenceResponse> {
    const messages = [new SystemMessage(request.system), ...request.messages];

    let response: AIMessageChunk;
    try {
      if (request.tools.length > 0) {
        if (!this.chatModel.bindTools) {
          throw new ProviderError(`Model ${this.model} does not support tool calling`, this.name);
        }
        response = await this.chatModel.bindTools(request.tools).invoke(messages, { signal: request.signal });
      } else {
        response = await this.chatModel.invoke(messages, { signal: request.signal });
      }
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`${this.name} request failed: ${errorMessage(error)}`, this.name, error);
    }

    const toolCalls: ToolCallRequest[] = (response.tool_calls ?? []).map((call) => ({
      id: call.id || `call_${uuidv4()}`,
      name: call.name,
      args: call.args,
    }));

    return {
      text: contentText(response.content),
      toolCalls,
      message: new AIMessage({
        content: response.content,
        tool_calls: toolCalls.map((call) => ({ id: call.id, name: call.name, args: call.args, type: 'tool_call' as const })),
      }),
    };
  }
}

/**
 * Provider for a router mode: the configured route, else the environment
 */
export function createProvider(config: AgentLoopConfig, mode: RouterMode): LLMProvider {
  const route = ModelResolver.routeFor(config, mode);
  const resolved = route ? ModelResolver.resolveRoute(config, route) : ModelResolver.resolveFromEnv();
  return LangChainProvider.fromResolved(resolved);
}
