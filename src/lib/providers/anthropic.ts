/**
 * Anthropic messages API provider
 */

import { z } from 'zod';
import { joinUrl, postJson } from './http.js';
import type {
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  FetchLike,
  ModelProvider,
  ProviderName,
  ProviderOptions
} from './types.js';

const API_VERSION = '2023-06-01';

const AnthropicResponseSchema = z.object({
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional()
    })
  ),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number()
    })
    .optional()
});

type AnthropicMessage = { role: 'user' | 'assistant'; content: string };

export class AnthropicProvider implements ModelProvider {
  readonly name: ProviderName = 'anthropic';
  readonly model: string;

  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ProviderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? 'https://api.anthropic.com/v1';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { systemMessage, messages } = this.extractMessages(request.messages);

    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: request.maxTokens ?? 1024,
      messages
    };
    if (systemMessage) {
      body.system = systemMessage;
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    const data = await postJson({
      provider: this.name,
      url: joinUrl(this.baseUrl, 'messages'),
      headers: {
        'x-api-key': this.options.apiKey,
        'anthropic-version': API_VERSION
      },
      body,
      timeoutMs: this.options.timeoutMs,
      schema: AnthropicResponseSchema,
      fetchImpl: this.fetchImpl
    });

    const content = data.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('');

    const usage = data.usage
      ? {
          promptTokens: data.usage.input_tokens,
          completionTokens: data.usage.output_tokens,
          totalTokens: data.usage.input_tokens + data.usage.output_tokens
        }
      : undefined;

    return { content, model: data.model, usage };
  }

  // The system prompt travels outside the message list.
  private extractMessages(messages: ChatMessage[]): {
    systemMessage: string | null;
    messages: AnthropicMessage[];
  } {
    const system: string[] = [];
    const conversation: AnthropicMessage[] = [];

    for (const message of messages) {
      if (message.role === 'system') {
        system.push(message.content);
      } else {
        conversation.push({ role: message.role, content: message.content });
      }
    }

    return { systemMessage: system.length > 0 ? system.join('\n\n') : null, messages: conversation };
  }
}
