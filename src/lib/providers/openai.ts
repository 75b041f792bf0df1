/**
 * OpenAI chat completions provider
 */

import { z } from 'zod';
import { joinUrl, postJson } from './http.js';
import type {
  CompletionRequest,
  CompletionResponse,
  FetchLike,
  ModelProvider,
  ProviderName,
  ProviderOptions
} from './types.js';

const OpenAIResponseSchema = z.object({
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string(),
          content: z.string().nullable()
        })
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional()
});

export class OpenAIProvider implements ModelProvider {
  readonly name: ProviderName = 'openai';
  readonly model: string;

  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ProviderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: request.messages,
      max_tokens: request.maxTokens ?? 1024
    };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    const data = await postJson({
      provider: this.name,
      url: joinUrl(this.baseUrl, 'chat/completions'),
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body,
      timeoutMs: this.options.timeoutMs,
      schema: OpenAIResponseSchema,
      fetchImpl: this.fetchImpl
    });

    const usage = data.usage
      ? {
          promptTokens: data.usage.prompt_tokens,
          completionTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens
        }
      : undefined;

    return {
      content: data.choices[0]?.message.content ?? '',
      model: data.model,
      usage
    };
  }
}
