/**
 * Google Gemini generateContent provider
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

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([])
          })
          .optional()
      })
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
      totalTokenCount: z.number().default(0)
    })
    .optional(),
  modelVersion: z.string().optional()
});

export class GeminiProvider implements ModelProvider {
  readonly name: ProviderName = 'gemini';
  readonly model: string;

  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ProviderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const system = request.messages.filter(m => m.role === 'system').map(m => m.content);
    const contents = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }]
      }));

    const generationConfig: Record<string, unknown> = {
      maxOutputTokens: request.maxTokens ?? 1024
    };
    if (request.temperature !== undefined) {
      generationConfig.temperature = request.temperature;
    }

    const body: Record<string, unknown> = { contents, generationConfig };
    if (system.length > 0) {
      body.systemInstruction = { parts: [{ text: system.join('\n\n') }] };
    }

    const data = await postJson({
      provider: this.name,
      url: joinUrl(this.baseUrl, `models/${encodeURIComponent(this.model)}:generateContent`),
      headers: { 'x-goog-api-key': this.options.apiKey },
      body,
      timeoutMs: this.options.timeoutMs,
      schema: GeminiResponseSchema,
      fetchImpl: this.fetchImpl
    });

    const parts = data.candidates[0]?.content?.parts ?? [];
    const usage = data.usageMetadata
      ? {
          promptTokens: data.usageMetadata.promptTokenCount,
          completionTokens: data.usageMetadata.candidatesTokenCount,
          totalTokens: data.usageMetadata.totalTokenCount
        }
      : undefined;

    return {
      content: parts.map(part => part.text ?? '').join(''),
      model: data.modelVersion ?? this.model,
      usage
    };
  }
}
