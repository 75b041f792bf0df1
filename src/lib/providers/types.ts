/**
 * Provider types for report enrichment
 */

export type ProviderName = 'openai' | 'anthropic' | 'gemini';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ProviderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string | null;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * A chat-completion endpoint. Implementations reject with `EnrichmentError`,
 * carrying the HTTP status when there is one.
 */
export interface ModelProvider {
  readonly name: ProviderName;
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
