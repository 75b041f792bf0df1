import type { z } from 'zod';
import { EnrichmentError, describeCause } from '../../shared/errors.js';
import type { FetchLike, ProviderName } from './types.js';

export interface PostJsonOptions<T> {
  provider: ProviderName;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  fetchImpl: FetchLike;
}

/**
 * POSTs a JSON body and validates the JSON reply. Network failures and
 * timeouts surface without a status code; HTTP failures keep theirs.
 */
export async function postJson<T>(options: PostJsonOptions<T>): Promise<T> {
  let response: Response;
  try {
    response = await options.fetchImpl(options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(options.body),
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    const reason = isTimeout(error) ? `timed out after ${options.timeoutMs}ms` : describeCause(error);
    throw new EnrichmentError(`${options.provider} request failed: ${reason}`, options.provider, undefined, error);
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response);
    throw new EnrichmentError(
      `${options.provider} API error (${response.status}): ${detail}`,
      options.provider,
      response.status
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new EnrichmentError(
      `${options.provider} returned invalid JSON`,
      options.provider,
      response.status,
      error
    );
  }

  const parsed = options.schema.safeParse(payload);
  if (!parsed.success) {
    throw new EnrichmentError(
      `${options.provider} returned an unexpected response shape`,
      options.provider,
      response.status,
      parsed.error
    );
  }
  return parsed.data;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

async function readErrorDetail(response: Response): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return response.statusText || 'no response body';
  }

  try {
    const body: unknown = JSON.parse(text);
    const message = extractMessage(body);
    if (message) return message;
  } catch {
    // Not JSON; fall through to the raw text.
  }
  return text.slice(0, 200) || response.statusText || 'no response body';
}

// OpenAI, Anthropic and Gemini all nest the message as `{ error: { message } }`.
function extractMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) return undefined;
  const error = body.error;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
