/**
 * FILE PURPOSE: OpenAI-compatible client pointed at the LiteLLM proxy
 *
 * WHY: Embedding calls go through one gateway so model choice, keys and
 *      spend live outside this codebase.
 *
 * USAGE:
 *   import { createLLMClient } from '@textguard/similarity';
 *   const llm = createLLMClient();
 *   const res = await llm.embeddings.create({ model: 'text-embedding-3-small', input: ['…'] });
 */
import OpenAI from 'openai';

export interface LLMClientOptions {
  baseURL?: string;
  apiKey?: string;
  /** Extra default headers, e.g. a per-tenant tag for the proxy. */
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export function createLLMClient(options?: string | LLMClientOptions): OpenAI {
  // Accept a raw apiKey string as shorthand
  const opts: LLMClientOptions = typeof options === 'string'
    ? { apiKey: options }
    : options ?? {};

  const baseURL = opts.baseURL || process.env.LITELLM_PROXY_URL || 'http://localhost:4000/v1';
  const key = opts.apiKey || process.env.LITELLM_API_KEY || '';

  return new OpenAI({
    baseURL,
    apiKey: key,
    timeout: opts.timeoutMs ?? 15_000,
    maxRetries: 1,
    ...(opts.headers ? { defaultHeaders: opts.headers } : {}),
  });
}

export type { OpenAI };
