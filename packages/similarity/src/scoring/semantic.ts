/**
 * FILE PURPOSE: Optional embedding-based similarity collaborator
 *
 * WHY: Lexical shingles miss light paraphrase. When an embedding endpoint is
 *      configured, the scorer blends cosine similarity of embeddings in.
 * HOW: Embeddings through the LiteLLM proxy (OpenAI-compatible client),
 *      cosine similarity clamped to [0,1]. A small in-process cache keeps the
 *      query window from being re-embedded for every candidate.
 */

import type OpenAI from 'openai';
import { createLLMClient } from '../llm-client.js';

export interface SemanticSimilarity {
  similarity(a: string, b: string, signal?: AbortSignal): Promise<number>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i]! * b[i]!;
    normA += a[i]! * a[i]!;
    normB += b[i]! * b[i]!;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
const CACHE_LIMIT = 256;

export class EmbeddingSimilarity implements SemanticSimilarity {
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly client: OpenAI,
    private readonly model = DEFAULT_EMBEDDING_MODEL,
  ) {}

  async similarity(a: string, b: string, signal?: AbortSignal): Promise<number> {
    const [va, vb] = await this.embed([a, b], signal);
    if (!va || !vb) throw new Error('Embedding response missing vectors');
    return Math.min(1, Math.max(0, cosineSimilarity(va, vb)));
  }

  private async embed(texts: string[], signal?: AbortSignal): Promise<Array<number[] | undefined>> {
    // Vectors for this call are kept here, so caching new ones cannot evict them.
    const found = new Map<string, number[]>();
    for (const text of texts) {
      const hit = this.cache.get(text);
      if (hit) found.set(text, hit);
    }
    const missing = [...new Set(texts.filter((t) => !found.has(t)))];
    if (missing.length > 0) {
      const response = await this.client.embeddings.create(
        { model: this.model, input: missing },
        signal ? { signal } : undefined,
      );
      for (const d of response.data) {
        const text = missing[d.index];
        if (text !== undefined) found.set(text, d.embedding);
      }
    }
    for (const [text, vector] of found) this.remember(text, vector);
    return texts.map((t) => found.get(t));
  }

  /** Insert or refresh as most recent, dropping the least recent beyond the limit. */
  private remember(text: string, vector: number[]): void {
    this.cache.delete(text);
    if (this.cache.size >= CACHE_LIMIT) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(text, vector);
  }
}

export interface SemanticSettings {
  /** Proxy URL; semantic scoring is off when unset. */
  proxyUrl?: string;
  apiKey?: string;
  model?: string;
}

/** The embedding collaborator, or null when no endpoint is configured. */
export function createSemanticSimilarity(settings: SemanticSettings): SemanticSimilarity | null {
  if (!settings.proxyUrl) return null;
  const client = createLLMClient({ baseURL: settings.proxyUrl, apiKey: settings.apiKey });
  return new EmbeddingSimilarity(client, settings.model ?? DEFAULT_EMBEDDING_MODEL);
}
