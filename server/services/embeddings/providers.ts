import OpenAI from "openai";
import { ProviderError } from "../retrieval/errors";
import { isAbortError } from "../../utils/abort";
import { hashEmbed } from "./hash-embed";

/** Anything that turns a batch of texts into same-length vectors of a fixed dimension. */
export interface EmbeddingProvider {
  readonly id: string;
  dimension(): number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** `<provider id>/<dimension>`: vectors are only comparable within one space. */
export const embeddingSpace = (provider: EmbeddingProvider): string =>
  `${provider.id}/${provider.dimension()}`;

export const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500;

export const checkVectors = (provider: EmbeddingProvider, texts: string[], vectors: number[][]): number[][] => {
  if (vectors.length !== texts.length) {
    throw new ProviderError(provider.id, `returned ${vectors.length} vectors for ${texts.length} texts`, {
      retryable: false,
    });
  }
  const dim = provider.dimension();
  for (const vector of vectors) {
    if (vector.length !== dim || vector.some((value) => !Number.isFinite(value))) {
      throw new ProviderError(provider.id, `returned a malformed vector (expected ${dim} finite values)`, {
        retryable: false,
      });
    }
  }
  return vectors;
};

export type OpenAIEmbeddingOptions = {
  apiKey: string;
  baseUrl?: string;
  model: string;
  dimensions: number;
  client?: OpenAI;
};

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.id = `openai:${options.model}`;
    // Retries and timeouts are owned by the embedding service.
    this.client =
      options.client ??
      new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0, timeout: 60_000 });
  }

  dimension(): number {
    return this.options.dimensions;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create(
        { model: this.options.model, input: texts, dimensions: this.options.dimensions },
        { signal },
      );
      const vectors = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
      return checkVectors(this, texts, vectors);
    } catch (error) {
      throw this.translate(error);
    }
  }

  private translate(error: unknown): unknown {
    if (error instanceof ProviderError || isAbortError(error) || error instanceof OpenAI.APIUserAbortError) {
      return error;
    }
    if (error instanceof OpenAI.APIError) {
      const status = typeof error.status === "number" ? error.status : undefined;
      return new ProviderError(this.id, error.message, {
        retryable: status === undefined || isRetryableStatus(status),
        upstreamStatus: status,
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(this.id, message, { retryable: true, cause: error });
  }
}

/** Local hashed n-gram vectors: always available, deterministic, no network. */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly id = "local-hash";

  constructor(private readonly dim: number) {}

  dimension(): number {
    return this.dim;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => hashEmbed(text, this.dim));
  }
}
