import type { EmbeddingProvider, EmbeddingPurpose } from "@/lib/ai/types";
import { withRetry } from "@/lib/ai/retry";
import { ConfigurationError, PermanentProviderError } from "@/lib/errors";

const DEFAULT_BATCH_SIZE = 100;

export type EmbeddingGeneratorOptions = {
  batchSize?: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
};

export type EmbeddingGenerator = {
  readonly dimension: number;
  /** One vector per input text, same order. */
  embed(texts: string[], purpose?: EmbeddingPurpose): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
};

/** Startup check: the provider's vectors must fit the index. */
export function assertEmbeddingDimension(providerDimension: number, indexDimension: number): void {
  if (providerDimension !== indexDimension) {
    throw new ConfigurationError(
      `Embedding dimension ${providerDimension} does not match vector index dimension ${indexDimension}`,
    );
  }
}

export function createEmbeddingGenerator(
  provider: EmbeddingProvider,
  options: EmbeddingGeneratorOptions,
): EmbeddingGenerator {
  const batchSize = Math.max(1, Math.min(options.batchSize ?? DEFAULT_BATCH_SIZE, provider.maxBatchSize));

  async function embedBatch(batch: string[], purpose: EmbeddingPurpose): Promise<number[][]> {
    const vectors = await withRetry(() => provider.embedBatch(batch, purpose), {
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.retryBaseDelayMs,
      label: "embeddings",
    });

    if (vectors.length !== batch.length) {
      throw new PermanentProviderError(
        "invalid_response",
        `Embedding provider returned ${vectors.length} vectors for ${batch.length} inputs`,
      );
    }
    for (const vector of vectors) {
      if (vector.length !== provider.dimension) {
        throw new PermanentProviderError(
          "invalid_response",
          `Embedding provider returned a ${vector.length}-dimension vector, expected ${provider.dimension}`,
        );
      }
    }

    return vectors;
  }

  async function embed(texts: string[], purpose: EmbeddingPurpose = "document"): Promise<number[][]> {
    const results: number[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      results.push(...(await embedBatch(batch, purpose)));
    }
    return results;
  }

  return {
    dimension: provider.dimension,
    embed,
    async embedQuery(text: string): Promise<number[]> {
      const [vector] = await embedBatch([text], "query");
      if (!vector) {
        throw new PermanentProviderError("empty_response", "No embedding returned for query");
      }
      return vector;
    },
  };
}
