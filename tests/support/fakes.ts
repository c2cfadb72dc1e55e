import type { ModelRouter, RoutedGenerationInput } from "@/lib/ai/modelRouter";
import type { EmbeddingProvider, EmbeddingPurpose } from "@/lib/ai/types";

export type Reply = (input: RoutedGenerationInput) => string | Promise<string>;

export function createFakeModelRouter(reply: Reply) {
  const calls: RoutedGenerationInput[] = [];
  const router: ModelRouter = {
    async generate(input) {
      calls.push(input);
      const text = await reply(input);
      return { text, meta: { taskType: input.taskType, modelUsed: "fake-model", latencyMs: 0 } };
    },
  };
  return { router, calls };
}

/**
 * Deterministic embeddings: the vector for a text is whatever `vectorFor`
 * returns. Records every batch so tests can check batching and purpose.
 */
export function createFakeEmbeddingProvider(options: {
  dimension: number;
  vectorFor: (text: string) => number[];
  maxBatchSize?: number;
}) {
  const batches: Array<{ texts: string[]; purpose: EmbeddingPurpose }> = [];
  const provider: EmbeddingProvider = {
    name: "openai",
    model: "fake-embedding",
    dimension: options.dimension,
    maxBatchSize: options.maxBatchSize ?? 100,
    async embedBatch(texts, purpose) {
      batches.push({ texts: [...texts], purpose });
      return texts.map(options.vectorFor);
    },
  };
  return { provider, batches };
}

/** Keyword vectors in three dimensions: photosynthesis, mitosis, everything else. */
export function topicVector(text: string): number[] {
  const lower = text.toLowerCase();
  if (lower.includes("photosynthesis")) return [1, 0, 0];
  if (lower.includes("mitosis")) return [0, 1, 0];
  return [0, 0, 1];
}
