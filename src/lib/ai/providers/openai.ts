import { z } from "zod";

import type { EmbeddingProvider, GenerationRequest, LanguageModelProvider } from "@/lib/ai/types";
import { fetchProvider } from "@/lib/ai/retry";
import { PermanentProviderError, classifyProviderStatus } from "@/lib/errors";

/** Works against api.openai.com or any OpenAI-compatible `/chat/completions` + `/embeddings` host. */
export type OpenAiSettings = {
  apiKey: string;
  baseUrl: string;
  model: string;
  smartModel: string;
};

export type OpenAiEmbeddingSettings = {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimension: number;
};

const EMBEDDING_BATCH_LIMIT = 2048;

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .optional(),
});

const embeddingsSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() })),
});

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
}

async function readFailure(response: Response, label: string): Promise<never> {
  const errorText = await response.text();
  throw classifyProviderStatus(response.status, `${label} request failed: ${response.status} ${errorText}`);
}

export function createOpenAiLanguageModel(settings: OpenAiSettings): LanguageModelProvider {
  const baseUrl = normalizeBaseUrl(settings.baseUrl);

  return {
    name: "openai",
    models: { fast: settings.model, smart: settings.smartModel },
    async generate(request: GenerationRequest): Promise<string> {
      const response = await fetchProvider(
        `${baseUrl}/chat/completions`,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${settings.apiKey}`,
          },
          body: JSON.stringify({
            model: request.model,
            temperature: 0.2,
            messages: [
              { role: "system", content: request.systemInstruction },
              { role: "user", content: request.prompt },
            ],
          }),
          signal: request.signal,
        },
        "OpenAI",
      );

      if (!response.ok) {
        return readFailure(response, "OpenAI");
      }

      const parsed = chatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new PermanentProviderError("invalid_response", "OpenAI returned an unexpected payload");
      }

      const content = parsed.data.choices?.[0]?.message?.content;
      if (!content?.trim()) {
        throw new PermanentProviderError("empty_response", "OpenAI returned empty response");
      }

      return content;
    },
  };
}

export function createOpenAiEmbeddingProvider(settings: OpenAiEmbeddingSettings): EmbeddingProvider {
  const baseUrl = normalizeBaseUrl(settings.baseUrl);

  return {
    name: "openai",
    model: settings.model,
    dimension: settings.dimension,
    maxBatchSize: EMBEDDING_BATCH_LIMIT,
    async embedBatch(texts: string[]): Promise<number[][]> {
      const response = await fetchProvider(
        `${baseUrl}/embeddings`,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${settings.apiKey}`,
          },
          body: JSON.stringify({ model: settings.model, input: texts, dimensions: settings.dimension }),
        },
        "OpenAI embeddings",
      );

      if (!response.ok) {
        return readFailure(response, "OpenAI embeddings");
      }

      const parsed = embeddingsSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new PermanentProviderError("invalid_response", "OpenAI embeddings response missing data");
      }

      // the API may return entries out of order; `index` is authoritative
      return [...parsed.data.data].sort((a, b) => a.index - b.index).map((entry) => entry.embedding);
    },
  };
}
