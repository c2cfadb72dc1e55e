import { z } from "zod";

import type { EmbeddingProvider, EmbeddingPurpose, GenerationRequest, LanguageModelProvider } from "@/lib/ai/types";
import { fetchProvider } from "@/lib/ai/retry";
import { PermanentProviderError, classifyProviderStatus } from "@/lib/errors";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
// batchEmbedContents accepts at most 100 requests per call
const GEMINI_EMBED_BATCH_LIMIT = 100;

export type GeminiSettings = {
  apiKey: string;
  model: string;
  smartModel: string;
};

export type GeminiEmbeddingSettings = {
  apiKey: string;
  model: string;
  dimension: number;
};

async function readFailure(response: Response): Promise<never> {
  const errorText = await response.text();
  throw classifyProviderStatus(response.status, `Gemini request failed: ${response.status} ${errorText}`);
}

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      }),
    )
    .optional(),
});

const batchEmbedSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

function extractGeminiText(payload: unknown): string {
  const parsed = generateContentSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PermanentProviderError("invalid_response", "Gemini returned an unexpected payload");
  }

  return parsed.data.candidates?.[0]?.content?.parts?.map((part) => part.text ?? "").join("") ?? "";
}

function extractGeminiEmbeddings(payload: unknown): number[][] {
  const parsed = batchEmbedSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PermanentProviderError("invalid_response", "Gemini embeddings response missing values");
  }

  return parsed.data.embeddings.map((entry) => entry.values);
}

export function createGeminiLanguageModel(settings: GeminiSettings): LanguageModelProvider {
  return {
    name: "google",
    models: { fast: settings.model, smart: settings.smartModel },
    async generate(request: GenerationRequest): Promise<string> {
      const response = await fetchProvider(
        `${GEMINI_BASE_URL}/models/${request.model}:generateContent?key=${settings.apiKey}`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            systemInstruction: { parts: [{ text: request.systemInstruction }] },
            contents: [{ role: "user", parts: [{ text: request.prompt }] }],
            generationConfig: { temperature: 0.2 },
          }),
          signal: request.signal,
        },
        "Gemini",
      );

      if (!response.ok) {
        return readFailure(response);
      }

      const text = extractGeminiText(await response.json());
      if (!text.trim()) {
        throw new PermanentProviderError("empty_response", "Gemini returned empty response");
      }

      return text;
    },
  };
}

function toGeminiTaskType(purpose: EmbeddingPurpose): string {
  return purpose === "query" ? "RETRIEVAL_QUERY" : "RETRIEVAL_DOCUMENT";
}

export function createGeminiEmbeddingProvider(settings: GeminiEmbeddingSettings): EmbeddingProvider {
  const modelPath = `models/${settings.model}`;

  return {
    name: "google",
    model: settings.model,
    dimension: settings.dimension,
    maxBatchSize: GEMINI_EMBED_BATCH_LIMIT,
    async embedBatch(texts: string[], purpose: EmbeddingPurpose): Promise<number[][]> {
      const response = await fetchProvider(
        `${GEMINI_BASE_URL}/${modelPath}:batchEmbedContents?key=${settings.apiKey}`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            requests: texts.map((text) => ({
              model: modelPath,
              content: { parts: [{ text }] },
              taskType: toGeminiTaskType(purpose),
              outputDimensionality: settings.dimension,
            })),
          }),
        },
        "Gemini embeddings",
      );

      if (!response.ok) {
        return readFailure(response);
      }

      return extractGeminiEmbeddings(await response.json());
    },
  };
}
