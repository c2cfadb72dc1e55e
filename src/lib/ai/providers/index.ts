import { config, type ProviderName } from "@/lib/config";
import type { EmbeddingProvider, LanguageModelProvider } from "@/lib/ai/types";
import { createGeminiEmbeddingProvider, createGeminiLanguageModel } from "@/lib/ai/providers/gemini";
import { createOpenAiEmbeddingProvider, createOpenAiLanguageModel } from "@/lib/ai/providers/openai";

export function createLanguageModelProvider(name: ProviderName = config.ai.llmProvider): LanguageModelProvider {
  switch (name) {
    case "google":
      return createGeminiLanguageModel({
        apiKey: config.ai.gemini.apiKey,
        model: config.ai.gemini.model,
        smartModel: config.ai.gemini.smartModel,
      });
    case "openai":
      return createOpenAiLanguageModel({
        apiKey: config.ai.openai.apiKey,
        baseUrl: config.ai.openai.baseUrl,
        model: config.ai.openai.model,
        smartModel: config.ai.openai.smartModel,
      });
  }
}

export function createEmbeddingProvider(name: ProviderName = config.ai.embeddingProvider): EmbeddingProvider {
  switch (name) {
    case "google":
      return createGeminiEmbeddingProvider({
        apiKey: config.ai.gemini.apiKey,
        model: config.ai.gemini.embeddingModel,
        dimension: config.ai.gemini.embeddingDimension,
      });
    case "openai":
      return createOpenAiEmbeddingProvider({
        apiKey: config.ai.openai.apiKey,
        baseUrl: config.ai.openai.baseUrl,
        model: config.ai.openai.embeddingModel,
        dimension: config.ai.openai.embeddingDimension,
      });
  }
}
