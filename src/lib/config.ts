/**
 * Environment-backed configuration.
 *
 * Values are read lazily through getters so tests can set `process.env`
 * before the first access. Structural checks (provider keys, chunk sizing,
 * embedding/index dimensions) run once when `@/lib/server/services` assembles
 * the services.
 *
 *   import { config } from "@/lib/config";
 *   const topK = config.retrieval.topK;
 */

import { ConfigurationError } from "@/lib/errors";

export type ProviderName = "google" | "openai";
export type VectorIndexBackend = "firestore" | "memory";

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optional(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    console.warn(`[config] invalid integer for ${name}: "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function optionalBool(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function providerName(name: string): ProviderName {
  const value = optional(name, "google").toLowerCase();
  if (value === "google" || value === "openai") {
    return value;
  }
  throw new ConfigurationError(`${name} must be "google" or "openai", got "${value}"`);
}

function vectorBackend(): VectorIndexBackend {
  const value = optional("VECTOR_INDEX_BACKEND", "firestore").toLowerCase();
  if (value === "firestore" || value === "memory") {
    return value;
  }
  throw new ConfigurationError(`VECTOR_INDEX_BACKEND must be "firestore" or "memory", got "${value}"`);
}

export const config = {
  ai: {
    get llmProvider(): ProviderName {
      return providerName("LLM_PROVIDER");
    },
    get embeddingProvider(): ProviderName {
      return providerName("EMBEDDING_PROVIDER");
    },
    gemini: {
      get apiKey(): string {
        return required("GEMINI_API_KEY");
      },
      get model(): string {
        return optional("GEMINI_MODEL", "gemini-1.5-flash");
      },
      get smartModel(): string {
        return optional("GEMINI_SMART_MODEL", "gemini-1.5-pro");
      },
      get embeddingModel(): string {
        return optional("GEMINI_EMBEDDING_MODEL", "text-embedding-004");
      },
      get embeddingDimension(): number {
        return optionalInt("GEMINI_EMBEDDING_DIMENSION", 768);
      },
    },
    openai: {
      get apiKey(): string {
        return required("OPENAI_API_KEY");
      },
      get baseUrl(): string {
        return optional("OPENAI_BASE_URL", "https://api.openai.com/v1");
      },
      get model(): string {
        return optional("OPENAI_MODEL", "gpt-4o-mini");
      },
      get smartModel(): string {
        return optional("OPENAI_SMART_MODEL", optional("OPENAI_MODEL", "gpt-4o-mini"));
      },
      get embeddingModel(): string {
        return optional("OPENAI_EMBEDDING_MODEL", "text-embedding-3-small");
      },
      get embeddingDimension(): number {
        return optionalInt("OPENAI_EMBEDDING_DIMENSION", 1536);
      },
    },
    get maxAttempts(): number {
      return optionalInt("PROVIDER_MAX_ATTEMPTS", 3);
    },
    get retryBaseDelayMs(): number {
      return optionalInt("PROVIDER_RETRY_BASE_DELAY_MS", 500);
    },
    get generationTimeoutMs(): number {
      return optionalInt("GENERATION_TIMEOUT_MS", 30_000);
    },
    get embeddingBatchSize(): number {
      return optionalInt("EMBEDDING_BATCH_SIZE", 100);
    },
  },

  vectorIndex: {
    get backend(): VectorIndexBackend {
      return vectorBackend();
    },
    get collection(): string {
      return optional("VECTOR_INDEX_COLLECTION", "chunkVectors");
    },
    /** Falls back to the embedding provider's dimension when unset. */
    get dimension(): number | undefined {
      const value = optionalInt("VECTOR_INDEX_DIMENSION", 0);
      return value > 0 ? value : undefined;
    },
  },

  retrieval: {
    get topK(): number {
      return optionalInt("RETRIEVAL_TOP_K", 5);
    },
    get sessionRetentionDays(): number {
      return optionalInt("RETRIEVAL_SESSION_RETENTION_DAYS", 30);
    },
  },

  chunking: {
    get maxChars(): number {
      return optionalInt("CHUNK_MAX_CHARS", 1000);
    },
    get overlapChars(): number {
      return optionalInt("CHUNK_OVERLAP_CHARS", 200);
    },
  },

  exams: {
    get allowConcurrentAttempts(): boolean {
      return optionalBool("EXAMS_ALLOW_CONCURRENT_ATTEMPTS", false);
    },
  },

  points: {
    get examCompleted(): number {
      return optionalInt("POINTS_EXAM_COMPLETED", 25);
    },
    get materialUploaded(): number {
      return optionalInt("POINTS_MATERIAL_UPLOADED", 10);
    },
  },
} as const;
