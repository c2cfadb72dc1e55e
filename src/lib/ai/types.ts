import type { ProviderName } from "@/lib/config";

export type AiTaskType =
  | "answer_with_context"
  | "answer_without_context"
  | "grade_answer"
  | "summarize_material";

export type ModelTier = "fast" | "smart";

export type GenerationRequest = {
  prompt: string;
  systemInstruction: string;
  model: string;
  signal?: AbortSignal;
};

export type LanguageModelProvider = {
  readonly name: ProviderName;
  readonly models: Record<ModelTier, string>;
  generate(request: GenerationRequest): Promise<string>;
};

export type EmbeddingPurpose = "document" | "query";

export type EmbeddingProvider = {
  readonly name: ProviderName;
  readonly model: string;
  readonly dimension: number;
  readonly maxBatchSize: number;
  embedBatch(texts: string[], purpose: EmbeddingPurpose): Promise<number[][]>;
};
