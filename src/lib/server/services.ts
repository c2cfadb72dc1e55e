import { createModelRouter, type ModelRouter } from "@/lib/ai/modelRouter";
import type { EmbeddingProvider } from "@/lib/ai/types";
import { createEmbeddingProvider, createLanguageModelProvider } from "@/lib/ai/providers";
import { config } from "@/lib/config";
import { assertEmbeddingDimension, createEmbeddingGenerator } from "@/lib/embeddings";
import { createGradingEngine, type GradingEngine } from "@/lib/exams/grading";
import { getAdminFirestore } from "@/lib/firebase-admin";
import { createFirestoreAttemptRepository } from "@/lib/firestore/attempts-admin";
import { createFirestoreChunkRepository } from "@/lib/firestore/chunks-admin";
import { createFirestoreExamRepository } from "@/lib/firestore/exams-admin";
import { createFirestoreFeedbackRepository } from "@/lib/firestore/feedback-admin";
import { createFirestoreLedgerRepository } from "@/lib/firestore/ledger-admin";
import { createFirestoreMaterialRepository } from "@/lib/firestore/materials-admin";
import { createFirestoreSessionRepository } from "@/lib/firestore/sessions-admin";
import { extractMaterialText } from "@/lib/parsing";
import { assertChunkingOptions } from "@/lib/parsing/chunker";
import type { DocumentParser } from "@/lib/parsing/types";
import { createEventBus, type EventBus } from "@/lib/progress/events";
import { registerFlaggingHandlers } from "@/lib/progress/flagging";
import { createLedger, registerLedgerHandlers, type Ledger } from "@/lib/progress/ledger";
import type { Repositories } from "@/lib/store/types";
import { createFeedbackService, type FeedbackService } from "@/lib/study/feedback";
import { createIngestionService, type IngestionService } from "@/lib/study/ingestion";
import { createRetrievalEngine, type RetrievalEngine } from "@/lib/study/rag";
import { summarizeMaterial, type MaterialSummary } from "@/lib/study/summarize";
import { createFirestoreVectorIndex } from "@/lib/vector/firestore-index";
import { InMemoryVectorIndex } from "@/lib/vector/memory-index";
import type { VectorIndexClient } from "@/lib/vector/types";

export type AppServices = {
  repositories: Repositories;
  bus: EventBus;
  models: ModelRouter;
  ingestion: IngestionService;
  retrieval: RetrievalEngine;
  grading: GradingEngine;
  ledger: Ledger;
  feedback: FeedbackService;
  summarize(input: { userId: string; materialId: string }): Promise<MaterialSummary>;
};

export type ServiceDependencies = {
  repositories: Repositories;
  index: VectorIndexClient;
  models: ModelRouter;
  embeddings: EmbeddingProvider;
  parseDocument: DocumentParser;
};

/**
 * Wires engines, repositories and event handlers. Every `ConfigurationError`
 * (missing key, bad chunk sizing, dimension mismatch) surfaces here.
 */
export function buildServices(deps: ServiceDependencies): AppServices {
  const chunking = { maxChars: config.chunking.maxChars, overlapChars: config.chunking.overlapChars };
  assertChunkingOptions(chunking);
  assertEmbeddingDimension(deps.embeddings.dimension, deps.index.dimension);

  const { repositories, index, models } = deps;
  const embeddings = createEmbeddingGenerator(deps.embeddings, {
    batchSize: config.ai.embeddingBatchSize,
    maxAttempts: config.ai.maxAttempts,
    retryBaseDelayMs: config.ai.retryBaseDelayMs,
  });

  const bus = createEventBus();
  const ledger = createLedger(repositories.ledger, {
    examCompleted: config.points.examCompleted,
    materialUploaded: config.points.materialUploaded,
  });
  registerLedgerHandlers(bus, ledger);
  registerFlaggingHandlers(bus, repositories.chunks);

  return {
    repositories,
    bus,
    models,
    ledger,
    ingestion: createIngestionService({
      materials: repositories.materials,
      chunks: repositories.chunks,
      embeddings,
      index,
      parseDocument: deps.parseDocument,
      bus,
      chunking,
    }),
    retrieval: createRetrievalEngine({
      embeddings,
      index,
      chunks: repositories.chunks,
      sessions: repositories.sessions,
      models,
      topK: config.retrieval.topK,
      sessionRetentionDays: config.retrieval.sessionRetentionDays,
    }),
    grading: createGradingEngine({
      exams: repositories.exams,
      attempts: repositories.attempts,
      chunks: repositories.chunks,
      models,
      bus,
      allowConcurrentAttempts: config.exams.allowConcurrentAttempts,
    }),
    feedback: createFeedbackService({ sessions: repositories.sessions, feedback: repositories.feedback, bus }),
    summarize: (input) =>
      summarizeMaterial(
        { materials: repositories.materials, chunks: repositories.chunks, models, overlapChars: chunking.overlapChars },
        input,
      ),
  };
}

let cachedServices: AppServices | undefined;

export function getServices(): AppServices {
  if (cachedServices) {
    return cachedServices;
  }

  const db = getAdminFirestore();
  const embeddingProvider = createEmbeddingProvider();
  const dimension = config.vectorIndex.dimension ?? embeddingProvider.dimension;
  const index =
    config.vectorIndex.backend === "memory"
      ? new InMemoryVectorIndex(dimension)
      : createFirestoreVectorIndex(db, config.vectorIndex.collection, dimension);

  cachedServices = buildServices({
    repositories: {
      materials: createFirestoreMaterialRepository(db),
      chunks: createFirestoreChunkRepository(db),
      sessions: createFirestoreSessionRepository(db),
      exams: createFirestoreExamRepository(db),
      attempts: createFirestoreAttemptRepository(db),
      ledger: createFirestoreLedgerRepository(db),
      feedback: createFirestoreFeedbackRepository(db),
    },
    index,
    models: createModelRouter(createLanguageModelProvider(), {
      timeoutMs: config.ai.generationTimeoutMs,
      maxAttempts: config.ai.maxAttempts,
      retryBaseDelayMs: config.ai.retryBaseDelayMs,
    }),
    embeddings: embeddingProvider,
    parseDocument: extractMaterialText,
  });

  console.info("[config] services ready", {
    llmProvider: config.ai.llmProvider,
    embeddingProvider: embeddingProvider.name,
    vectorIndex: config.vectorIndex.backend,
    dimension,
  });
  return cachedServices;
}
