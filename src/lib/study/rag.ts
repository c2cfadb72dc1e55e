import { randomUUID } from "node:crypto";

import type { ModelRouter } from "@/lib/ai/modelRouter";
import type { EmbeddingGenerator } from "@/lib/embeddings";
import { ValidationError } from "@/lib/errors";
import type { ChunkRepository, DocumentChunk, SessionRepository } from "@/lib/store/types";
import type { VectorIndexClient } from "@/lib/vector/types";

export const UNGROUNDED_NOTICE = "Not directly found in your material, but here is a general explanation.";

const MAX_QUESTION_CHARS = 4_000;
const DAY_MS = 24 * 60 * 60 * 1000;

export type RetrievedChunk = {
  chunk: DocumentChunk;
  score: number;
};

export type AskQuestionInput = {
  userId: string;
  question: string;
};

export type AskQuestionResult = {
  answer: string;
  sessionId: string;
  usedChunkIds: string[];
  grounded: boolean;
};

export type RetrievalEngineDeps = {
  embeddings: EmbeddingGenerator;
  index: VectorIndexClient;
  chunks: ChunkRepository;
  sessions: SessionRepository;
  models: ModelRouter;
  topK: number;
  sessionRetentionDays: number;
  now?: () => Date;
};

export type RetrievalEngine = {
  retrieve(question: string): Promise<RetrievedChunk[]>;
  answerQuestion(input: AskQuestionInput): Promise<AskQuestionResult>;
};

function normalizeQuestion(question: string): string {
  const trimmed = question.trim();
  if (!trimmed) {
    throw new ValidationError("Question must not be empty");
  }
  if (trimmed.length > MAX_QUESTION_CHARS) {
    throw new ValidationError(`Question must be at most ${MAX_QUESTION_CHARS} characters`);
  }
  return trimmed;
}

/**
 * Context first (best match first), question last. Each block is fenced by
 * numbered markers so chunk text cannot pass for an instruction.
 */
export function buildGroundedPrompt(question: string, context: RetrievedChunk[]): string {
  const blocks = context.map(({ chunk, score }, index) =>
    [
      `=== CONTEXT ${index + 1} (similarity ${score.toFixed(3)}) ===`,
      chunk.text.trim(),
      `=== END CONTEXT ${index + 1} ===`,
    ].join("\n"),
  );

  return [
    "Answer the student's question using the study material excerpts below.",
    "",
    ...blocks.flatMap((block) => [block, ""]),
    "=== QUESTION ===",
    question,
    "=== END QUESTION ===",
  ].join("\n");
}

export function buildUngroundedPrompt(question: string): string {
  return [
    "No study material matched this question. Answer from general knowledge.",
    "",
    "=== QUESTION ===",
    question,
    "=== END QUESTION ===",
  ].join("\n");
}

export function createRetrievalEngine(deps: RetrievalEngineDeps): RetrievalEngine {
  const now = deps.now ?? (() => new Date());

  async function retrieve(question: string): Promise<RetrievedChunk[]> {
    const vector = await deps.embeddings.embedQuery(question);
    const matches = await deps.index.query(vector, deps.topK);
    if (!matches.length) {
      return [];
    }

    const chunks = await deps.chunks.findIndexedChunksByVectorIds(matches.map((match) => match.id));
    const byVectorId = new Map(chunks.map((chunk) => [chunk.vectorId, chunk]));

    // keep index order; drop vectors whose chunk is gone or not yet published
    return matches.flatMap((match) => {
      const chunk = byVectorId.get(match.id);
      return chunk ? [{ chunk, score: match.score }] : [];
    });
  }

  return {
    retrieve,

    async answerQuestion(input) {
      const question = normalizeQuestion(input.question);
      const context = await retrieve(question);
      const grounded = context.length > 0;

      const response = grounded
        ? await deps.models.generate({ taskType: "answer_with_context", prompt: buildGroundedPrompt(question, context) })
        : await deps.models.generate({ taskType: "answer_without_context", prompt: buildUngroundedPrompt(question) });

      const text = response.text.trim();
      const answer = grounded ? text : `${UNGROUNDED_NOTICE}\n\n${text}`;
      const usedChunkIds = context.map(({ chunk }) => chunk.id);
      const createdAt = now();
      const sessionId = randomUUID();

      await deps.sessions.saveSession({
        id: sessionId,
        userId: input.userId,
        queryText: question,
        usedChunkIds,
        answer,
        grounded,
        createdAt: createdAt.toISOString(),
        expiresAt: new Date(createdAt.getTime() + deps.sessionRetentionDays * DAY_MS).toISOString(),
      });

      console.info("[rag] answered", {
        sessionId,
        grounded,
        chunkCount: usedChunkIds.length,
        modelUsed: response.meta.modelUsed,
        latencyMs: response.meta.latencyMs,
      });

      return { answer, sessionId, usedChunkIds, grounded };
    },
  };
}
