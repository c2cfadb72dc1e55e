import { AccessDeniedError, NotFoundError, ValidationError } from "@/lib/errors";
import type { EventBus } from "@/lib/progress/events";
import { FLAGGING_HANDLER, shouldFlagForReview } from "@/lib/progress/flagging";
import type { FeedbackRepository, SessionRepository } from "@/lib/store/types";

export type SubmitFeedbackInput = {
  userId: string;
  sessionId: string;
  rating: number;
  comment?: string;
  aiLowConfidence?: boolean;
  /** Defaults to the chunks the session's answer was built from. */
  contextChunkIds?: string[];
};

export type SubmitFeedbackResult = {
  feedbackId: string;
  /** True only when review flags were written for this feedback. */
  flagged: boolean;
};

export type FeedbackService = {
  submitFeedback(input: SubmitFeedbackInput): Promise<SubmitFeedbackResult>;
};

export function createFeedbackService(deps: {
  sessions: SessionRepository;
  feedback: FeedbackRepository;
  bus: EventBus;
}): FeedbackService {
  return {
    async submitFeedback(input) {
      if (!Number.isInteger(input.rating) || input.rating < 1 || input.rating > 5) {
        throw new ValidationError("Rating must be an integer from 1 to 5");
      }

      const session = await deps.sessions.getSession(input.sessionId);
      if (!session) {
        throw new NotFoundError("Retrieval session not found");
      }
      if (session.userId !== input.userId) {
        throw new AccessDeniedError("Session belongs to another user");
      }

      const contextChunkIds = Array.from(new Set(input.contextChunkIds ?? session.usedChunkIds));
      const aiLowConfidence = input.aiLowConfidence ?? false;
      const comment = input.comment?.trim() || undefined;

      const record = await deps.feedback.createFeedback({
        sessionId: session.id,
        userId: input.userId,
        rating: input.rating,
        comment,
        aiLowConfidence,
        contextChunkIds,
      });

      const delivery = await deps.bus.publish({
        kind: "ai_feedback_created",
        feedbackId: record.id,
        sessionId: record.sessionId,
        userId: record.userId,
        rating: record.rating,
        aiLowConfidence: record.aiLowConfidence,
        contextChunkIds: record.contextChunkIds,
        occurredAt: record.createdAt,
      });

      const flaggingFailure = delivery.failures.find((failure) => failure.handler === FLAGGING_HANDLER);
      if (flaggingFailure) {
        console.warn("[feedback] review flags not written; replay ai_feedback_created to recover", {
          feedbackId: record.id,
          message: flaggingFailure.message,
        });
      }

      return {
        feedbackId: record.id,
        flagged:
          shouldFlagForReview(record.rating, record.aiLowConfidence) &&
          contextChunkIds.length > 0 &&
          flaggingFailure === undefined,
      };
    },
  };
}
