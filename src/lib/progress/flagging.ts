import type { AiFeedbackCreatedEvent, EventBus } from "@/lib/progress/events";
import type { ChunkRepository } from "@/lib/store/types";

const LOW_RATING_THRESHOLD = 2;

export const FLAGGING_HANDLER = "flagging.review_flags";

export function shouldFlagForReview(rating: number, aiLowConfidence: boolean): boolean {
  return rating <= LOW_RATING_THRESHOLD || aiLowConfidence;
}

/**
 * Returns the chunk ids that were flagged (each exactly once). A feedback
 * record flags at most once: redelivery returns an empty list.
 */
export async function flagChunksForFeedback(
  chunks: ChunkRepository,
  event: Pick<AiFeedbackCreatedEvent, "feedbackId" | "rating" | "aiLowConfidence" | "contextChunkIds">,
): Promise<string[]> {
  if (!shouldFlagForReview(event.rating, event.aiLowConfidence)) {
    return [];
  }

  const chunkIds = Array.from(new Set(event.contextChunkIds.filter(Boolean)));
  if (!chunkIds.length) {
    return [];
  }

  const applied = await chunks.incrementReviewFlags(event.feedbackId, chunkIds);
  if (!applied) {
    console.info("[flagging] replay ignored", { feedbackId: event.feedbackId });
    return [];
  }
  console.info("[flagging] chunks flagged for review", {
    feedbackId: event.feedbackId,
    rating: event.rating,
    aiLowConfidence: event.aiLowConfidence,
    chunkCount: chunkIds.length,
  });
  return chunkIds;
}

export function registerFlaggingHandlers(bus: EventBus, chunks: ChunkRepository): void {
  bus.subscribe("ai_feedback_created", FLAGGING_HANDLER, async (event) => {
    await flagChunksForFeedback(chunks, event);
  });
}
