import type { Firestore } from "firebase-admin/firestore";

import { COLLECTIONS, toTimestamp } from "@/lib/firestore/fields";
import type { FeedbackRepository } from "@/lib/store/types";

export function createFirestoreFeedbackRepository(db: Firestore): FeedbackRepository {
  const feedback = db.collection(COLLECTIONS.feedback);

  return {
    async createFeedback(input) {
      const ref = feedback.doc();
      const createdAt = new Date().toISOString();
      await ref.set({
        sessionId: input.sessionId,
        userId: input.userId,
        rating: input.rating,
        ...(input.comment ? { comment: input.comment } : {}),
        aiLowConfidence: input.aiLowConfidence,
        contextChunkIds: input.contextChunkIds,
        createdAt: toTimestamp(createdAt),
      });

      return { id: ref.id, ...input, createdAt };
    },
  };
}
