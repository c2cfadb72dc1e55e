import { FieldValue, type Firestore } from "firebase-admin/firestore";

import { COLLECTIONS, compositeId, isAlreadyExistsError, readNumber } from "@/lib/firestore/fields";
import { roundPoints } from "@/lib/exams/grade-answer";
import type { LedgerRepository } from "@/lib/store/types";

/**
 * `activityLog/{user}__{kind}__{source}` is the durable uniqueness constraint.
 * The log row and the profile increments are one write batch, so an award is
 * applied exactly when its row is created.
 */
export function createFirestoreLedgerRepository(db: Firestore): LedgerRepository {
  const activityLog = db.collection(COLLECTIONS.activityLog);
  const profiles = db.collection(COLLECTIONS.profiles);
  const attempts = db.collection(COLLECTIONS.attempts);

  return {
    async recordAward(award) {
      const batch = db.batch();
      batch.create(activityLog.doc(compositeId(award.userId, award.eventKind, award.sourceEntityId)), {
        userId: award.userId,
        eventKind: award.eventKind,
        sourceEntityId: award.sourceEntityId,
        points: award.points,
        createdAt: FieldValue.serverTimestamp(),
      });
      batch.set(
        profiles.doc(award.userId),
        {
          userId: award.userId,
          totalPoints: FieldValue.increment(award.points),
          ...(award.uploadedMaterials
            ? { studyMaterialsUploadedCount: FieldValue.increment(award.uploadedMaterials) }
            : {}),
          updatedAt: FieldValue.serverTimestamp(),
        },
        { merge: true },
      );

      try {
        await batch.commit();
        return true;
      } catch (error) {
        if (isAlreadyExistsError(error)) {
          return false;
        }
        throw error;
      }
    },

    async recomputeExamStats(userId) {
      return db.runTransaction(async (tx) => {
        const completed = await tx.get(
          attempts.where("userId", "==", userId).where("state", "==", "completed"),
        );
        const scores = completed.docs.map((doc) => readNumber(doc.data(), "totalScore"));
        const stats = {
          mockExamsCompleted: scores.length,
          averageMockExamScore: scores.length
            ? roundPoints(scores.reduce((sum, score) => sum + score, 0) / scores.length)
            : 0,
        };

        tx.set(profiles.doc(userId), { userId, ...stats, updatedAt: FieldValue.serverTimestamp() }, { merge: true });
        return stats;
      });
    },

    async getProgress(userId) {
      const data = (await profiles.doc(userId).get()).data() ?? {};
      return {
        userId,
        mockExamsCompleted: readNumber(data, "mockExamsCompleted"),
        averageMockExamScore: readNumber(data, "averageMockExamScore"),
        studyMaterialsUploadedCount: readNumber(data, "studyMaterialsUploadedCount"),
        totalPoints: readNumber(data, "totalPoints"),
      };
    },
  };
}
