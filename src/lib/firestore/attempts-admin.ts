import { FieldValue, type DocumentData, type Firestore } from "firebase-admin/firestore";

import { ConcurrencyConflictError, NotFoundError } from "@/lib/errors";
import {
  COLLECTIONS,
  compositeId,
  readNumber,
  readString,
  readTimestamp,
  toTimestamp,
} from "@/lib/firestore/fields";
import type {
  AttemptRepository,
  CompletedAttempt,
  InProgressAttempt,
  MockExamAnswer,
  MockExamAttempt,
} from "@/lib/store/types";

function toAnswer(questionId: string, data: DocumentData): MockExamAnswer {
  return {
    questionId,
    submittedContent: readString(data, "submittedContent"),
    awardedPoints: readNumber(data, "awardedPoints"),
    feedback: readString(data, "feedback"),
  };
}

function toAttempt(id: string, data: DocumentData, answers: MockExamAnswer[]): MockExamAttempt {
  const base = {
    id,
    userId: readString(data, "userId"),
    examId: readString(data, "examId"),
    startedAt: readTimestamp(data, "startedAt"),
  };

  if (data.state === "completed") {
    return {
      ...base,
      state: "completed",
      completedAt: readTimestamp(data, "completedAt"),
      totalScore: readNumber(data, "totalScore"),
      answers,
    };
  }
  return { ...base, state: "in_progress" };
}

/**
 * Attempts live in `mockExamAttempts`, answers in its `answers` subcollection.
 * With concurrency off, `activeAttemptLocks/{user}__{exam}` marks the one
 * in-progress attempt; it is created with the attempt and removed in the
 * completion transaction.
 */
export function createFirestoreAttemptRepository(db: Firestore): AttemptRepository {
  const attempts = db.collection(COLLECTIONS.attempts);
  const locks = db.collection(COLLECTIONS.attemptLocks);

  return {
    async startAttempt({ userId, examId, allowConcurrent }) {
      const attemptRef = attempts.doc();
      const lockRef = locks.doc(compositeId(userId, examId));
      const startedAt = new Date().toISOString();

      await db.runTransaction(async (tx) => {
        if (!allowConcurrent) {
          const lock = await tx.get(lockRef);
          if (lock.exists) {
            throw new ConcurrencyConflictError("An attempt for this exam is already in progress", {
              activeAttemptId: readString(lock.data() ?? {}, "attemptId"),
            });
          }
          tx.create(lockRef, { attemptId: attemptRef.id, userId, examId, createdAt: toTimestamp(startedAt) });
        }

        tx.create(attemptRef, { userId, examId, state: "in_progress", startedAt: toTimestamp(startedAt) });
      });

      const attempt: InProgressAttempt = { id: attemptRef.id, userId, examId, startedAt, state: "in_progress" };
      return attempt;
    },

    async getAttempt(attemptId) {
      const ref = attempts.doc(attemptId);
      const snapshot = await ref.get();
      const data = snapshot.data();
      if (!data) {
        return null;
      }

      const answers =
        data.state === "completed"
          ? (await ref.collection(COLLECTIONS.answers).get()).docs.map((doc) => toAnswer(doc.id, doc.data()))
          : [];
      return toAttempt(snapshot.id, data, answers);
    },

    async completeAttempt({ attemptId, answers, totalScore, completedAt }) {
      const ref = attempts.doc(attemptId);

      const completed = await db.runTransaction<CompletedAttempt>(async (tx) => {
        const snapshot = await tx.get(ref);
        const data = snapshot.data();
        if (!data) {
          throw new NotFoundError("Attempt not found");
        }
        if (data.state === "completed") {
          throw new ConcurrencyConflictError("Attempt is already completed", { attemptId });
        }

        const userId = readString(data, "userId");
        const examId = readString(data, "examId");
        const lockRef = locks.doc(compositeId(userId, examId));
        const lock = await tx.get(lockRef);

        for (const answer of answers) {
          tx.create(ref.collection(COLLECTIONS.answers).doc(answer.questionId), {
            submittedContent: answer.submittedContent,
            awardedPoints: answer.awardedPoints,
            feedback: answer.feedback,
            createdAt: toTimestamp(completedAt),
          });
        }
        tx.update(ref, {
          state: "completed",
          totalScore,
          completedAt: toTimestamp(completedAt),
          updatedAt: FieldValue.serverTimestamp(),
        });
        if (lock.exists && readString(lock.data() ?? {}, "attemptId") === attemptId) {
          tx.delete(lockRef);
        }

        return {
          id: attemptId,
          userId,
          examId,
          startedAt: readTimestamp(data, "startedAt"),
          state: "completed",
          completedAt,
          totalScore,
          answers,
        };
      });

      return completed;
    },
  };
}
