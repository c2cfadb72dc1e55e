import type { Firestore } from "firebase-admin/firestore";

import {
  COLLECTIONS,
  readBoolean,
  readString,
  readStringArray,
  readTimestamp,
  toTimestamp,
} from "@/lib/firestore/fields";
import type { SessionRepository } from "@/lib/store/types";

/** `expiresAt` is a Timestamp so a Firestore TTL policy can expire sessions. */
export function createFirestoreSessionRepository(db: Firestore): SessionRepository {
  const sessions = db.collection(COLLECTIONS.sessions);

  return {
    async saveSession(session) {
      await sessions.doc(session.id).set({
        userId: session.userId,
        queryText: session.queryText,
        usedChunkIds: session.usedChunkIds,
        answer: session.answer,
        grounded: session.grounded,
        createdAt: toTimestamp(session.createdAt),
        expiresAt: toTimestamp(session.expiresAt),
      });
    },

    async getSession(sessionId) {
      const snapshot = await sessions.doc(sessionId).get();
      const data = snapshot.data();
      if (!data) {
        return null;
      }

      return {
        id: snapshot.id,
        userId: readString(data, "userId"),
        queryText: readString(data, "queryText"),
        usedChunkIds: readStringArray(data, "usedChunkIds"),
        answer: readString(data, "answer"),
        grounded: readBoolean(data, "grounded"),
        createdAt: readTimestamp(data, "createdAt"),
        expiresAt: readTimestamp(data, "expiresAt"),
      };
    },
  };
}
