/**
 * Chunk storage (Admin SDK). Chunk ids are `{materialId}_{sequence}` so the
 * per-material sequence is unique by construction.
 */

import { FieldValue, type DocumentSnapshot, type Firestore } from "firebase-admin/firestore";

import { ValidationError } from "@/lib/errors";
import {
  BATCH_LIMIT,
  COLLECTIONS,
  FIRESTORE_IN_LIMIT,
  chunkArray,
  isAlreadyExistsError,
  readNumber,
  readString,
} from "@/lib/firestore/fields";
import { toStudyMaterial } from "@/lib/firestore/materials-admin";
import type { ChunkRepository, DocumentChunk } from "@/lib/store/types";

export function chunkIdFor(materialId: string, sequence: number): string {
  return `${materialId}_${sequence}`;
}

function toDocumentChunk(snapshot: DocumentSnapshot): DocumentChunk | null {
  const data = snapshot.data();
  if (!data) {
    return null;
  }

  return {
    id: snapshot.id,
    materialId: readString(data, "materialId"),
    sequence: readNumber(data, "sequence"),
    text: readString(data, "text"),
    vectorId: readString(data, "vectorId"),
    reviewFlagsCount: readNumber(data, "reviewFlagsCount"),
  };
}

function present<T>(value: T | null): value is T {
  return value !== null;
}

export function createFirestoreChunkRepository(db: Firestore): ChunkRepository {
  const chunks = db.collection(COLLECTIONS.chunks);
  const materials = db.collection(COLLECTIONS.materials);
  const reviewFlagEvents = db.collection(COLLECTIONS.reviewFlagEvents);

  return {
    async saveChunks(materialId, drafts) {
      const createdAt = FieldValue.serverTimestamp();
      const saved: DocumentChunk[] = [];

      for (const group of chunkArray(drafts, BATCH_LIMIT)) {
        const batch = db.batch();
        for (const draft of group) {
          const id = chunkIdFor(materialId, draft.sequence);
          batch.set(chunks.doc(id), {
            materialId,
            sequence: draft.sequence,
            text: draft.text,
            vectorId: draft.vectorId,
            reviewFlagsCount: 0,
            createdAt,
          });
          saved.push({ id, materialId, ...draft, reviewFlagsCount: 0 });
        }
        await batch.commit();
      }

      return saved;
    },

    async deleteChunksForMaterial(materialId) {
      const snapshot = await chunks.where("materialId", "==", materialId).get();
      for (const group of chunkArray(snapshot.docs, BATCH_LIMIT)) {
        const batch = db.batch();
        group.forEach((doc) => batch.delete(doc.ref));
        await batch.commit();
      }
      return snapshot.size;
    },

    async listChunksForMaterial(materialId) {
      const snapshot = await chunks.where("materialId", "==", materialId).get();
      return snapshot.docs
        .map(toDocumentChunk)
        .filter(present)
        .sort((a, b) => a.sequence - b.sequence);
    },

    async getChunk(chunkId) {
      return toDocumentChunk(await chunks.doc(chunkId).get());
    },

    async findIndexedChunksByVectorIds(vectorIds) {
      const unique = Array.from(new Set(vectorIds));
      if (!unique.length) {
        return [];
      }

      const snapshots = await Promise.all(
        chunkArray(unique, FIRESTORE_IN_LIMIT).map((group) => chunks.where("vectorId", "in", group).get()),
      );
      const found = snapshots.flatMap((snapshot) => snapshot.docs.map(toDocumentChunk).filter(present));
      if (!found.length) {
        return [];
      }

      const materialIds = Array.from(new Set(found.map((chunk) => chunk.materialId)));
      const materialSnapshots = await db.getAll(...materialIds.map((id) => materials.doc(id)));
      const indexed = new Set(
        materialSnapshots
          .map(toStudyMaterial)
          .filter(present)
          .filter((material) => material.ingestionStatus === "indexed")
          .map((material) => material.id),
      );

      return found.filter((chunk) => indexed.has(chunk.materialId));
    },

    async incrementReviewFlags(feedbackId, chunkIds) {
      const unique = Array.from(new Set(chunkIds));
      if (unique.length >= BATCH_LIMIT) {
        throw new ValidationError(`Cannot flag ${unique.length} chunks from one feedback`);
      }

      const refs = unique.map((id) => chunks.doc(id));
      const existing = refs.length ? (await db.getAll(...refs)).filter((snapshot) => snapshot.exists) : [];
      if (existing.length < refs.length) {
        console.warn("[flagging] skipped unknown chunk ids", { missing: refs.length - existing.length });
      }

      // marker and increments commit as one batch
      const batch = db.batch();
      batch.create(reviewFlagEvents.doc(feedbackId), {
        chunkIds: existing.map((snapshot) => snapshot.id),
        createdAt: FieldValue.serverTimestamp(),
      });
      existing.forEach((snapshot) =>
        batch.update(snapshot.ref, {
          reviewFlagsCount: FieldValue.increment(1),
          lastFlaggedAt: FieldValue.serverTimestamp(),
        }),
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
  };
}
