import { FieldValue, type Firestore } from "firebase-admin/firestore";

import { BATCH_LIMIT, chunkArray } from "@/lib/firestore/fields";
import type { VectorIndexClient, VectorMatch, VectorMetadata } from "@/lib/vector/types";

const VECTOR_FIELD = "embedding";
const DISTANCE_FIELD = "vectorDistance";
// Firestore's nearest-neighbour queries cap `limit` at 1000
const FIND_NEAREST_LIMIT = 1000;

/**
 * Vector index backed by Firestore KNN search. Needs a single-field vector
 * index on `embedding` with the configured dimension. Cosine distance is in
 * [0, 2]; the reported score is `1 - distance`.
 */
export function createFirestoreVectorIndex(db: Firestore, collection: string, dimension: number): VectorIndexClient {
  const vectors = db.collection(collection);

  return {
    dimension,
    async upsert(id: string, vector: number[], metadata: VectorMetadata): Promise<void> {
      await vectors.doc(id).set({
        ...metadata,
        [VECTOR_FIELD]: FieldValue.vector(vector),
        updatedAt: FieldValue.serverTimestamp(),
      });
    },
    async remove(ids: string[]): Promise<void> {
      for (const group of chunkArray(Array.from(new Set(ids)), BATCH_LIMIT)) {
        const batch = db.batch();
        group.forEach((id) => batch.delete(vectors.doc(id)));
        await batch.commit();
      }
    },
    async query(vector: number[], topK: number): Promise<VectorMatch[]> {
      const limit = Math.min(Math.max(0, topK), FIND_NEAREST_LIMIT);
      if (limit === 0) {
        return [];
      }

      const snapshot = await vectors
        .findNearest({
          vectorField: VECTOR_FIELD,
          queryVector: vector,
          limit,
          distanceMeasure: "COSINE",
          distanceResultField: DISTANCE_FIELD,
        })
        .get();

      return snapshot.docs
        .map((doc) => {
          const distance: unknown = doc.get(DISTANCE_FIELD);
          return { id: doc.id, score: typeof distance === "number" ? 1 - distance : 0 };
        })
        .sort((a, b) => b.score - a.score);
    },
  };
}
