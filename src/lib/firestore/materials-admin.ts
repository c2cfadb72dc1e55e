import { FieldValue, type DocumentSnapshot, type Firestore } from "firebase-admin/firestore";

import { ConcurrencyConflictError, NotFoundError } from "@/lib/errors";
import { COLLECTIONS, readNumber, readOptionalString, readString, readTimestamp, toTimestamp } from "@/lib/firestore/fields";
import type { IngestionStatus, MaterialRepository, StudyMaterial } from "@/lib/store/types";

const INGESTION_STATUSES: readonly IngestionStatus[] = ["pending", "indexing", "indexed", "failed"];
const CLAIMABLE: ReadonlySet<IngestionStatus> = new Set(["pending", "failed"]);

function toIngestionStatus(value: unknown): IngestionStatus {
  return INGESTION_STATUSES.find((status) => status === value) ?? "pending";
}

export function toStudyMaterial(snapshot: DocumentSnapshot): StudyMaterial | null {
  const data = snapshot.data();
  if (!data) {
    return null;
  }

  const file: unknown = data.file;
  const fileData = file && typeof file === "object" && !Array.isArray(file) ? Object.fromEntries(Object.entries(file)) : {};

  return {
    id: snapshot.id,
    ownerId: readString(data, "ownerId"),
    courseId: readString(data, "courseId"),
    file: {
      name: readString(fileData, "name"),
      url: readString(fileData, "url"),
      extension: readString(fileData, "extension"),
    },
    ingestionStatus: toIngestionStatus(data.ingestionStatus),
    chunkCount: readNumber(data, "chunkCount"),
    errorMessage: readOptionalString(data, "errorMessage"),
    createdAt: readTimestamp(data, "createdAt"),
  };
}

export function createFirestoreMaterialRepository(db: Firestore): MaterialRepository {
  const materials = db.collection(COLLECTIONS.materials);

  return {
    async createMaterial(input) {
      const ref = materials.doc();
      const createdAt = new Date().toISOString();
      await ref.set({
        ownerId: input.ownerId,
        courseId: input.courseId,
        file: { ...input.file },
        ingestionStatus: "pending",
        chunkCount: 0,
        createdAt: toTimestamp(createdAt),
      });

      return { id: ref.id, ...input, ingestionStatus: "pending", chunkCount: 0, createdAt };
    },

    async getMaterial(materialId) {
      return toStudyMaterial(await materials.doc(materialId).get());
    },

    async claimForIngestion(materialId) {
      const ref = materials.doc(materialId);
      return db.runTransaction<StudyMaterial>(async (tx) => {
        const material = toStudyMaterial(await tx.get(ref));
        if (!material) {
          throw new NotFoundError("Material not found");
        }
        if (!CLAIMABLE.has(material.ingestionStatus)) {
          throw new ConcurrencyConflictError(`Material is already ${material.ingestionStatus}`, { materialId });
        }

        tx.update(ref, {
          ingestionStatus: "indexing",
          errorMessage: FieldValue.delete(),
          updatedAt: FieldValue.serverTimestamp(),
        });
        return { ...material, ingestionStatus: "indexing", errorMessage: undefined };
      });
    },

    async updateIngestion(materialId, update) {
      await materials.doc(materialId).update({
        ingestionStatus: update.status,
        ...(update.chunkCount !== undefined ? { chunkCount: update.chunkCount } : {}),
        errorMessage: update.errorMessage ?? FieldValue.delete(),
        updatedAt: FieldValue.serverTimestamp(),
      });
    },
  };
}
