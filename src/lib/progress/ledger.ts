import type { EventBus, ExamCompletedEvent, MaterialUploadedEvent } from "@/lib/progress/events";
import type { LedgerRepository, UserProgress } from "@/lib/store/types";

export type PointsTable = {
  examCompleted: number;
  materialUploaded: number;
};

export type LedgerOutcome = {
  applied: boolean;
};

export type Ledger = {
  handleExamCompleted(event: ExamCompletedEvent): Promise<LedgerOutcome>;
  handleMaterialUploaded(event: MaterialUploadedEvent): Promise<LedgerOutcome>;
  getProgress(userId: string): Promise<UserProgress>;
};

/**
 * Derives profile statistics from domain events. The activity row written by
 * `recordAward` guards the points: a replayed event finds its row and awards
 * nothing. Exam statistics are recomputed from completed attempts on every
 * delivery, so a replay repairs a recompute that failed after the award.
 */
export function createLedger(store: LedgerRepository, points: PointsTable): Ledger {
  return {
    async handleExamCompleted(event) {
      const inserted = await store.recordAward({
        userId: event.userId,
        eventKind: "exam_completed",
        sourceEntityId: event.attemptId,
        points: points.examCompleted,
      });

      const stats = await store.recomputeExamStats(event.userId);
      if (!inserted) {
        console.info("[ledger] replay ignored; exam stats recomputed", {
          kind: event.kind,
          attemptId: event.attemptId,
          ...stats,
        });
        return { applied: false };
      }

      console.info("[ledger] exam completion recorded", {
        userId: event.userId,
        attemptId: event.attemptId,
        ...stats,
      });
      return { applied: true };
    },

    async handleMaterialUploaded(event) {
      const inserted = await store.recordAward({
        userId: event.userId,
        eventKind: "material_uploaded",
        sourceEntityId: event.materialId,
        points: points.materialUploaded,
        uploadedMaterials: 1,
      });

      if (!inserted) {
        console.info("[ledger] replay ignored", { kind: event.kind, materialId: event.materialId });
        return { applied: false };
      }

      console.info("[ledger] material upload recorded", { userId: event.userId, materialId: event.materialId });
      return { applied: true };
    },

    getProgress(userId) {
      return store.getProgress(userId);
    },
  };
}

export function registerLedgerHandlers(bus: EventBus, ledger: Ledger): void {
  bus.subscribe("exam_completed", "ledger.exam_completed", async (event) => {
    await ledger.handleExamCompleted(event);
  });
  bus.subscribe("material_uploaded", "ledger.material_uploaded", async (event) => {
    await ledger.handleMaterialUploaded(event);
  });
}
