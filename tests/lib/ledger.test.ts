import { beforeEach, describe, expect, it, vi } from "vitest";

import { createEventBus, type ExamCompletedEvent } from "@/lib/progress/events";
import { createLedger, registerLedgerHandlers, type Ledger } from "@/lib/progress/ledger";
import type { CompletedAttempt } from "@/lib/store/types";
import { MemoryStore } from "../support/memory-store";

function completedAttempt(id: string, userId: string, totalScore: number): CompletedAttempt {
  return {
    id,
    userId,
    examId: "exam-1",
    startedAt: "2026-05-01T08:00:00.000Z",
    state: "completed",
    completedAt: "2026-05-01T09:00:00.000Z",
    totalScore,
    answers: [],
  };
}

function examCompleted(attemptId: string, userId: string, score: number): ExamCompletedEvent {
  return { kind: "exam_completed", attemptId, userId, score, occurredAt: "2026-05-01T09:00:00.000Z" };
}

describe("progress ledger", () => {
  let store: MemoryStore;
  let ledger: Ledger;

  beforeEach(() => {
    store = new MemoryStore();
    ledger = createLedger(store.repositories().ledger, { examCompleted: 25, materialUploaded: 10 });
  });

  it("applies an exam completion once, however often it is delivered", async () => {
    store.attempts.set("7", completedAttempt("7", "u1", 80));
    const event = examCompleted("7", "u1", 80);

    await expect(ledger.handleExamCompleted(event)).resolves.toEqual({ applied: true });
    await expect(ledger.handleExamCompleted(event)).resolves.toEqual({ applied: false });

    await expect(ledger.getProgress("u1")).resolves.toEqual({
      userId: "u1",
      mockExamsCompleted: 1,
      averageMockExamScore: 80,
      studyMaterialsUploadedCount: 0,
      totalPoints: 25,
    });
  });

  it("repairs exam stats on replay after the recompute failed", async () => {
    const repository = store.repositories().ledger;
    const recompute = vi
      .spyOn(repository, "recomputeExamStats")
      .mockRejectedValueOnce(new Error("deadline exceeded"));
    const repairing = createLedger(repository, { examCompleted: 25, materialUploaded: 10 });
    store.attempts.set("7", completedAttempt("7", "u1", 80));
    const event = examCompleted("7", "u1", 80);

    await expect(repairing.handleExamCompleted(event)).rejects.toThrow("deadline exceeded");
    expect(store.profile("u1")).toMatchObject({ mockExamsCompleted: 0, totalPoints: 25 });

    await expect(repairing.handleExamCompleted(event)).resolves.toEqual({ applied: false });

    expect(recompute).toHaveBeenCalledTimes(2);
    expect(store.profile("u1")).toMatchObject({ mockExamsCompleted: 1, averageMockExamScore: 80, totalPoints: 25 });
  });

  it("averages over all completed attempts regardless of delivery order", async () => {
    const scores: Array<[string, number]> = [
      ["a1", 80],
      ["a2", 60],
      ["a3", 100],
    ];
    scores.forEach(([id, score]) => store.attempts.set(id, completedAttempt(id, "u1", score)));

    for (const [id, score] of [...scores].reverse()) {
      await ledger.handleExamCompleted(examCompleted(id, "u1", score));
    }

    expect(store.profile("u1")).toMatchObject({ mockExamsCompleted: 3, averageMockExamScore: 80, totalPoints: 75 });
  });

  it("ignores attempts that are still in progress when averaging", async () => {
    store.attempts.set("done", completedAttempt("done", "u1", 40));
    store.attempts.set("open", { id: "open", userId: "u1", examId: "exam-1", startedAt: "", state: "in_progress" });

    await ledger.handleExamCompleted(examCompleted("done", "u1", 40));

    expect(store.profile("u1")).toMatchObject({ mockExamsCompleted: 1, averageMockExamScore: 40 });
  });

  it("counts an upload once", async () => {
    const event = {
      kind: "material_uploaded" as const,
      materialId: "m1",
      userId: "u1",
      occurredAt: "2026-05-01T08:00:00.000Z",
    };

    await ledger.handleMaterialUploaded(event);
    await ledger.handleMaterialUploaded(event);

    expect(store.profile("u1")).toMatchObject({ studyMaterialsUploadedCount: 1, totalPoints: 10 });
  });

  it("loses no increment when events arrive concurrently through the bus", async () => {
    const bus = createEventBus();
    registerLedgerHandlers(bus, ledger);
    store.attempts.set("a1", completedAttempt("a1", "u1", 90));

    await Promise.all([
      bus.publish(examCompleted("a1", "u1", 90)),
      bus.publish({ kind: "material_uploaded", materialId: "m1", userId: "u1", occurredAt: "2026-05-01T08:00:00.000Z" }),
      bus.publish(examCompleted("a1", "u1", 90)),
    ]);

    expect(store.profile("u1")).toEqual({
      userId: "u1",
      mockExamsCompleted: 1,
      averageMockExamScore: 90,
      studyMaterialsUploadedCount: 1,
      totalPoints: 35,
    });
  });

  it("reports zeroes for a user with no activity", async () => {
    await expect(ledger.getProgress("new-user")).resolves.toEqual({
      userId: "new-user",
      mockExamsCompleted: 0,
      averageMockExamScore: 0,
      studyMaterialsUploadedCount: 0,
      totalPoints: 0,
    });
  });
});
