import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { AppServices } from "@/lib/server/services";
import { UNGROUNDED_NOTICE } from "@/lib/study/rag";
import { createTestServices, jsonRequest, TEST_UID } from "../support/api";
import type { MemoryStore } from "../support/memory-store";

const holder = vi.hoisted(() => {
  const state: { services?: AppServices } = {};
  return state;
});

vi.mock("@/lib/firebase-admin", () => ({
  getAdminFirestore: () => {
    throw new Error("Firestore is not available in tests");
  },
  getAdminAuth: () => ({
    verifyIdToken: async (token: string) => {
      if (token === "test-token") {
        return { uid: "student-1" };
      }
      throw Object.assign(new Error("Decoding Firebase ID token failed"), { code: "auth/argument-error" });
    },
  }),
}));

vi.mock("@/lib/server/services", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/server/services")>();
  return {
    ...actual,
    getServices: () => {
      if (!holder.services) {
        throw new Error("test services not installed");
      }
      return holder.services;
    },
  };
});

import { POST as ask } from "@/app/api/study/ask/route";
import { POST as submitFeedback } from "@/app/api/study/feedback/route";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("POST /api/study/ask", () => {
  beforeEach(() => {
    holder.services = createTestServices().services;
  });

  it("rejects a request without a bearer token", async () => {
    const response = await ask(jsonRequest("/api/study/ask", { question: "Why?" }, null));

    expect(response.status).toBe(401);
    await expect(response.json()).resolves.toEqual({ error: "Missing bearer token", code: "unauthenticated" });
  });

  it("rejects an invalid token", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const response = await ask(jsonRequest("/api/study/ask", { question: "Why?" }, "forged"));

    expect(response.status).toBe(401);
    await expect(response.json()).resolves.toEqual({ error: "Invalid authentication token", code: "unauthenticated" });
  });

  it("rejects a blank question", async () => {
    const response = await ask(jsonRequest("/api/study/ask", { question: "   " }));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: "Invalid request",
      code: "validation_error",
      details: ["question: question is required"],
    });
  });

  it("answers with the ungrounded label when no material matches", async () => {
    const response = await ask(jsonRequest("/api/study/ask", { question: "What is osmosis?" }));

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      answer: `${UNGROUNDED_NOTICE}\n\nModel answer.`,
      grounded: false,
      usedChunkIds: [],
    });
  });
});

describe("POST /api/study/feedback", () => {
  let store: MemoryStore;

  beforeEach(() => {
    const setup = createTestServices();
    holder.services = setup.services;
    store = setup.store;
    store.addIndexedChunk({ id: "C1", materialId: "m1", sequence: 0, text: "Osmosis notes", vectorId: "v1" });
    store.sessions.set("s1", {
      id: "s1",
      userId: TEST_UID,
      queryText: "What is osmosis?",
      usedChunkIds: ["C1"],
      answer: "Water diffusion.",
      grounded: true,
      createdAt: "2026-06-01T00:00:00.000Z",
      expiresAt: "2026-07-01T00:00:00.000Z",
    });
  });

  it("records feedback and flags the session's chunks", async () => {
    const response = await submitFeedback(jsonRequest("/api/study/feedback", { sessionId: "s1", rating: 1 }));

    expect(response.status).toBe(201);
    await expect(response.json()).resolves.toMatchObject({ flagged: true });
    expect(store.chunks.get("C1")?.reviewFlagsCount).toBe(1);
  });

  it("rejects an out-of-range rating", async () => {
    const response = await submitFeedback(jsonRequest("/api/study/feedback", { sessionId: "s1", rating: 9 }));

    expect(response.status).toBe(400);
    expect(store.feedback.size).toBe(0);
  });

  it("returns 404 for an unknown session", async () => {
    const response = await submitFeedback(jsonRequest("/api/study/feedback", { sessionId: "s404", rating: 3 }));

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: "Retrieval session not found", code: "not_found" });
  });
});
