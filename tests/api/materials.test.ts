import { beforeEach, describe, expect, it, vi } from "vitest";

import type { RoutedGenerationInput } from "@/lib/ai/modelRouter";
import type { AppServices } from "@/lib/server/services";
import { createTestServices, getRequest, jsonRequest, routeParams } from "../support/api";
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
      if (token === "other-token") {
        return { uid: "student-2" };
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

import { GET as getMaterial } from "@/app/api/materials/[materialId]/route";
import { POST as summarize } from "@/app/api/materials/[materialId]/summary/route";
import { POST as registerMaterial } from "@/app/api/materials/route";

const upload = {
  courseId: "bio-101",
  file: { name: "notes.txt", url: "https://files.test/notes.txt", extension: ".TXT" },
};

describe("material routes", () => {
  let store: MemoryStore;
  let calls: RoutedGenerationInput[];

  beforeEach(() => {
    const setup = createTestServices(() => "  Light becomes sugar.  ");
    holder.services = setup.services;
    store = setup.store;
    calls = setup.calls;
  });

  async function uploadAndIndex(): Promise<string> {
    const response = await registerMaterial(jsonRequest("/api/materials", upload));
    expect(response.status).toBe(202);
    const body: unknown = await response.json();
    expect(body).toEqual({ materialId: "material-1", ingestionStatus: "pending" });

    await vi.waitFor(() => {
      expect(store.materials.get("material-1")?.ingestionStatus).toBe("indexed");
    });
    return "material-1";
  }

  it("accepts an upload, indexes it in the background and reports status", async () => {
    const materialId = await uploadAndIndex();

    const response = await getMaterial(getRequest(`/api/materials/${materialId}`), routeParams({ materialId }));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({
      id: materialId,
      ownerId: "student-1",
      courseId: "bio-101",
      file: { name: "notes.txt", url: "https://files.test/notes.txt", extension: "txt" },
      ingestionStatus: "indexed",
      chunkCount: 1,
    });
    expect(store.profile("student-1")).toMatchObject({ studyMaterialsUploadedCount: 1, totalPoints: 10 });
  });

  it("rejects an unsupported file type", async () => {
    const response = await registerMaterial(
      jsonRequest("/api/materials", { ...upload, file: { ...upload.file, extension: "exe" } }),
    );

    expect(response.status).toBe(400);
    expect(store.materials.size).toBe(0);
  });

  it("keeps a material's status private to its owner", async () => {
    const materialId = await uploadAndIndex();

    const response = await getMaterial(
      getRequest(`/api/materials/${materialId}`, "other-token"),
      routeParams({ materialId }),
    );

    expect(response.status).toBe(403);
  });

  it("summarizes an indexed material", async () => {
    const materialId = await uploadAndIndex();

    const response = await summarize(
      jsonRequest(`/api/materials/${materialId}/summary`, {}),
      routeParams({ materialId }),
    );

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ materialId, summary: "Light becomes sugar.", truncated: false });
    const call = calls.find((input) => input.taskType === "summarize_material");
    expect(call?.prompt).toContain(
      "=== MATERIAL ===\nPhotosynthesis converts light into chemical energy.\n=== END MATERIAL ===",
    );
  });

  it("refuses to summarize a material that failed ingestion", async () => {
    store.materials.set("m-failed", {
      id: "m-failed",
      ownerId: "student-1",
      courseId: "bio-101",
      file: { name: "scan.pdf", url: "https://files.test/scan.pdf", extension: "pdf" },
      ingestionStatus: "failed",
      chunkCount: 0,
      errorMessage: "scan.pdf: no extractable text",
      createdAt: "2026-06-01T00:00:00.000Z",
    });

    const response = await summarize(
      jsonRequest("/api/materials/m-failed/summary", {}),
      routeParams({ materialId: "m-failed" }),
    );

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: "Material is not indexed yet (status: failed)",
      code: "validation_error",
    });
  });
});
