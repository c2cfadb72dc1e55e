import type { VectorIndexClient, VectorMatch, VectorMetadata } from "@/lib/vector/types";

type Entry = { vector: number[]; metadata: VectorMetadata };

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Brute-force cosine index for local development (`VECTOR_INDEX_BACKEND=memory`) and tests. */
export class InMemoryVectorIndex implements VectorIndexClient {
  private readonly entries = new Map<string, Entry>();

  constructor(readonly dimension: number) {}

  async upsert(id: string, vector: number[], metadata: VectorMetadata): Promise<void> {
    this.entries.set(id, { vector: [...vector], metadata: { ...metadata } });
  }

  async remove(ids: string[]): Promise<void> {
    ids.forEach((id) => this.entries.delete(id));
  }

  async query(vector: number[], topK: number): Promise<VectorMatch[]> {
    return Array.from(this.entries, ([id, entry]) => ({ id, score: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK));
  }

  get size(): number {
    return this.entries.size;
  }
}
