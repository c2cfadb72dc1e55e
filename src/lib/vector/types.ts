export type VectorMetadata = Record<string, string | number>;

export type VectorMatch = {
  id: string;
  score: number;
};

/**
 * Similarity search over chunk vectors. `upsert` replaces any prior entry with
 * the same id; `remove` ignores ids it does not hold; `query` returns at most
 * `topK` matches, best first, and an empty list for an empty index.
 */
export type VectorIndexClient = {
  readonly dimension: number;
  upsert(id: string, vector: number[], metadata: VectorMetadata): Promise<void>;
  remove(ids: string[]): Promise<void>;
  query(vector: number[], topK: number): Promise<VectorMatch[]>;
};
