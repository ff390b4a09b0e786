export type VectorMetadataValue = string | number | boolean | null;
export type VectorMetadata = Record<string, VectorMetadataValue>;

export interface VectorEntry {
  id: string;
  embedding: number[];
  metadata: VectorMetadata;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

/**
 * Embedding persistence keyed by page key, with exhaustive cosine ranking.
 *
 * searchSimilar orders by similarity descending; equal scores keep the order in
 * which the ids were first stored. A metadata filter keeps only entries whose
 * metadata equals every filter field.
 */
export interface VectorStore {
  /** Insert, or replace the vector and metadata of an existing id (keeping its insertion position). */
  storeEmbedding(id: string, embedding: number[], metadata?: VectorMetadata): Promise<void>;
  /** Replace the vector and merge metadata of an existing id. Returns false when the id is unknown. */
  updateEmbedding(id: string, embedding?: number[], metadata?: VectorMetadata): Promise<boolean>;
  deleteEmbedding(id: string): Promise<boolean>;
  getEmbedding(id: string): Promise<VectorEntry | null>;
  searchSimilar(query: number[], topK: number, filter?: VectorMetadata): Promise<VectorSearchResult[]>;
  count(): Promise<number>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Cosine similarity in [-1, 1]. Vectors of different length, and zero vectors, score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / Math.sqrt(normA * normB);
}

export function matchesFilter(metadata: VectorMetadata, filter: VectorMetadata | undefined): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}
