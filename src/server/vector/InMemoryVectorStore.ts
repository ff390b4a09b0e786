import {
  cosineSimilarity,
  matchesFilter,
  type VectorEntry,
  type VectorMetadata,
  type VectorSearchResult,
  type VectorStore,
} from './VectorStore.js';

/**
 * Exhaustive in-process store. Map iteration order is insertion order, and
 * Array.prototype.sort is stable, which together give the tie-break rule.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly entries = new Map<string, VectorEntry>();

  async storeEmbedding(id: string, embedding: number[], metadata: VectorMetadata = {}): Promise<void> {
    this.entries.set(id, { id, embedding: [...embedding], metadata: { ...metadata } });
  }

  async updateEmbedding(id: string, embedding?: number[], metadata?: VectorMetadata): Promise<boolean> {
    const existing = this.entries.get(id);
    if (!existing) {
      return false;
    }
    this.entries.set(id, {
      id,
      embedding: embedding ? [...embedding] : existing.embedding,
      metadata: metadata ? { ...existing.metadata, ...metadata } : existing.metadata,
    });
    return true;
  }

  async deleteEmbedding(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  async getEmbedding(id: string): Promise<VectorEntry | null> {
    const entry = this.entries.get(id);
    return entry ? { id, embedding: [...entry.embedding], metadata: { ...entry.metadata } } : null;
  }

  async searchSimilar(query: number[], topK: number, filter?: VectorMetadata): Promise<VectorSearchResult[]> {
    if (topK <= 0) {
      return [];
    }
    const scored: VectorSearchResult[] = [];
    this.entries.forEach((entry) => {
      if (matchesFilter(entry.metadata, filter)) {
        scored.push({ id: entry.id, score: cosineSimilarity(query, entry.embedding), metadata: { ...entry.metadata } });
      }
    });
    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
