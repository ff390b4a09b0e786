import { InMemoryVectorStore } from '../InMemoryVectorStore';
import { cosineSimilarity, matchesFilter } from '../VectorStore';

describe('cosineSimilarity', () => {
  it('scores direction, not magnitude', () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([1, 1], [1, 0])).toBeCloseTo(Math.SQRT1_2);
  });

  it('scores zero vectors and length mismatches as 0', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

describe('matchesFilter', () => {
  it('requires every filter field to be equal', () => {
    expect(matchesFilter({ jobId: 'j1', depth: 1 }, { jobId: 'j1' })).toBe(true);
    expect(matchesFilter({ jobId: 'j1', depth: 1 }, { jobId: 'j1', depth: 2 })).toBe(false);
    expect(matchesFilter({ jobId: 'j1' }, undefined)).toBe(true);
  });
});

describe('InMemoryVectorStore', () => {
  async function seeded(): Promise<InMemoryVectorStore> {
    const store = new InMemoryVectorStore();
    await store.storeEmbedding('a', [1, 0], { jobId: 'j1' });
    await store.storeEmbedding('b', [0, 1], { jobId: 'j1' });
    await store.storeEmbedding('c', [2, 0], { jobId: 'j2' });
    await store.storeEmbedding('d', [1, 1], { jobId: 'j2' });
    return store;
  }

  it('ranks by similarity and breaks ties by insertion order', async () => {
    const store = await seeded();
    const results = await store.searchSimilar([1, 0], 3);

    expect(results.map((result) => result.id)).toEqual(['a', 'c', 'd']);
    expect(results[0]).toEqual({ id: 'a', score: 1, metadata: { jobId: 'j1' } });
  });

  it('keeps the insertion position when an id is stored again', async () => {
    const store = await seeded();
    await store.storeEmbedding('a', [1, 0], { jobId: 'j1', title: 'Again' });

    const results = await store.searchSimilar([1, 0], 2);
    expect(results.map((result) => result.id)).toEqual(['a', 'c']);
    expect(results[0].metadata).toEqual({ jobId: 'j1', title: 'Again' });
    expect(await store.count()).toBe(4);
  });

  it('applies metadata filters before ranking', async () => {
    const store = await seeded();
    const results = await store.searchSimilar([0, 1], 10, { jobId: 'j2' });

    expect(results.map((result) => result.id)).toEqual(['d', 'c']);
  });

  it('returns nothing for a non-positive topK', async () => {
    const store = await seeded();
    expect(await store.searchSimilar([1, 0], 0)).toEqual([]);
  });

  it('updates and deletes entries', async () => {
    const store = await seeded();

    expect(await store.updateEmbedding('b', undefined, { title: 'B' })).toBe(true);
    expect(await store.getEmbedding('b')).toEqual({ id: 'b', embedding: [0, 1], metadata: { jobId: 'j1', title: 'B' } });
    expect(await store.updateEmbedding('missing', [1, 0])).toBe(false);

    expect(await store.deleteEmbedding('b')).toBe(true);
    expect(await store.deleteEmbedding('b')).toBe(false);
    expect(await store.getEmbedding('b')).toBeNull();

    await store.clear();
    expect(await store.count()).toBe(0);
  });
});
