import { DimensionMismatchError, EmptyIndexError, InvalidChunkError } from '../../../common/errors/rag.errors';
import { ragSettings } from '../../../../test/fakes/settings';
import { VocabularyEmbeddingProvider } from '../../../../test/fakes/vocabulary-embedding.provider';
import { DocumentIndexService } from '../document-index.service';
import { ChunkInput } from '../types';

function input(id: string, embedding: number[], overrides: Partial<ChunkInput> = {}): ChunkInput {
  return { id, text: `text of ${id}`, category: 'General', source: `${id}.json`, embedding, ...overrides };
}

describe('DocumentIndexService', () => {
  let embeddings: VocabularyEmbeddingProvider;
  let index: DocumentIndexService;

  beforeEach(() => {
    embeddings = new VocabularyEmbeddingProvider();
    index = new DocumentIndexService(embeddings, ragSettings());
  });

  describe('search', () => {
    it('returns the top k by non-increasing similarity', async () => {
      await index.bulkInsert([
        input('orthogonal', [0, 1]),
        input('exact', [1, 0]),
        input('close', [0.6, 0.8]),
      ]);

      const results = await index.search([1, 0], 2);

      expect(results.map(({ chunk }) => chunk.id)).toEqual(['exact', 'close']);
      expect(results[0].score).toBeCloseTo(1, 10);
      expect(results[1].score).toBeCloseTo(0.6, 10);
    });

    it('breaks ties by insertion order', async () => {
      await index.bulkInsert([input('first', [1, 0]), input('second', [2, 0])]);
      await index.insert(input('third', [3, 0]));

      const results = await index.search([1, 0], 3);

      expect(results.map(({ chunk }) => chunk.id)).toEqual(['first', 'second', 'third']);
    });

    it('finds a chunk from its own text', async () => {
      const chunk = await index.insert({ text: 'How do I activate my debit card?', category: 'Cards', source: 'faq.json' });

      const [best] = await index.search(await embeddings.embed('How do I activate my debit card?'), 1);

      expect(best.chunk.id).toBe(chunk.id);
      expect(best.score).toBeCloseTo(1, 10);
    });

    it('scores zero-norm chunks as 0', async () => {
      await index.bulkInsert([input('zero', [0, 0]), input('unit', [1, 0])]);

      const results = await index.search([1, 0], 2);

      expect(results.map(({ chunk, score }) => [chunk.id, score])).toEqual([['unit', 1], ['zero', 0]]);
    });

    it('returns nothing for k <= 0', async () => {
      await index.insert(input('a', [1, 0]));

      await expect(index.search([1, 0], 0)).resolves.toEqual([]);
      await expect(index.search([1, 0], -1)).resolves.toEqual([]);
    });

    it('fails on an empty index', async () => {
      await expect(index.search([1, 0], 3)).rejects.toThrow(EmptyIndexError);
    });

    it('rejects a query of the wrong dimension', async () => {
      await index.insert(input('a', [1, 0]));

      await expect(index.search([1, 0, 0], 1)).rejects.toThrow(DimensionMismatchError);
    });
  });

  describe('insert', () => {
    it('assigns ids, embeds text and freezes chunks', async () => {
      const chunk = await index.insert({ text: 'Branches open at 9am.', category: 'Branches', source: 'hours.csv' });

      expect(chunk.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(chunk.embedding).toHaveLength(embeddings.dimension);
      expect(Object.isFrozen(chunk)).toBe(true);
      expect(Object.isFrozen(chunk.embedding)).toBe(true);
      expect(embeddings.batchCalls).toEqual([['Branches open at 9am.']]);
    });

    it('fixes the dimension on the first insert', async () => {
      await index.insert(input('a', [1, 0]));

      await expect(index.insert(input('b', [1, 0, 0]))).rejects.toThrow(new DimensionMismatchError(2, 3).message);
      expect(index.size).toBe(1);
      expect(index.embeddingDimension).toBe(2);
    });

    it('honours a configured dimension', async () => {
      const fixed = new DocumentIndexService(embeddings, ragSettings({ embeddingDimension: 3 }));

      await expect(fixed.insert(input('a', [1, 0]))).rejects.toThrow(DimensionMismatchError);
      expect(fixed.size).toBe(0);
    });

    it('rejects duplicate ids and non-finite values', async () => {
      await index.insert(input('a', [1, 0]));

      await expect(index.insert(input('a', [0, 1]))).rejects.toThrow(InvalidChunkError);
      await expect(index.insert(input('b', [Number.NaN, 1]))).rejects.toThrow(InvalidChunkError);
    });
  });

  describe('bulkInsert', () => {
    it('embeds every missing vector in one provider call', async () => {
      await index.bulkInsert([
        { text: 'Savings accounts earn monthly profit.', category: 'Accounts', source: 'a.json' },
        input('given', new Array<number>(embeddings.dimension).fill(1)),
        { text: 'Current accounts have no minimum balance.', category: 'Accounts', source: 'a.json' },
      ]);

      expect(embeddings.batchCalls).toEqual([[
        'Savings accounts earn monthly profit.',
        'Current accounts have no minimum balance.',
      ]]);
      expect(index.size).toBe(3);
    });

    it('inserts nothing when any input is invalid', async () => {
      await expect(index.bulkInsert([input('ok', [1, 0]), input('blank', [0, 1], { text: '   ' })]))
        .rejects.toThrow(InvalidChunkError);
      await expect(index.bulkInsert([input('two', [1, 0]), input('three', [1, 0, 0])]))
        .rejects.toThrow(DimensionMismatchError);

      expect(index.size).toBe(0);
      expect(index.embeddingDimension).toBeNull();
    });

    it('never exposes a partial batch to concurrent searches', async () => {
      await index.insert(input('seed', [1, 0]));
      const batch = Array.from({ length: 50 }, (_, i) => input(`batch-${i}`, [1, i / 50]));

      const before = Array.from({ length: 10 }, () => index.search([1, 0], 100));
      const insertion = index.bulkInsert(batch);
      const after = Array.from({ length: 10 }, () => index.search([1, 0], 100));

      const [results] = await Promise.all([Promise.all([...before, ...after]), insertion]);

      for (const result of results) {
        expect([1, 51]).toContain(result.length);
      }
      expect(index.size).toBe(51);
    });
  });

  it('reports stats per category', async () => {
    expect(index.stats()).toEqual({ chunkCount: 0, dimension: null, categories: {}, lastUpdatedAt: null });

    await index.bulkInsert([
      input('a', [1, 0], { category: 'Loans' }),
      input('b', [0, 1], { category: 'Loans' }),
      input('c', [1, 1], { category: 'Cards' }),
    ]);

    const stats = index.stats();
    expect(stats.chunkCount).toBe(3);
    expect(stats.dimension).toBe(2);
    expect(stats.categories).toEqual({ Loans: 2, Cards: 1 });
    expect(stats.lastUpdatedAt).not.toBeNull();
  });
});
