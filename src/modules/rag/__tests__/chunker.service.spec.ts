import { ingestionSettings } from '../../../../test/fakes/settings';
import { ChunkerService } from '../services/chunker.service';

describe('ChunkerService', () => {
  const chunker = new ChunkerService(ingestionSettings());

  it('returns short text as a single trimmed chunk', () => {
    expect(chunker.chunkText('  Debit cards are issued within 7 days.  ')).toEqual([
      { text: 'Debit cards are issued within 7 days.', chunkIndex: 0, totalChunks: 1 },
    ]);
  });

  it('returns nothing for blank text', () => {
    expect(chunker.chunkText(' \n\n ')).toEqual([]);
  });

  it('packs paragraphs with overlap', () => {
    const text = ['a'.repeat(600), 'b'.repeat(600), 'c'.repeat(600)].join('\n\n');

    const chunks = chunker.chunkText(text);

    expect(chunks.map(({ text: chunk }) => chunk.length)).toEqual([600, 651, 651]);
    expect(chunks[1].text).toBe(`${'a'.repeat(50)} ${'b'.repeat(600)}`);
    expect(chunks.map(({ chunkIndex, totalChunks }) => [chunkIndex, totalChunks])).toEqual([[0, 3], [1, 3], [2, 3]]);
  });

  it('splits long paragraphs on sentences', () => {
    const sentence = `${'x'.repeat(39)}.`;
    const text = Array.from({ length: 5 }, () => sentence).join(' ');

    const chunks = chunker.chunkText(text, { chunkSize: 100, minChunkSize: 10, overlap: 0 });

    expect(chunks.map(({ text: chunk }) => chunk.length)).toEqual([81, 81, 40]);
    expect(chunks[0].text).toBe(`${sentence} ${sentence}`);
  });

  it('drops chunks below the minimum size', () => {
    const sentence = `${'x'.repeat(39)}.`;
    const text = Array.from({ length: 5 }, () => sentence).join(' ');

    const chunks = chunker.chunkText(text, { chunkSize: 100, minChunkSize: 50, overlap: 0 });

    expect(chunks.map(({ text: chunk }) => chunk.length)).toEqual([81, 81]);
    expect(chunks[1].totalChunks).toBe(2);
  });
});
