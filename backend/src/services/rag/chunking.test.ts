import { describe, expect, it } from 'vitest';
import { chunkDocument, chunkText, reconstructText } from './chunking.js';
import { InvalidConfiguration } from '../../utils/errors.js';

const ADMISSIONS = 'Admission requires a transcript and two recommendation letters. Deadline is January 15.';

describe('chunkText', () => {
  it('splits the admissions text into two overlapping windows', () => {
    const chunks = [...chunkText(ADMISSIONS, 'admissions', { chunk_size: 50, overlap: 10 })];

    expect(chunks).toEqual([
      { text: 'Admission requires a transcript and two recommenda', source_id: 'admissions', page: null, sequence: 0 },
      { text: 'recommendation letters. Deadline is January 15.', source_id: 'admissions', page: null, sequence: 1 },
    ]);
    expect(chunks[0].text.slice(-10)).toBe(chunks[1].text.slice(0, 10));
  });

  it('reconstructs the original text once overlaps are removed', () => {
    const texts = [
      ADMISSIONS,
      'a',
      'exactly ten',
      'x'.repeat(123),
      'The library opens at 8am.\nIt closes at 10pm on weekdays and 6pm on weekends.',
    ];
    for (const text of texts) {
      for (const [size, overlap] of [[50, 10], [7, 3], [11, 1], [2, 1]]) {
        const chunks = [...chunkText(text, 'doc', { chunk_size: size, overlap })];
        expect(reconstructText(chunks, overlap)).toBe(text);
        for (const chunk of chunks) {
          expect(chunk.text.length).toBeLessThanOrEqual(size);
        }
      }
    }
  });

  it('shares exactly `overlap` characters between consecutive chunks', () => {
    const text = 'abcdefghijklmnopqrstuvwxyz';
    const chunks = [...chunkText(text, 'alphabet', { chunk_size: 10, overlap: 4 })];

    expect(chunks.map((c) => c.text)).toEqual(['abcdefghij', 'ghijklmnop', 'mnopqrstuv', 'stuvwxyz']);
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i].text.slice(0, 4)).toBe(chunks[i - 1].text.slice(-4));
    }
  });

  it('never splits a surrogate pair across a window edge', () => {
    const text = 'ab😀cd😀ef';
    const chunks = [...chunkText(text, 'emoji', { chunk_size: 3, overlap: 1 })];

    expect(chunks.map((c) => c.text)).toEqual(['ab😀', '😀cd', 'd😀e', 'ef']);
    expect(reconstructText(chunks, 1)).toBe(text);
  });

  it('yields a single chunk when the text fits', () => {
    const chunks = [...chunkText('short', 'doc', { chunk_size: 50, overlap: 10 })];
    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe('short');
  });

  it('yields nothing for empty text', () => {
    expect([...chunkText('', 'doc', { chunk_size: 50, overlap: 10 })]).toEqual([]);
  });

  it('is restartable', () => {
    const chunks = chunkText(ADMISSIONS, 'admissions', { chunk_size: 50, overlap: 10 });
    expect([...chunks]).toEqual([...chunks]);
  });

  it('is lazy', () => {
    const iterator = chunkText('x'.repeat(1000), 'doc', { chunk_size: 10, overlap: 5 })[Symbol.iterator]();
    expect(iterator.next().value?.sequence).toBe(0);
    expect(iterator.next().value?.sequence).toBe(1);
  });

  it.each([
    [0, 0],
    [-5, 1],
    [10, 10],
    [10, 12],
    [10, 0],
    [10.5, 2],
  ])('rejects chunk_size=%s overlap=%s eagerly', (chunk_size, overlap) => {
    expect(() => chunkText('text', 'doc', { chunk_size, overlap })).toThrow(InvalidConfiguration);
  });
});

describe('chunkDocument', () => {
  it('chunks pages separately and numbers sequences across the document', () => {
    const chunks = chunkDocument(
      {
        source_id: 'handbook',
        pages: [
          { page: 1, text: 'abcdefghijkl' },
          { page: 2, text: 'mnop' },
        ],
      },
      { chunk_size: 8, overlap: 2 },
    );

    expect(chunks).toEqual([
      { text: 'abcdefgh', source_id: 'handbook', page: 1, sequence: 0 },
      { text: 'ghijkl', source_id: 'handbook', page: 1, sequence: 1 },
      { text: 'mnop', source_id: 'handbook', page: 2, sequence: 2 },
    ]);
  });
});
