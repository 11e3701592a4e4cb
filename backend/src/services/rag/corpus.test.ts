import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeTempDir, removeDir } from '../../test-utils.js';
import { loadCorpus, normalizeText, parseDocument } from './corpus.js';

describe('normalizeText', () => {
  it('strips control characters and collapses whitespace and repeated punctuation', () => {
    expect(normalizeText('  Hello,,  world!!!\n\nNext\u0007line...  ')).toBe('Hello, world! Next line.');
  });
});

describe('parseDocument', () => {
  it('splits pages on form feeds and drops empty pages', () => {
    expect(parseDocument('calendar', 'Page one.\fPage  two.\f   \fPage four.')).toEqual({
      source_id: 'calendar',
      pages: [
        { page: 1, text: 'Page one.' },
        { page: 2, text: 'Page two.' },
        { page: 4, text: 'Page four.' },
      ],
    });
  });
});

describe('loadCorpus', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('loads .txt files in name order', async () => {
    await fs.writeFile(path.join(dir, 'tuition.txt'), 'Tuition is due in August.');
    await fs.writeFile(path.join(dir, 'admissions.txt'), 'Deadline is January 15.\fLate applications are reviewed.');
    await fs.writeFile(path.join(dir, 'notes.md'), '# not part of the corpus');

    expect(await loadCorpus(dir)).toEqual([
      {
        source_id: 'admissions',
        pages: [
          { page: 1, text: 'Deadline is January 15.' },
          { page: 2, text: 'Late applications are reviewed.' },
        ],
      },
      { source_id: 'tuition', pages: [{ page: 1, text: 'Tuition is due in August.' }] },
    ]);
  });

  it('returns an empty corpus for a missing directory', async () => {
    expect(await loadCorpus(path.join(dir, 'missing'))).toEqual([]);
  });
});
