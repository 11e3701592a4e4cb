/**
 * Corpus Loader
 *
 * Reads pre-extracted document text from the corpus directory. Each
 * `<name>.txt` file is one source document; pages are separated by form
 * feeds (as emitted by pdftotext). Pages are numbered from 1.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { SourceDocument } from '../../types/rag.js';

const PAGE_BREAK = '\f';

/**
 * Clean extracted text: strip control characters, collapse whitespace and
 * runs of repeated punctuation.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/[\u0000-\u0008\u000b-\u001f\u007f]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/([.,!?;:])\1+/g, '$1')
    .trim();
}

export function parseDocument(sourceId: string, raw: string): SourceDocument {
  const pages = raw
    .split(PAGE_BREAK)
    .map((text, i) => ({ page: i + 1, text: normalizeText(text) }))
    .filter((page) => page.text.length > 0);
  return { source_id: sourceId, pages };
}

export async function loadCorpus(corpusDir: string): Promise<SourceDocument[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(corpusDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.warn(`[Corpus] Directory ${corpusDir} not found; corpus is empty`);
      return [];
    }
    throw err;
  }

  const files = entries.filter((name) => name.toLowerCase().endsWith('.txt')).sort();
  const documents: SourceDocument[] = [];

  for (const file of files) {
    const raw = await fs.readFile(path.join(corpusDir, file), 'utf-8');
    documents.push(parseDocument(path.basename(file, path.extname(file)), raw));
  }

  console.log(`[Corpus] Loaded ${documents.length} document(s) from ${corpusDir}`);
  return documents;
}
