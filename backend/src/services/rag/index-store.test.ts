import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { IndexRecord } from '../../types/rag.js';
import { makeTempDir, removeDir } from '../../test-utils.js';
import { IndexStore } from './index-store.js';
import { VectorIndex } from './vector-index.js';

const RECORDS: IndexRecord[] = [
  {
    id: 'housing#0',
    source_id: 'housing',
    page: 1,
    sequence: 0,
    compressed_text: 'Dorm move-in Aug 20.',
    original_text: 'Résidence move-in begins August 20; bring “photo ID”.\nQuiet hours start at 22:00.',
    compression: { ratio: 0.4, outcome: 'compressed' },
  },
  {
    id: 'housing#1',
    source_id: 'housing',
    page: null,
    sequence: 1,
    compressed_text: 'Short.',
    original_text: 'Short.',
    compression: { ratio: 1, outcome: 'skipped' },
  },
];

function makeIndex(buildId: string, values = [0.25, -1.5, 3, 0.1, 0, 7]): VectorIndex {
  return new VectorIndex(
    {
      build_id: buildId,
      built_at: '2026-03-01T12:00:00.000Z',
      embedding_space: 'test:fixed',
      dimension: 3,
      metric: 'cosine',
      record_count: RECORDS.length,
    },
    RECORDS,
    new Float32Array(values),
  );
}

describe('IndexStore', () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  it('loads null when nothing has been published', async () => {
    const store = new IndexStore(root);
    expect(await store.currentBuildId()).toBeNull();
    expect(await store.load()).toBeNull();
  });

  it('round-trips records, manifest and vectors', async () => {
    const index = makeIndex('build-a');
    await new IndexStore(root).publish(index);

    const loaded = await new IndexStore(root).load();

    expect(loaded).not.toBeNull();
    expect(loaded?.manifest).toEqual(index.manifest);
    expect(loaded?.records).toEqual(RECORDS);
    expect(loaded?.records[0].original_text).toBe(RECORDS[0].original_text);
    expect(Array.from(loaded?.vectors ?? [])).toEqual(Array.from(index.vectors));
  });

  it('points CURRENT at the newest build', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    await store.publish(makeIndex('build-b', [1, 2, 3, 4, 5, 6]));

    expect(await store.currentBuildId()).toBe('build-b');
    expect((await store.load())?.manifest.build_id).toBe('build-b');
    expect(Array.from((await store.loadBuild('build-a'))?.vectors ?? [])).toEqual(Array.from(makeIndex('build-a').vectors));
  });

  it('treats a build with a missing vector file as no index', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    await fs.rm(path.join(root, 'builds', 'build-a', 'vectors.bin'));

    expect(await store.load()).toBeNull();
  });

  it('treats a build with a missing records file as no index', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    await fs.rm(path.join(root, 'builds', 'build-a', 'records.json'));

    expect(await store.load()).toBeNull();
  });

  it('treats tampered vectors as no index', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    const file = path.join(root, 'builds', 'build-a', 'vectors.bin');
    const bytes = await fs.readFile(file);
    bytes[0] ^= 0xff;
    await fs.writeFile(file, bytes);

    expect(await store.load()).toBeNull();
  });

  it('treats truncated vectors as no index', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    const file = path.join(root, 'builds', 'build-a', 'vectors.bin');
    await fs.truncate(file, 8);

    expect(await store.load()).toBeNull();
  });

  it('treats unparseable records as no index', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    await fs.writeFile(path.join(root, 'builds', 'build-a', 'records.json'), '{"format_version": 1,');

    expect(await store.load()).toBeNull();
  });

  it('keeps the live build and at most keepBuilds builds', async () => {
    const store = new IndexStore(root, 2);
    await store.publish(makeIndex('build-a'));
    await store.publish(makeIndex('build-b'));
    await store.publish(makeIndex('build-c'));

    const builds = await fs.readdir(path.join(root, 'builds'));
    expect(builds).toHaveLength(2);
    expect(builds).toContain('build-c');
  });

  it('keeps the previously live build when keepBuilds is 1', async () => {
    const store = new IndexStore(root, 1);
    await store.publish(makeIndex('build-a'));
    await store.publish(makeIndex('build-b'));

    expect((await fs.readdir(path.join(root, 'builds'))).sort()).toEqual(['build-a', 'build-b']);
    expect(Array.from((await store.loadBuild('build-a'))?.vectors ?? [])).toEqual(Array.from(makeIndex('build-a').vectors));

    await store.publish(makeIndex('build-c'));
    expect((await fs.readdir(path.join(root, 'builds'))).sort()).toEqual(['build-b', 'build-c']);
  });

  it('publishes even when pruning fails', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    vi.spyOn(fs, 'readdir').mockRejectedValueOnce(new Error('EACCES: permission denied'));

    await expect(store.publish(makeIndex('build-b'))).resolves.toBeUndefined();

    expect((await store.load())?.manifest.build_id).toBe('build-b');
    expect(console.warn).toHaveBeenCalledWith(
      '[IndexStore] Pruning after publish of build-b failed: EACCES: permission denied'
    );
  });

  it('removes staging leftovers from an interrupted publish', async () => {
    const store = new IndexStore(root);
    await store.publish(makeIndex('build-a'));
    await fs.mkdir(path.join(root, 'builds', 'build-x.staging'));

    expect(await store.prune()).toEqual(['build-x.staging']);
    expect(await fs.readdir(path.join(root, 'builds'))).toEqual(['build-a']);
    expect((await store.load())?.manifest.build_id).toBe('build-a');
  });
});
