/**
 * Index Store
 *
 * Persists VectorIndex builds as immutable directories and publishes them by
 * atomically replacing a CURRENT pointer file:
 *
 *   <root>/CURRENT                          build id of the live index
 *   <root>/builds/<build_id>/vectors.bin    Float32 LE, record_count * dimension
 *   <root>/builds/<build_id>/records.json   manifest, vector checksum, records
 *
 * A build that is missing either artifact, or whose artifacts disagree, loads
 * as "no index".
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CompressionOutcome, IndexManifest, IndexRecord } from '../../types/rag.js';
import { COMPRESSION_OUTCOME_VALUES, DISTANCE_METRIC_VALUES } from '../../types/rag.js';
import { errorMessage } from '../../utils/errors.js';
import { VectorIndex } from './vector-index.js';

const CURRENT_FILE = 'CURRENT';
const BUILDS_DIR = 'builds';
const VECTORS_FILE = 'vectors.bin';
const RECORDS_FILE = 'records.json';
const STAGING_SUFFIX = '.staging';
const FORMAT_VERSION = 1;

interface RecordsFile {
  format_version: number;
  manifest: IndexManifest;
  vectors: {
    file: string;
    byte_length: number;
    sha256: string;
  };
  records: IndexRecord[];
}

function encodeVectors(vectors: Float32Array): Buffer {
  const buffer = Buffer.alloc(vectors.length * 4);
  vectors.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

function decodeVectors(buffer: Buffer): Float32Array {
  const vectors = new Float32Array(buffer.length / 4);
  for (let i = 0; i < vectors.length; i++) {
    vectors[i] = buffer.readFloatLE(i * 4);
  }
  return vectors;
}

function sha256(buffer: Buffer): string {
  return createHash('sha256').update(buffer).digest('hex');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutcome(value: unknown): value is CompressionOutcome {
  return COMPRESSION_OUTCOME_VALUES.some((outcome) => outcome === value);
}

function parseManifest(value: unknown): IndexManifest | null {
  if (!isRecord(value)) return null;
  const { build_id, built_at, embedding_space, dimension, metric, record_count } = value;
  const parsedMetric = DISTANCE_METRIC_VALUES.find((m) => m === metric);
  if (
    typeof build_id !== 'string' ||
    typeof built_at !== 'string' ||
    typeof embedding_space !== 'string' ||
    typeof dimension !== 'number' || !Number.isInteger(dimension) || dimension < 0 ||
    typeof record_count !== 'number' || !Number.isInteger(record_count) || record_count < 0 ||
    !parsedMetric
  ) {
    return null;
  }
  return { build_id, built_at, embedding_space, dimension, metric: parsedMetric, record_count };
}

function parseIndexRecord(value: unknown): IndexRecord | null {
  if (!isRecord(value) || !isRecord(value.compression)) return null;
  const { id, source_id, page, sequence, compressed_text, original_text } = value;
  const { ratio, outcome } = value.compression;
  if (
    typeof id !== 'string' ||
    typeof source_id !== 'string' ||
    (page !== null && typeof page !== 'number') ||
    typeof sequence !== 'number' ||
    typeof compressed_text !== 'string' ||
    typeof original_text !== 'string' ||
    typeof ratio !== 'number' ||
    !isOutcome(outcome)
  ) {
    return null;
  }
  return Object.freeze({
    id,
    source_id,
    page,
    sequence,
    compressed_text,
    original_text,
    compression: Object.freeze({ ratio, outcome }),
  });
}

function parseRecordsFile(value: unknown): RecordsFile | null {
  if (!isRecord(value) || value.format_version !== FORMAT_VERSION) return null;
  const manifest = parseManifest(value.manifest);
  const vectors = value.vectors;
  if (!manifest || !isRecord(vectors) || !Array.isArray(value.records)) return null;
  if (
    typeof vectors.file !== 'string' ||
    typeof vectors.byte_length !== 'number' ||
    typeof vectors.sha256 !== 'string'
  ) {
    return null;
  }

  const records: IndexRecord[] = [];
  for (const raw of value.records) {
    const record = parseIndexRecord(raw);
    if (!record) return null;
    records.push(record);
  }

  return {
    format_version: FORMAT_VERSION,
    manifest,
    vectors: { file: vectors.file, byte_length: vectors.byte_length, sha256: vectors.sha256 },
    records,
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export class IndexStore {
  constructor(
    private readonly root: string,
    private readonly keepBuilds = 2,
  ) {}

  private buildsDir(): string {
    return path.join(this.root, BUILDS_DIR);
  }

  private buildDir(buildId: string): string {
    return path.join(this.buildsDir(), buildId);
  }

  /**
   * Build id named by CURRENT, or null when nothing has been published.
   */
  async currentBuildId(): Promise<string | null> {
    const pointer = await readIfExists(path.join(this.root, CURRENT_FILE));
    const buildId = pointer?.toString('utf-8').trim();
    return buildId ? buildId : null;
  }

  /**
   * Write the index to a staging directory, move it into place and swap
   * CURRENT to point at it.
   */
  async publish(index: VectorIndex): Promise<void> {
    const { manifest } = index;
    const buildId = manifest.build_id;
    const stagingDir = this.buildDir(`${buildId}${STAGING_SUFFIX}`);
    const finalDir = this.buildDir(buildId);

    const vectorBytes = encodeVectors(index.vectors);
    const recordsFile: RecordsFile = {
      format_version: FORMAT_VERSION,
      manifest: { ...manifest },
      vectors: {
        file: VECTORS_FILE,
        byte_length: vectorBytes.length,
        sha256: sha256(vectorBytes),
      },
      records: [...index.records],
    };

    await fs.rm(stagingDir, { recursive: true, force: true });
    await fs.mkdir(stagingDir, { recursive: true });
    await fs.writeFile(path.join(stagingDir, VECTORS_FILE), vectorBytes);
    await fs.writeFile(path.join(stagingDir, RECORDS_FILE), JSON.stringify(recordsFile));
    await fs.rename(stagingDir, finalDir);

    const previous = await this.currentBuildId();
    const tmpPointer = path.join(this.root, `${CURRENT_FILE}.tmp`);
    await fs.writeFile(tmpPointer, `${buildId}\n`);
    await fs.rename(tmpPointer, path.join(this.root, CURRENT_FILE));

    console.log(`[IndexStore] Published build ${buildId} (${manifest.record_count} records) to ${this.root}`);

    // The new build is already live. The previous one may still be open by a
    // reader that resolved CURRENT before the swap.
    try {
      await this.prune(previous ? [previous] : []);
    } catch (err) {
      console.warn(`[IndexStore] Pruning after publish of ${buildId} failed: ${errorMessage(err)}`);
    }
  }

  /**
   * Load the live index. Returns null when there is no complete, consistent build.
   */
  async load(): Promise<VectorIndex | null> {
    const buildId = await this.currentBuildId();
    if (!buildId) return null;
    return this.loadBuild(buildId);
  }

  async loadBuild(buildId: string): Promise<VectorIndex | null> {
    const dir = this.buildDir(buildId);
    const [recordsRaw, vectorBytes] = await Promise.all([
      readIfExists(path.join(dir, RECORDS_FILE)),
      readIfExists(path.join(dir, VECTORS_FILE)),
    ]);

    if (!recordsRaw || !vectorBytes) {
      console.warn(`[IndexStore] Build ${buildId} is incomplete; treating as no index`);
      return null;
    }

    let parsed: RecordsFile | null;
    try {
      parsed = parseRecordsFile(JSON.parse(recordsRaw.toString('utf-8')));
    } catch (err) {
      console.warn(`[IndexStore] Build ${buildId} has unreadable records: ${errorMessage(err)}`);
      return null;
    }

    const problem = !parsed
      ? 'malformed records file'
      : parsed.manifest.build_id !== buildId
        ? `records belong to build ${parsed.manifest.build_id}`
        : parsed.records.length !== parsed.manifest.record_count
          ? 'record count does not match manifest'
          : vectorBytes.length !== parsed.vectors.byte_length ||
              vectorBytes.length !== parsed.manifest.record_count * parsed.manifest.dimension * 4
            ? 'vector blob size does not match manifest'
            : sha256(vectorBytes) !== parsed.vectors.sha256
              ? 'vector checksum mismatch'
              : null;

    if (!parsed || problem) {
      console.warn(`[IndexStore] Build ${buildId} is inconsistent (${problem}); treating as no index`);
      return null;
    }

    return new VectorIndex(parsed.manifest, parsed.records, decodeVectors(vectorBytes));
  }

  /**
   * Remove staging leftovers and all but the newest `keepBuilds` builds.
   * The live build and any build named in `protect` are always kept.
   */
  async prune(protect: readonly string[] = []): Promise<string[]> {
    const current = await this.currentBuildId();
    let entries: string[];
    try {
      entries = await fs.readdir(this.buildsDir());
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const builds = await Promise.all(
      entries.map(async (name) => ({
        name,
        mtimeMs: (await fs.stat(path.join(this.buildsDir(), name))).mtimeMs,
      }))
    );

    const staging = builds.filter((b) => b.name.endsWith(STAGING_SUFFIX));
    const kept = builds.filter((b) => b.name === current || protect.includes(b.name));
    const complete = builds
      .filter((b) => !b.name.endsWith(STAGING_SUFFIX) && !kept.includes(b))
      .sort((a, b) => b.mtimeMs - a.mtimeMs);

    const retained = Math.max(0, this.keepBuilds - kept.length);
    const doomed = [...staging, ...complete.slice(retained)].map((b) => b.name);

    for (const name of doomed) {
      await fs.rm(path.join(this.buildsDir(), name), { recursive: true, force: true });
    }
    if (doomed.length > 0) {
      console.log(`[IndexStore] Pruned ${doomed.length} old build(s)`);
    }
    return doomed;
  }
}
