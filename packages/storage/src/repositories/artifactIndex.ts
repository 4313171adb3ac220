/**
 * Voxqueue - Artifact Index Repository
 *
 * Keeps the completion index (`jobId → ArtifactEntry`) in memory and mirrors it to a JSON
 * file next to the audio files. Lookups never touch the disk; every mutation is followed by
 * `persist()`, which rewrites the file through a temp file + rename so a crash leaves either
 * the old or the new index, never a torn one.
 *
 * @see packages/storage/src/index.ts - FileArtifactStore, the only writer
 */

import { randomUUID } from 'crypto';
import { readFile, rename, rm, writeFile } from 'fs/promises';
import { z } from 'zod';
import { ArtifactEntry } from '../models/artifact';

const ArtifactEntrySchema = z.object({
  jobId: z.string().min(1),
  createdAt: z.string(),
  completedAt: z.string(),
  bytes: z.number().int().nonnegative(),
  voice: z.string().nullable(),
  textPreview: z.string().nullable()
});

const IndexFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(ArtifactEntrySchema)
});

export class ArtifactIndexError extends Error {
  constructor(message: string, readonly filePath: string) {
    super(message);
    this.name = 'ArtifactIndexError';
  }
}

export class ArtifactIndexRepository {
  private readonly entries = new Map<string, ArtifactEntry>();
  private persistChain: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Replace the in-memory index with the file's contents.
   * A missing file yields an empty index; an unreadable one throws {@link ArtifactIndexError}.
   *
   * @returns number of entries loaded
   */
  async load(): Promise<number> {
    this.entries.clear();
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new ArtifactIndexError('Artifact index is not valid JSON', this.filePath);
    }
    const parsed = IndexFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ArtifactIndexError(`Artifact index has an unexpected shape: ${parsed.error.message}`, this.filePath);
    }
    for (const entry of parsed.data.entries) {
      this.entries.set(entry.jobId, entry);
    }
    return this.entries.size;
  }

  get(jobId: string): ArtifactEntry | null {
    return this.entries.get(jobId) ?? null;
  }

  has(jobId: string): boolean {
    return this.entries.has(jobId);
  }

  set(entry: ArtifactEntry): void {
    this.entries.set(entry.jobId, { ...entry });
  }

  delete(jobId: string): boolean {
    return this.entries.delete(jobId);
  }

  clear(): void {
    this.entries.clear();
  }

  values(): ArtifactEntry[] {
    return [...this.entries.values()].map(entry => ({ ...entry }));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Write the current index to disk. Calls are serialised; each write captures the
   * state at the moment it runs, so the last call always leaves the latest state on disk.
   */
  persist(): Promise<void> {
    const next = this.persistChain.then(() => this.writeSnapshot());
    // Keep the chain usable after a failed write; the caller still sees the rejection.
    this.persistChain = next.catch(() => undefined);
    return next;
  }

  private async writeSnapshot(): Promise<void> {
    const body = JSON.stringify({ version: 1, entries: this.values() }, null, 2);
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmpPath, body, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
