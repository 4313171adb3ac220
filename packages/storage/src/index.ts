/**
 * Voxqueue - Storage Package Entry Point
 *
 * Durable storage for finished synthesis output. Each completed job owns one audio file
 * (`<directory>/<jobId>.mp3`); the presence of that file is the authoritative signal that
 * the job completed. A small completion index (`index.json`) records per-artifact metadata
 * so listings and text previews survive restarts without re-reading every file.
 *
 * Key Features:
 * - Atomic artifact writes (temp file + rename), so a half-written file is never visible
 * - Minimum-size sanity check distinguishing "incomplete" from "not found"
 * - Index reconciliation against the directory on open (adopts orphans, drops stale entries)
 * - Stable, job-derived cache validators for HTTP caching
 *
 * @see packages/storage/src/repositories/artifactIndex.ts - Completion index persistence
 */

import { randomUUID } from 'crypto';
import { mkdir, readdir, readFile, rename, rm, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { previewText, silentLogger, type Logger } from '@voxq/shared';
import {
  AUDIO_CACHE_CONTROL,
  AUDIO_FILE_EXTENSION,
  DEFAULT_MIN_AUDIO_BYTES,
  INDEX_FILE_NAME,
  artifactEtag,
  isValidJobId
} from './constants';
import type { ArtifactEntry, ArtifactMetadata, ArtifactReadResult } from './models/artifact';
import { ArtifactIndexError, ArtifactIndexRepository, isNotFound } from './repositories/artifactIndex';

export const STORAGE_VERSION = '1.0.0';

export {
  DEFAULT_MIN_AUDIO_BYTES,
  AUDIO_CONTENT_TYPE,
  AUDIO_FILE_EXTENSION,
  AUDIO_CACHE_CONTROL,
  INDEX_FILE_NAME,
  isValidJobId,
  artifactEtag
} from './constants';

export type { ArtifactEntry, ArtifactMetadata, ArtifactReadResult } from './models/artifact';
export { ArtifactIndexError, ArtifactIndexRepository } from './repositories/artifactIndex';

/**
 * Storage interface shared by the job manager (writer), the lister and the HTTP handlers.
 *
 * Design Principles:
 * - `exists` probes the artifact itself and is authoritative for completion
 * - `has`, `list` and `count` answer from the in-memory index without I/O
 * - Unknown or malformed job ids behave as "absent", never as errors
 */
export interface ArtifactStore {
  /** Prepare the backing storage and load/reconcile the index */
  open(): Promise<void>;
  /** Authoritative check that a finished artifact exists */
  exists(jobId: string): Promise<boolean>;
  /** Index membership, no I/O */
  has(jobId: string): boolean;
  /** Persist audio for a job and record its completion metadata */
  write(jobId: string, audio: Uint8Array, metadata: ArtifactMetadata): Promise<ArtifactEntry>;
  /** Read audio bytes with cache metadata, or report why they are unavailable */
  read(jobId: string): Promise<ArtifactReadResult>;
  /** Remove an artifact; resolves false when there was nothing to remove */
  delete(jobId: string): Promise<boolean>;
  /** Completion metadata for every indexed artifact */
  list(): ArtifactEntry[];
  /** Number of indexed artifacts */
  count(): number;
}

/**
 * Configuration for the filesystem-backed store.
 */
export interface FileArtifactStoreConfig {
  /** Directory holding audio files and the index */
  directory: string;
  /** Incomplete-artifact threshold in bytes (default: 100) */
  minAudioBytes?: number;
  logger?: Logger;
}

export class ArtifactStoreError extends Error {
  constructor(message: string, readonly jobId: string) {
    super(message);
    this.name = 'ArtifactStoreError';
  }
}

/**
 * Filesystem implementation of {@link ArtifactStore}.
 *
 * Usage Patterns:
 * - Long-running server: create once via getSharedArtifactStore(), call open() at startup
 * - Tests: point at a temporary directory
 */
export class FileArtifactStore implements ArtifactStore {
  readonly directory: string;
  readonly minAudioBytes: number;
  private readonly index: ArtifactIndexRepository;
  private readonly logger: Logger;

  constructor(config: FileArtifactStoreConfig) {
    this.directory = path.resolve(config.directory);
    this.minAudioBytes = config.minAudioBytes ?? DEFAULT_MIN_AUDIO_BYTES;
    this.logger = (config.logger ?? silentLogger).child({ component: 'artifact-store' });
    this.index = new ArtifactIndexRepository(path.join(this.directory, INDEX_FILE_NAME));
  }

  /**
   * Create the directory if needed, load the index and reconcile it with the files on disk:
   * - leftover `*.tmp` files from interrupted writes are removed
   * - audio files missing from the index are adopted using their mtime
   * - index entries whose file disappeared are dropped
   */
  async open(): Promise<void> {
    await mkdir(this.directory, { recursive: true });

    try {
      await this.index.load();
    } catch (error) {
      if (!(error instanceof ArtifactIndexError)) throw error;
      this.logger.warn('Artifact index unreadable; rebuilding from directory', { error: error.message });
      this.index.clear();
    }

    const names = await readdir(this.directory);
    const present = new Set<string>();
    let changed = false;

    for (const name of names) {
      if (name.endsWith('.tmp')) {
        await rm(path.join(this.directory, name), { force: true });
        continue;
      }
      const jobId = jobIdFromFileName(name);
      if (!jobId) continue;
      present.add(jobId);
      if (this.index.has(jobId)) continue;

      const info = await stat(path.join(this.directory, name));
      const at = info.mtime.toISOString();
      this.index.set({ jobId, createdAt: at, completedAt: at, bytes: info.size, voice: null, textPreview: null });
      changed = true;
    }

    for (const entry of this.index.values()) {
      if (!present.has(entry.jobId)) {
        this.index.delete(entry.jobId);
        changed = true;
      }
    }

    if (changed) await this.index.persist();
    this.logger.info('Artifact store opened', { directory: this.directory, artifacts: this.index.size });
  }

  async exists(jobId: string): Promise<boolean> {
    if (!isValidJobId(jobId)) return false;
    try {
      const info = await stat(this.pathFor(jobId));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  has(jobId: string): boolean {
    return this.index.has(jobId);
  }

  async write(jobId: string, audio: Uint8Array, metadata: ArtifactMetadata): Promise<ArtifactEntry> {
    if (!isValidJobId(jobId)) {
      throw new ArtifactStoreError(`Invalid job id: ${jobId}`, jobId);
    }
    const finalPath = this.pathFor(jobId);
    const tmpPath = `${finalPath}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmpPath, audio);
      await rename(tmpPath, finalPath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }

    const entry: ArtifactEntry = {
      jobId,
      createdAt: metadata.createdAt.toISOString(),
      completedAt: metadata.completedAt.toISOString(),
      bytes: audio.byteLength,
      voice: metadata.voice ?? null,
      textPreview: metadata.text != null ? previewText(metadata.text) : null
    };
    this.index.set(entry);
    try {
      await this.index.persist();
    } catch (error) {
      // No artifact without an index entry: a failed write leaves neither behind
      this.index.delete(jobId);
      await rm(finalPath, { force: true });
      throw error;
    }
    return { ...entry };
  }

  async read(jobId: string): Promise<ArtifactReadResult> {
    if (!isValidJobId(jobId)) return { status: 'not_found' };
    let data: Buffer;
    try {
      data = await readFile(this.pathFor(jobId));
    } catch (error) {
      if (isNotFound(error)) return { status: 'not_found' };
      throw error;
    }
    if (data.byteLength < this.minAudioBytes) {
      return { status: 'incomplete', bytes: data.byteLength };
    }
    return { status: 'ok', data, etag: artifactEtag(jobId), cacheControl: AUDIO_CACHE_CONTROL };
  }

  async delete(jobId: string): Promise<boolean> {
    if (!isValidJobId(jobId)) return false;
    let removed = true;
    try {
      await unlink(this.pathFor(jobId));
    } catch (error) {
      if (!isNotFound(error)) throw error;
      removed = false;
    }
    if (this.index.delete(jobId)) {
      await this.index.persist();
    }
    return removed;
  }

  list(): ArtifactEntry[] {
    return this.index.values();
  }

  count(): number {
    return this.index.size;
  }

  private pathFor(jobId: string): string {
    return path.join(this.directory, `${jobId}${AUDIO_FILE_EXTENSION}`);
  }
}

function jobIdFromFileName(name: string): string | null {
  if (!name.endsWith(AUDIO_FILE_EXTENSION)) return null;
  const jobId = name.slice(0, -AUDIO_FILE_EXTENSION.length);
  return isValidJobId(jobId) ? jobId : null;
}

export { MemoryArtifactStore } from './memory-store';
export { getSharedArtifactStore, clearCachedStore } from './shared-store';
