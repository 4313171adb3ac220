import { previewText } from '@voxq/shared';
import { AUDIO_CACHE_CONTROL, DEFAULT_MIN_AUDIO_BYTES, artifactEtag, isValidJobId } from './constants';
import type { ArtifactStore } from './index';
import type { ArtifactEntry, ArtifactMetadata, ArtifactReadResult } from './models/artifact';

/**
 * In-process {@link ArtifactStore} with the same observable behaviour as the filesystem
 * store. Used by tests of the job manager and HTTP handlers, and for throwaway local runs.
 */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly artifacts = new Map<string, { data: Uint8Array; entry: ArtifactEntry }>();

  constructor(readonly minAudioBytes = DEFAULT_MIN_AUDIO_BYTES) {}

  async open(): Promise<void> {}

  async exists(jobId: string): Promise<boolean> {
    return this.artifacts.has(jobId);
  }

  has(jobId: string): boolean {
    return this.artifacts.has(jobId);
  }

  async write(jobId: string, audio: Uint8Array, metadata: ArtifactMetadata): Promise<ArtifactEntry> {
    if (!isValidJobId(jobId)) {
      throw new Error(`Invalid job id: ${jobId}`);
    }
    const entry: ArtifactEntry = {
      jobId,
      createdAt: metadata.createdAt.toISOString(),
      completedAt: metadata.completedAt.toISOString(),
      bytes: audio.byteLength,
      voice: metadata.voice ?? null,
      textPreview: metadata.text != null ? previewText(metadata.text) : null
    };
    this.artifacts.set(jobId, { data: Uint8Array.from(audio), entry });
    return { ...entry };
  }

  async read(jobId: string): Promise<ArtifactReadResult> {
    const artifact = this.artifacts.get(jobId);
    if (!artifact) return { status: 'not_found' };
    if (artifact.data.byteLength < this.minAudioBytes) {
      return { status: 'incomplete', bytes: artifact.data.byteLength };
    }
    return {
      status: 'ok',
      data: Uint8Array.from(artifact.data),
      etag: artifactEtag(jobId),
      cacheControl: AUDIO_CACHE_CONTROL
    };
  }

  async delete(jobId: string): Promise<boolean> {
    return this.artifacts.delete(jobId);
  }

  list(): ArtifactEntry[] {
    return [...this.artifacts.values()].map(({ entry }) => ({ ...entry }));
  }

  count(): number {
    return this.artifacts.size;
  }

  /** Seed an artifact directly, bypassing the worker path (tests, fixtures). */
  put(entry: ArtifactEntry, data: Uint8Array): void {
    this.artifacts.set(entry.jobId, { data: Uint8Array.from(data), entry: { ...entry, bytes: data.byteLength } });
  }
}
