/**
 * Completion metadata recorded for every persisted artifact.
 * Timestamps are ISO 8601 strings so index entries serialise without conversion.
 */
export interface ArtifactEntry {
  jobId: string;
  /** When the job was submitted */
  createdAt: string;
  /** When the artifact was finalised on disk */
  completedAt: string;
  /** Size of the audio file in bytes */
  bytes: number;
  /** Voice used for synthesis, null for artifacts adopted from a directory scan */
  voice: string | null;
  /** Listing preview of the source text, null when unknown */
  textPreview: string | null;
}

/** Metadata supplied by the writer alongside the audio bytes. */
export interface ArtifactMetadata {
  createdAt: Date;
  completedAt: Date;
  voice?: string | null;
  text?: string | null;
}

export type ArtifactReadResult =
  | { status: 'not_found' }
  | { status: 'incomplete'; bytes: number }
  | { status: 'ok'; data: Uint8Array; etag: string; cacheControl: string };
