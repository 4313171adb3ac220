import { createHash } from 'crypto';

/** Artifacts smaller than this are reported as incomplete. */
export const DEFAULT_MIN_AUDIO_BYTES = 100;

export const AUDIO_CONTENT_TYPE = 'audio/mpeg';
export const AUDIO_FILE_EXTENSION = '.mp3';
export const AUDIO_CACHE_CONTROL = 'public, max-age=86400';
export const INDEX_FILE_NAME = 'index.json';

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidJobId(jobId: string): boolean {
  return JOB_ID_PATTERN.test(jobId);
}

/**
 * Cache validator for an artifact. Derived from the job id only, so repeated fetches of
 * the same job always produce the same tag.
 */
export function artifactEtag(jobId: string): string {
  return `"${createHash('sha256').update(jobId).digest('hex').slice(0, 32)}"`;
}
