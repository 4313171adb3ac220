/**
 * Merged job listing.
 *
 * Combines finished artifacts (from the store's completion index) with the manager's
 * in-memory records into one newest-first view. A job that has an artifact is listed once,
 * as completed, even while its in-memory record lingers.
 */

import { previewText, type JobStatus } from '@voxq/shared';
import type { ArtifactStore } from '@voxq/storage';
import type { JobSnapshot } from './job-record';

export const DEFAULT_LIST_LIMIT = 50;

/** Listing row; snake_case because it is returned as-is by the HTTP API. */
export interface JobSummary {
  job_id: string;
  status: JobStatus;
  /** ISO 8601 creation time */
  created_at: string;
  audio_exists: boolean;
  /** Text preview (100 characters, '...' when truncated) */
  text: string;
}

export interface JobSource {
  listJobs(): JobSnapshot[];
}

export class JobLister {
  constructor(
    private readonly jobs: JobSource,
    private readonly store: Pick<ArtifactStore, 'list'>
  ) {}

  /**
   * @param limit - maximum rows returned; non-positive or non-finite values return nothing
   */
  list(limit = DEFAULT_LIST_LIMIT): JobSummary[] {
    if (!Number.isFinite(limit) || limit <= 0) return [];

    const completed = this.store.list().map(entry => ({
      createdAt: timestampOf(entry.createdAt),
      summary: {
        job_id: entry.jobId,
        status: 'completed' as const,
        created_at: entry.createdAt,
        audio_exists: true,
        text: entry.textPreview ?? ''
      }
    }));
    const withArtifact = new Set(completed.map(row => row.summary.job_id));

    const active = this.jobs
      .listJobs()
      .filter(job => !withArtifact.has(job.id))
      .map(job => ({
        createdAt: job.createdAt.getTime(),
        summary: {
          job_id: job.id,
          status: job.status,
          created_at: job.createdAt.toISOString(),
          audio_exists: false,
          text: previewText(job.request.text)
        }
      }));

    // Array#sort is stable: on equal timestamps completed rows stay ahead of active ones.
    return [...completed, ...active]
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, Math.floor(limit))
      .map(row => row.summary);
  }
}

function timestampOf(iso: string): number {
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? 0 : parsed;
}
