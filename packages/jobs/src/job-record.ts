/**
 * In-memory job record and its status state machine.
 *
 * Allowed transitions:
 *   queued → processing → completed
 *                       ↘ failed
 * `completed` and `failed` are terminal. Only the job manager mutates records, and once a
 * worker has claimed a job only that worker does.
 */

import type { JobStatus, TtsRequest } from '@voxq/shared';
import { InvalidTransitionError } from './errors';

export interface JobRecord {
  readonly id: string;
  readonly request: TtsRequest;
  status: JobStatus;
  readonly createdAt: Date;
  updatedAt: Date;
  /** Set when a worker claims the job */
  startedAt: Date | null;
  /** Set on reaching a terminal status */
  completedAt: Date | null;
  /** Failure reason for 'failed' jobs */
  errorMessage: string | null;
}

/** Detached, read-only copy handed out to callers outside the manager. */
export type JobSnapshot = Readonly<JobRecord>;

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: []
};

export function createJobRecord(id: string, request: TtsRequest, createdAt: Date): JobRecord {
  return {
    id,
    request,
    status: 'queued',
    createdAt,
    updatedAt: createdAt,
    startedAt: null,
    completedAt: null,
    errorMessage: null
  };
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move `record` to `to`, stamping the matching timestamps.
 *
 * @throws {InvalidTransitionError} when the move is not in the transition table
 */
export function transition(record: JobRecord, to: JobStatus, at: Date, errorMessage?: string): void {
  if (!canTransition(record.status, to)) {
    throw new InvalidTransitionError(record.id, record.status, to);
  }
  record.status = to;
  record.updatedAt = at;
  if (to === 'processing') record.startedAt = at;
  if (to === 'completed' || to === 'failed') record.completedAt = at;
  if (to === 'failed') record.errorMessage = errorMessage ?? 'Synthesis failed';
}

export function toSnapshot(record: JobRecord): JobSnapshot {
  return Object.freeze({ ...record });
}
