/**
 * Job status enumeration representing the lifecycle of a synthesis job.
 *
 * Lifecycle Flow:
 * 1. Created with status 'queued' on submission
 * 2. Claimed by a worker → status becomes 'processing'
 * 3. Final status: 'completed' (artifact written) or 'failed' (error recorded)
 */
export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

/** Statuses that still occupy a slot in the queue or the worker pool. */
export function isActiveStatus(status: JobStatus): boolean {
  return status === 'queued' || status === 'processing';
}
