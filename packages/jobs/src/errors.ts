import type { JobStatus } from '@voxq/shared';

/**
 * Raised by admission control when the number of queued and processing jobs already
 * exceeds the configured limit. Nothing was enqueued; the caller should retry later.
 */
export class CapacityExceededError extends Error {
  readonly code = 'CAPACITY_EXCEEDED';

  constructor(
    readonly queueSize: number,
    readonly limit: number
  ) {
    super('Server is currently at capacity. Please try again later.');
    this.name = 'CapacityExceededError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      queueSize: this.queueSize,
      limit: this.limit
    } satisfies Record<string, unknown>;
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus
  ) {
    super(`Job ${jobId} cannot move from '${from}' to '${to}'`);
    this.name = 'InvalidTransitionError';
  }
}

export class EmptyAudioError extends Error {
  constructor(readonly jobId: string) {
    super(`Synthesis returned no audio for job ${jobId}`);
    this.name = 'EmptyAudioError';
  }
}
