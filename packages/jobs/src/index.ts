// Jobs package entry point: in-memory scheduling of synthesis work

export const JOBS_VERSION = '1.0.0';

export interface JobsInfo {
  name: string;
  version: string;
  type: string;
}

export function getJobsInfo(): JobsInfo {
  return {
    name: 'voxqueue-jobs',
    version: JOBS_VERSION,
    type: 'in-memory-worker-pool'
  };
}

export { JobManager, DEFAULT_CAPACITY_FACTOR, type JobManagerOptions } from './job-manager';
export { JobLister, DEFAULT_LIST_LIMIT, type JobSummary, type JobSource } from './job-lister';
export { BackgroundTaskQueue } from './background-tasks';
export {
  createJobRecord,
  canTransition,
  transition,
  toSnapshot,
  type JobRecord,
  type JobSnapshot
} from './job-record';
export { CapacityExceededError, InvalidTransitionError, EmptyAudioError } from './errors';
export type { SynthesisEngine, SynthesisContext } from './engine';
