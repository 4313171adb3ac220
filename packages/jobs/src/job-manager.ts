/**
 * @fileoverview Job Manager
 *
 * Owns every in-flight synthesis job: the FIFO queue of pending work, a fixed pool of
 * workers, the table of job records and admission control.
 *
 * Key Responsibilities:
 * - Non-blocking submission with soft backpressure (reject once active jobs exceed
 *   `maxConcurrent * capacityFactor`)
 * - Strict submission-order scheduling across `maxConcurrent` worker slots
 * - Status transitions queued → processing → completed/failed, single writer per job
 * - Artifact hand-off to the store once synthesis succeeds
 *
 * Concurrency model:
 * The table and queue are owned by this instance and only mutated in synchronous sections
 * (submission, claim, write-back), so the event loop serialises every access. Workers hold
 * nothing while awaiting the engine or the store.
 *
 * Records are kept after completion until `cleanup()` is called.
 */

import { randomUUID } from 'crypto';
import { describeError, isActiveStatus, silentLogger, type JobStatus, type Logger, type TtsRequest } from '@voxq/shared';
import type { ArtifactStore } from '@voxq/storage';
import type { SynthesisEngine } from './engine';
import { CapacityExceededError, EmptyAudioError } from './errors';
import { createJobRecord, toSnapshot, transition, type JobRecord, type JobSnapshot } from './job-record';

/** Admission multiplier: accept bursts up to this many times the worker count. */
export const DEFAULT_CAPACITY_FACTOR = 2;

export interface JobManagerOptions {
  engine: SynthesisEngine;
  store: ArtifactStore;
  /** Number of worker slots */
  maxConcurrent: number;
  /** Admission multiplier (default: 2) */
  capacityFactor?: number;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

type WorkerWake = (record: JobRecord | null) => void;

export class JobManager {
  readonly maxConcurrent: number;
  readonly capacityFactor: number;

  private readonly engine: SynthesisEngine;
  private readonly store: ArtifactStore;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  private readonly jobs = new Map<string, JobRecord>();
  private readonly pending: string[] = [];
  private readonly idleWorkers: WorkerWake[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private workers: Promise<void>[] = [];
  private stopping = false;

  constructor(options: JobManagerOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${options.maxConcurrent}`);
    }
    const capacityFactor = options.capacityFactor ?? DEFAULT_CAPACITY_FACTOR;
    if (!Number.isFinite(capacityFactor) || capacityFactor <= 0) {
      throw new RangeError(`capacityFactor must be a positive number, got ${capacityFactor}`);
    }
    this.maxConcurrent = options.maxConcurrent;
    this.capacityFactor = capacityFactor;
    this.engine = options.engine;
    this.store = options.store;
    this.logger = (options.logger ?? silentLogger).child({ component: 'job-manager' });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /** Active-job count above which submissions are refused. */
  get admissionLimit(): number {
    return this.maxConcurrent * this.capacityFactor;
  }

  /**
   * Queue a synthesis request and return its job id without waiting for a worker.
   *
   * @throws {CapacityExceededError} when `queueSize()` already exceeds the admission limit;
   *   nothing is enqueued in that case
   */
  submit(request: TtsRequest): string {
    const queueSize = this.queueSize();
    if (queueSize > this.admissionLimit) {
      this.logger.warn('Submission rejected: capacity exceeded', { queue_size: queueSize, limit: this.admissionLimit });
      throw new CapacityExceededError(queueSize, this.admissionLimit);
    }

    const id = this.generateId();
    if (this.jobs.has(id)) {
      throw new Error(`Generated job id ${id} is already in use`);
    }
    const record = createJobRecord(id, request, this.now());
    this.jobs.set(id, record);
    this.pending.push(id);
    this.logger.info('Job queued', {
      jobId: id,
      queue_size: queueSize + 1,
      text_length: request.text.length,
      voice: request.voice
    });

    this.dispatch();
    return id;
  }

  /** Jobs that are queued or processing. */
  queueSize(): number {
    let count = 0;
    for (const record of this.jobs.values()) {
      if (isActiveStatus(record.status)) count++;
    }
    return count;
  }

  /** In-memory status, or null when the id is unknown to this process. */
  jobStatus(jobId: string): JobStatus | null {
    return this.jobs.get(jobId)?.status ?? null;
  }

  getJob(jobId: string): JobSnapshot | null {
    const record = this.jobs.get(jobId);
    return record ? toSnapshot(record) : null;
  }

  hasJob(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  listJobs(): JobSnapshot[] {
    return [...this.jobs.values()].map(toSnapshot);
  }

  /** Every record held in memory, terminal ones included. */
  memoryJobsCount(): number {
    return this.jobs.size;
  }

  /**
   * Drop the in-memory record for `jobId`. A job that was still queued is also removed
   * from the queue; a processing job runs to completion but is no longer tracked.
   * Calling it for an unknown id is a no-op.
   *
   * @returns whether a record was removed
   */
  cleanup(jobId: string): boolean {
    const record = this.jobs.get(jobId);
    if (!record) return false;

    this.jobs.delete(jobId);
    if (record.status === 'queued') {
      const position = this.pending.indexOf(jobId);
      if (position >= 0) this.pending.splice(position, 1);
    }
    this.logger.debug('Job record cleaned up', { jobId, status: record.status });
    this.notifyIfIdle();
    return true;
  }

  /** Spawn the worker pool. Calling it again while running is a no-op. */
  start(): void {
    if (this.workers.length > 0) return;
    this.stopping = false;
    for (let slot = 0; slot < this.maxConcurrent; slot++) {
      this.workers.push(this.runWorker(slot));
    }
    this.logger.info('Job manager started', { max_concurrent: this.maxConcurrent, limit: this.admissionLimit });
  }

  /**
   * Stop claiming new jobs and wait for in-flight ones to finish.
   * Jobs still queued stay queued and are picked up again after `start()`.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    for (const wake of this.idleWorkers.splice(0)) wake(null);
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info('Job manager stopped', { queued: this.pending.length });
  }

  /**
   * Resolves once nothing is queued or processing.
   * Never resolves while jobs are queued and the pool is stopped.
   */
  onIdle(): Promise<void> {
    if (this.queueSize() === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private async runWorker(slot: number): Promise<void> {
    const log = this.logger.child({ worker: slot });
    for (;;) {
      const record = this.stopping ? null : (this.claimNext() ?? (await this.waitForWork()));
      if (!record) return;
      try {
        await this.execute(record, log);
      } catch (error) {
        log.error('Worker error while finalising job', { jobId: record.id, ...describeError(error) });
      }
      this.notifyIfIdle();
    }
  }

  private waitForWork(): Promise<JobRecord | null> {
    return new Promise(resolve => this.idleWorkers.push(resolve));
  }

  /** Hand queued jobs to idle workers, oldest first. */
  private dispatch(): void {
    while (this.idleWorkers.length > 0 && !this.stopping) {
      const record = this.claimNext();
      if (!record) return;
      const wake = this.idleWorkers.shift();
      if (wake) wake(record);
    }
  }

  /** Pop the oldest queued job and mark it processing. */
  private claimNext(): JobRecord | null {
    while (this.pending.length > 0) {
      const id = this.pending.shift();
      const record = id === undefined ? undefined : this.jobs.get(id);
      if (record && record.status === 'queued') {
        transition(record, 'processing', this.now());
        return record;
      }
    }
    return null;
  }

  private async execute(record: JobRecord, log: Logger): Promise<void> {
    const jobLog = log.child({ jobId: record.id });
    const startedAt = record.startedAt ?? this.now();
    jobLog.info('Job claimed', { queue_wait_ms: startedAt.getTime() - record.createdAt.getTime() });

    try {
      const audio = await this.engine.synthesize(record.request, { jobId: record.id });
      if (audio.byteLength === 0) {
        throw new EmptyAudioError(record.id);
      }
      await this.store.write(record.id, audio, {
        createdAt: record.createdAt,
        completedAt: this.now(),
        voice: record.request.voice,
        text: record.request.text
      });
      transition(record, 'completed', this.now());
      jobLog.info('Job completed', {
        bytes: audio.byteLength,
        engine: this.engine.name,
        duration_ms: this.now().getTime() - startedAt.getTime()
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      transition(record, 'failed', this.now(), message);
      jobLog.error('Job failed', {
        engine: this.engine.name,
        duration_ms: this.now().getTime() - startedAt.getTime(),
        ...describeError(error)
      });
    }
  }

  private notifyIfIdle(): void {
    if (this.idleWaiters.length === 0 || this.queueSize() > 0) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
