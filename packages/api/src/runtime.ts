/**
 * Service wiring: one artifact store, one engine, one worker pool per process.
 *
 * Everything the HTTP handler touches hangs off the returned {@link Runtime}, so tests can
 * build a runtime around in-memory parts and drive the handler without a socket.
 */

import { createLogger, type Logger } from '@voxq/shared';
import { getSharedArtifactStore, type ArtifactStore } from '@voxq/storage';
import { BackgroundTaskQueue, JobLister, JobManager, type SynthesisEngine } from '@voxq/jobs';
import type { ServiceConfig } from './config';
import { flushSpans, initTracing, shutdown } from './instrumentation';
import { getSynthesisEngine, withTracing, type TraceClient } from './services/synthesis';

export interface Runtime {
  config: ServiceConfig;
  logger: Logger;
  store: ArtifactStore;
  engine: SynthesisEngine;
  manager: JobManager;
  lister: JobLister;
  tasks: BackgroundTaskQueue;
}

export interface RuntimeOverrides {
  logger?: Logger;
  store?: ArtifactStore;
  engine?: SynthesisEngine;
  /** Trace client; `null` disables tracing, omitted reads the Langfuse settings */
  tracing?: TraceClient | null;
}

/**
 * Assemble and start the service: opens (and reconciles) the store, then starts the pool.
 */
export async function createRuntime(config: ServiceConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const logger =
    overrides.logger ??
    createLogger({ service: 'voxqueue-api', environment: config.environment }, { level: config.logging.level });

  const store =
    overrides.store ??
    getSharedArtifactStore({
      directory: config.storage.audioDir,
      minAudioBytes: config.storage.minAudioBytes,
      logger
    });
  await store.open();

  const tracing = overrides.tracing !== undefined ? overrides.tracing : initTracing(config.tracing, logger);
  const engine = withTracing(overrides.engine ?? getSynthesisEngine(config, { logger }), tracing);

  const manager = new JobManager({
    engine,
    store,
    maxConcurrent: config.jobs.maxConcurrent,
    capacityFactor: config.jobs.capacityFactor,
    logger
  });
  manager.start();

  return {
    config,
    logger,
    store,
    engine,
    manager,
    lister: new JobLister(manager, store),
    tasks: new BackgroundTaskQueue(logger)
  };
}

/**
 * Stop the pool (in-flight jobs finish, queued ones are dropped with the process),
 * run outstanding background tasks and flush traces.
 */
export async function stopRuntime(runtime: Runtime): Promise<void> {
  const { logger, manager, tasks } = runtime;
  logger.info('Shutting down', { queue_size: manager.queueSize() });
  await manager.stop();
  await tasks.drain();
  await flushSpans(logger);
  await shutdown();
  logger.info('Shutdown complete');
}
