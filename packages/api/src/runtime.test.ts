import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { silentLogger } from '@voxq/shared';
import { FileArtifactStore, clearCachedStore } from '@voxq/storage';
import { InstantEngine } from '@voxq/jobs/testing';
import { getConfig, type ServiceConfig } from './config';
import { createRuntime, stopRuntime, type Runtime } from './runtime';
import { SynthesisError } from './services/synthesis';
import { ttsRequest } from '@voxq/jobs/testing';

describe('createRuntime', () => {
  let dir: string | null = null;
  let runtime: Runtime | null = null;

  afterEach(async () => {
    if (runtime) await stopRuntime(runtime);
    runtime = null;
    clearCachedStore();
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  async function configIn(): Promise<ServiceConfig> {
    dir = await mkdtemp(path.join(os.tmpdir(), 'voxqueue-runtime-'));
    const base = getConfig('dev');
    return { ...base, storage: { ...base.storage, audioDir: path.join(dir, 'audio') } };
  }

  it('opens the configured store and starts the pool', async () => {
    const config = await configIn();
    runtime = await createRuntime(config, { engine: new InstantEngine(), tracing: null, logger: silentLogger });

    expect(runtime.store).toBeInstanceOf(FileArtifactStore);
    expect(existsSync(config.storage.audioDir)).toBe(true);
    expect(runtime.manager.maxConcurrent).toBe(2);
    expect(runtime.manager.admissionLimit).toBe(4);
  });

  it('writes finished jobs to disk', async () => {
    const config = await configIn();
    runtime = await createRuntime(config, { engine: new InstantEngine(), tracing: null, logger: silentLogger });

    const jobId = runtime.manager.submit(ttsRequest('Hello world'));
    await runtime.manager.onIdle();

    expect(existsSync(path.join(config.storage.audioDir, `${jobId}.mp3`))).toBe(true);
    expect(runtime.lister.list()[0]).toMatchObject({ job_id: jobId, status: 'completed', audio_exists: true });
  });

  it('stops the pool and drains background work on shutdown', async () => {
    const config = await configIn();
    const current = await createRuntime(config, { engine: new InstantEngine(), tracing: null, logger: silentLogger });
    let ran = false;
    current.tasks.enqueue('mark-ran', () => {
      ran = true;
    });

    await stopRuntime(current);

    expect(ran).toBe(true);
    const late = current.manager.submit(ttsRequest('after shutdown'));
    expect(current.manager.jobStatus(late)).toBe('queued');
  });

  it('fails when the configured engine cannot be built', async () => {
    const config = await configIn();
    await expect(createRuntime(config, { tracing: null, logger: silentLogger })).rejects.toBeInstanceOf(SynthesisError);
  });
});
