/**
 * @fileoverview Speech Synthesis Provider Management
 *
 * Error taxonomy and factory for the engines that turn a validated TTS request into mp3
 * bytes. Engines implement the `SynthesisEngine` contract from `@voxq/jobs`, so the worker
 * pool never knows which provider it talks to.
 *
 * Supported Providers:
 * - Internal synthesis service (default) - HTTP endpoint returning audio/mpeg
 * - Amazon Polly - `SynthesizeSpeech` with SSML prosody
 */

import type { SynthesisEngine } from '@voxq/jobs';
import type { Logger } from '@voxq/shared';
import type { ServiceConfig } from '../../config';
import { internalEngine } from './internal';
import { pollyEngine, type PollySender } from './polly';
import { SynthesisError } from './errors';

export interface EngineDependencies {
  /** Polly client override, used by tests */
  pollyClient?: PollySender;
  logger?: Logger;
}

/**
 * Factory for the configured synthesis engine.
 *
 * @throws {SynthesisError} VALIDATION for an unknown provider or missing provider settings
 *
 * @example
 * ```typescript
 * const engine = getSynthesisEngine(loadConfig());
 * const audio = await engine.synthesize(request, { jobId });
 * ```
 */
export function getSynthesisEngine(config: ServiceConfig, deps: EngineDependencies = {}): SynthesisEngine {
  const kind: string = config.engine.kind;
  switch (kind) {
    case 'internal':
      return internalEngine({ url: config.engine.url, timeoutMs: config.engine.timeoutMs, ...logging(deps) });
    case 'polly':
      return pollyEngine({
        region: config.engine.awsRegion,
        engine: config.engine.pollyEngine,
        timeoutMs: config.engine.timeoutMs,
        ...(deps.pollyClient ? { client: deps.pollyClient } : {}),
        ...logging(deps)
      });
    default:
      throw new SynthesisError({ message: `Unknown synthesis engine: ${kind}`, category: 'VALIDATION' });
  }
}

function logging(deps: EngineDependencies): { logger?: Logger } {
  return deps.logger ? { logger: deps.logger } : {};
}

export { SynthesisError, mapStatusToCategory, type SynthesisErrorCategory } from './errors';
export { internalEngine, type InternalEngineOptions } from './internal';
export { pollyEngine, buildSsml, volumeToDecibels, type PollyEngineOptions, type PollySender } from './polly';
export { withTracing, type TraceClient } from './traced';
