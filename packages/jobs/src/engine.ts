import type { TtsRequest } from '@voxq/shared';

export interface SynthesisContext {
  /** Job the audio is produced for, for tracing and logs */
  jobId: string;
}

/**
 * Contract for speech-synthesis providers.
 * Implementations may take seconds and may reject; the job manager records any rejection
 * as a terminal failure and never retries.
 */
export interface SynthesisEngine {
  /** Provider name for identification and logging */
  readonly name: string;
  /** Render the request to encoded audio (mp3) */
  synthesize(request: TtsRequest, context: SynthesisContext): Promise<Uint8Array>;
}
