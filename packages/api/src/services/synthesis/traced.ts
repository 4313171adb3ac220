import type { SynthesisEngine } from '@voxq/jobs';

/*
 * Structural slice of the Langfuse client used here, so tests can pass a recorder
 * instead of a live client.
 */
export interface SpanHandle {
  end(body?: { output?: unknown; level?: 'DEFAULT' | 'ERROR'; statusMessage?: string }): unknown;
}

export interface TraceHandle {
  span(body: { name: string; input?: unknown; metadata?: unknown }): SpanHandle;
  update(body: { output?: unknown; metadata?: unknown }): unknown;
}

export interface TraceClient {
  trace(body: {
    name: string;
    sessionId?: string;
    input?: unknown;
    metadata?: unknown;
    tags?: string[];
  }): TraceHandle;
}

/**
 * Wraps an engine so every synthesis is recorded as a trace with one span.
 * Without a client the engine is returned unchanged.
 */
export function withTracing(engine: SynthesisEngine, client: TraceClient | null): SynthesisEngine {
  if (!client) return engine;

  return {
    name: engine.name,
    async synthesize(request, context) {
      const trace = client.trace({
        name: 'tts-synthesis',
        sessionId: context.jobId,
        metadata: { engine: engine.name },
        tags: ['tts', engine.name]
      });
      const span = trace.span({
        name: `${engine.name}-synthesize`,
        input: {
          voice: request.voice,
          pitch: request.pitch,
          speed: request.speed,
          volume: request.volume,
          textLength: request.text.length
        }
      });
      const t0 = Date.now();

      try {
        const audio = await engine.synthesize(request, context);
        span.end({ output: { bytes: audio.byteLength }, statusMessage: 'success' });
        trace.update({ output: { status: 'completed', bytes: audio.byteLength }, metadata: { durationMs: Date.now() - t0 } });
        return audio;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.end({ level: 'ERROR', statusMessage: message });
        trace.update({ output: { status: 'failed', error: message }, metadata: { durationMs: Date.now() - t0 } });
        throw error;
      }
    }
  };
}
