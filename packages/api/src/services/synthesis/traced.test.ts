import { describe, it, expect, vi } from 'vitest';
import type { SynthesisEngine } from '@voxq/jobs';
import type { TtsRequest } from '@voxq/shared';
import { withTracing, type SpanHandle, type TraceClient, type TraceHandle } from './traced';

const request: TtsRequest = { text: 'Hello world', voice: 'Joanna', pitch: 0, speed: 1, volume: 1 };

function recorder() {
  const span: SpanHandle = { end: vi.fn() };
  const trace: TraceHandle = { span: vi.fn(() => span), update: vi.fn() };
  const client: TraceClient = { trace: vi.fn(() => trace) };
  return { client, trace, span };
}

function engineReturning(result: Uint8Array | Error): SynthesisEngine {
  return {
    name: 'fake',
    synthesize: async () => {
      if (result instanceof Error) throw result;
      return result;
    }
  };
}

describe('withTracing', () => {
  it('returns the engine unchanged without a client', () => {
    const engine = engineReturning(new Uint8Array(10));
    expect(withTracing(engine, null)).toBe(engine);
  });

  it('records a trace and span around a successful synthesis', async () => {
    const { client, trace, span } = recorder();
    const traced = withTracing(engineReturning(new Uint8Array(300)), client);

    const audio = await traced.synthesize(request, { jobId: 'job-1' });

    expect(audio.byteLength).toBe(300);
    expect(traced.name).toBe('fake');
    expect(client.trace).toHaveBeenCalledWith({
      name: 'tts-synthesis',
      sessionId: 'job-1',
      metadata: { engine: 'fake' },
      tags: ['tts', 'fake']
    });
    expect(trace.span).toHaveBeenCalledWith({
      name: 'fake-synthesize',
      input: { voice: 'Joanna', pitch: 0, speed: 1, volume: 1, textLength: 11 }
    });
    expect(span.end).toHaveBeenCalledWith({ output: { bytes: 300 }, statusMessage: 'success' });
  });

  it('marks the span as an error and rethrows', async () => {
    const { client, trace, span } = recorder();
    const traced = withTracing(engineReturning(new Error('engine down')), client);

    await expect(traced.synthesize(request, { jobId: 'job-1' })).rejects.toThrow('engine down');
    expect(span.end).toHaveBeenCalledWith({ level: 'ERROR', statusMessage: 'engine down' });
    expect(trace.update).toHaveBeenCalledWith(
      expect.objectContaining({ output: { status: 'failed', error: 'engine down' } })
    );
  });
});
