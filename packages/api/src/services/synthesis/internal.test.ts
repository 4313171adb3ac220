import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { internalEngine } from './internal';
import { SynthesisError } from './errors';
import type { TtsRequest } from '@voxq/shared';

const request: TtsRequest = { text: 'Hello world', voice: 'Joanna', pitch: 5, speed: 1.25, volume: 0.8 };
const ENDPOINT = 'https://tts.example.com/v1/synthesize';

function mkAudioResponse(bytes: number, init: ResponseInit & { headers?: Record<string, string> } = { status: 200 }) {
  const headers = new Headers({ 'content-type': 'audio/mpeg', ...(init.headers ?? {}) });
  return new Response(new Uint8Array(bytes).fill(7), { ...init, headers });
}

function mkJsonResponse(body: unknown, init: ResponseInit = { status: 200 }) {
  return new Response(JSON.stringify(body), { ...init, headers: { 'content-type': 'application/json' } });
}

describe('Internal synthesis engine', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  it('posts the request and returns the audio body', async () => {
    fetchMock.mockResolvedValue(mkAudioResponse(320, { status: 200, headers: { 'x-request-id': 'req-1' } }));

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });
    const audio = await engine.synthesize(request, { jobId: 'job-1' });

    expect(engine.name).toBe('internal');
    expect(audio.byteLength).toBe(320);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      text: 'Hello world',
      voice: 'Joanna',
      pitch: 5,
      speed: 1.25,
      volume: 0.8,
      job_id: 'job-1'
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('maps http 403 to AUTH', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 403 }));

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({
      category: 'AUTH',
      statusCode: 403,
      provider: 'internal'
    });
  });

  it('maps http 429 to QUOTA and 503 to SERVER', async () => {
    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });

    fetchMock.mockResolvedValueOnce(new Response('slow down', { status: 429 }));
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({
      category: 'QUOTA',
      message: 'internal http error 429: slow down'
    });

    fetchMock.mockResolvedValueOnce(new Response(null, { status: 503 }));
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({ category: 'SERVER' });
  });

  it('maps http 400 to VALIDATION', async () => {
    fetchMock.mockResolvedValue(mkJsonResponse({ detail: 'unknown voice' }, { status: 400 }));

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({ category: 'VALIDATION' });
  });

  it('rejects empty audio as FAILED_STATUS', async () => {
    fetchMock.mockResolvedValue(mkAudioResponse(0));

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({
      category: 'FAILED_STATUS',
      message: 'internal engine returned empty audio'
    });
  });

  it('rejects a JSON body as FAILED_STATUS', async () => {
    fetchMock.mockResolvedValue(mkJsonResponse({ status: 'error' }));

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({ category: 'FAILED_STATUS' });
  });

  it('reports an aborted request as TIMEOUT', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    fetchMock.mockRejectedValue(timeout);

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 50 });
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({
      category: 'TIMEOUT',
      message: 'internal engine timed out after 50ms'
    });
  });

  it('reports network failures as SERVER', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const engine = internalEngine({ url: ENDPOINT, timeoutMs: 1000 });
    await expect(engine.synthesize(request, { jobId: 'job-1' })).rejects.toMatchObject({
      category: 'SERVER',
      message: 'internal engine unreachable: fetch failed',
      causeMessage: 'fetch failed'
    });
  });

  it('requires an endpoint', () => {
    expect(() => internalEngine({ url: null, timeoutMs: 1000 })).toThrow(SynthesisError);
    expect(() => internalEngine({ url: '  ', timeoutMs: 1000 })).toThrow(/TTS_ENGINE_URL/);
  });
});
