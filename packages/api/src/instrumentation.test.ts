import { describe, it, expect, vi, beforeEach } from 'vitest';

const { flushAsync, shutdownAsync, LangfuseMock } = vi.hoisted(() => {
  const flushAsync = vi.fn(async () => {});
  const shutdownAsync = vi.fn(async () => {});
  // Constructed with `new`, so a function rather than an arrow
  const LangfuseMock = vi.fn(function () {
    return { flushAsync, shutdownAsync };
  });
  return { flushAsync, shutdownAsync, LangfuseMock };
});

vi.mock('langfuse', () => ({ Langfuse: LangfuseMock }));

// Import after mocks
import { createLogger } from '@voxq/shared';
import { flushSpans, getLangfuse, initTracing, shutdown } from './instrumentation';

const disabled = { publicKey: null, secretKey: null, host: null };
const enabled = { publicKey: 'pk-test', secretKey: 'test-secret', host: 'http://localhost:3000' };

describe('instrumentation', () => {
  beforeEach(async () => {
    await shutdown();
    vi.clearAllMocks();
  });

  it('stays disabled without both keys', () => {
    const lines: string[] = [];
    const logger = createLogger({}, { sink: line => lines.push(line) });

    expect(initTracing({ ...disabled, publicKey: 'pk-test' }, logger)).toBeNull();
    expect(getLangfuse()).toBeNull();
    expect(LangfuseMock).not.toHaveBeenCalled();
    expect(JSON.parse(lines[0] ?? '{}').level).toBe('warn');
  });

  it('creates a client with the configured host', () => {
    const client = initTracing(enabled);

    expect(client).not.toBeNull();
    expect(getLangfuse()).toBe(client);
    expect(LangfuseMock).toHaveBeenCalledWith({
      publicKey: 'pk-test',
      secretKey: 'test-secret',
      baseUrl: 'http://localhost:3000',
      flushAt: 20,
      flushInterval: 1000,
      requestTimeout: 5000
    });
  });

  it('omits baseUrl when no host is set', () => {
    initTracing({ ...enabled, host: null });
    expect(LangfuseMock).toHaveBeenCalledWith(expect.not.objectContaining({ baseUrl: expect.anything() }));
  });

  it('flushes and shuts down the client', async () => {
    initTracing(enabled);

    await flushSpans();
    await shutdown();

    expect(flushAsync).toHaveBeenCalledTimes(1);
    expect(shutdownAsync).toHaveBeenCalledTimes(1);
    expect(getLangfuse()).toBeNull();
  });

  it('logs flush failures instead of throwing', async () => {
    const lines: string[] = [];
    const logger = createLogger({}, { sink: line => lines.push(line) });
    initTracing(enabled);
    flushAsync.mockRejectedValueOnce(new Error('network down'));

    await expect(flushSpans(logger)).resolves.toBeUndefined();
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'error',
      message: 'Failed to flush spans to Langfuse',
      error: 'network down'
    });
  });

  it('does nothing when tracing is disabled', async () => {
    initTracing(disabled);
    await flushSpans();
    await shutdown();
    expect(flushAsync).not.toHaveBeenCalled();
  });
});
