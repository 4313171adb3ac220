import type { SynthesisEngine } from '@voxq/jobs';
import { silentLogger, type Logger } from '@voxq/shared';
import { SynthesisError, mapStatusToCategory } from './errors';

export interface InternalEngineOptions {
  /** Endpoint accepting the synthesis request as JSON */
  url: string | null;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Engine backed by a self-hosted synthesis service.
 *
 * The service receives `{ text, voice, pitch, speed, volume, job_id }` and answers with the
 * encoded audio as the response body.
 */
export function internalEngine(options: InternalEngineOptions): SynthesisEngine {
  const endpoint = options.url?.trim();
  if (!endpoint) {
    throw new SynthesisError({ message: 'Missing TTS_ENGINE_URL', category: 'VALIDATION', provider: 'internal' });
  }

  const name = 'internal';
  const log = (options.logger ?? silentLogger).child({ provider: name });

  return {
    name,
    async synthesize(request, context) {
      const start = Date.now();
      const payload = {
        text: request.text,
        voice: request.voice,
        pitch: request.pitch,
        speed: request.speed,
        volume: request.volume,
        job_id: context.jobId
      };

      let response: Response;
      try {
        response = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            accept: 'audio/mpeg'
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(options.timeoutMs)
        });
      } catch (error) {
        if (isAbort(error)) {
          throw new SynthesisError({
            message: `internal engine timed out after ${options.timeoutMs}ms`,
            category: 'TIMEOUT',
            provider: name,
            cause: error
          });
        }
        throw new SynthesisError({
          message: `internal engine unreachable: ${error instanceof Error ? error.message : String(error)}`,
          category: 'SERVER',
          provider: name,
          cause: error
        });
      }

      const requestId = response.headers.get('x-request-id');

      if (!response.ok) {
        const bodyText = await safeText(response);
        throw new SynthesisError({
          message: `internal http error ${response.status}${bodyText ? `: ${bodyText}` : ''}`,
          category: mapStatusToCategory(response.status),
          statusCode: response.status,
          provider: name,
          requestId
        });
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('json')) {
        const bodyText = await safeText(response);
        throw new SynthesisError({
          message: `internal engine returned ${contentType} instead of audio${bodyText ? `: ${bodyText}` : ''}`,
          category: 'FAILED_STATUS',
          provider: name,
          requestId
        });
      }

      const audio = new Uint8Array(await response.arrayBuffer());
      if (audio.byteLength === 0) {
        throw new SynthesisError({
          message: 'internal engine returned empty audio',
          category: 'FAILED_STATUS',
          provider: name,
          requestId
        });
      }

      log.debug('Synthesis finished', {
        jobId: context.jobId,
        bytes: audio.byteLength,
        duration_ms: Date.now() - start,
        requestId
      });
      return audio;
    }
  };
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

async function safeText(res: Response): Promise<string | null> {
  try {
    const text = await res.text();
    return text.slice(0, 500) || null;
  } catch {
    return null;
  }
}
