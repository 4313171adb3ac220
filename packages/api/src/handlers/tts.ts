/**
 * @fileoverview TTS HTTP Handler
 *
 * Proxy-style handler for the text-to-speech job API. Takes API Gateway shaped events so it
 * can run behind the node:http adapter in `server.ts` or any proxy integration unchanged.
 *
 * API Endpoints:
 * - POST /tts - Validate and queue a synthesis job
 * - GET /tts/jobs - Newest-first listing of finished and in-flight jobs
 * - GET /tts/status/{job_id} - Job status (artifact presence wins over memory)
 * - GET /tts/audio/{job_id} - Download the mp3 with cache validators
 * - DELETE /tts/audio/{job_id} - Remove the artifact, then drop the record in the background
 * - GET /health - Counters for load balancers
 *
 * Every response carries CORS headers; OPTIONS preflights are answered for any path.
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { describeError, parseTtsRequest, type JobStatus } from '@voxq/shared';
import { AUDIO_CONTENT_TYPE, isValidJobId } from '@voxq/storage';
import { CapacityExceededError, DEFAULT_LIST_LIMIT } from '@voxq/jobs';
import { API_VERSION } from '../index';
import type { Runtime } from '../runtime';
import { allowedMethods } from './routes';

export type TtsEvent = Pick<
  APIGatewayProxyEvent,
  'httpMethod' | 'path' | 'resource' | 'pathParameters' | 'queryStringParameters' | 'headers' | 'body' | 'isBase64Encoded'
>;

export type TtsHandler = (event: TtsEvent) => Promise<APIGatewayProxyResult>;

/** Seconds a rejected client should wait before resubmitting. */
export const RETRY_AFTER_SECONDS = 5;

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET,POST,DELETE,OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type,If-None-Match,Authorization'
};

const STATUS_MESSAGES: Record<JobStatus, string> = {
  completed: 'Audio is ready',
  processing: 'Audio is being processed',
  queued: 'Audio is queued for processing',
  failed: 'Audio generation failed'
};

/**
 * Builds the handler around a runtime.
 *
 * @example
 * ```typescript
 * const handler = createTtsHandler(await createRuntime(loadConfig()));
 * const res = await handler({ httpMethod: 'GET', resource: '/health', path: '/health', ... });
 * ```
 */
export function createTtsHandler(runtime: Runtime): TtsHandler {
  const { manager, store, lister, tasks } = runtime;

  return async event => {
    const start = Date.now();
    const log = runtime.logger.child({
      method: event.httpMethod,
      resource: event.resource,
      path: event.path
    });

    log.info('Incoming request', { user_agent: header(event, 'user-agent') ?? 'unknown' });

    let statusCode = 500;
    try {
      const response = await route();
      statusCode = response.statusCode;
      return response;
    } catch (error) {
      log.error('Unhandled error in tts handler', describeError(error));
      return json(
        500,
        errorBody('INTERNAL_SERVER_ERROR', 'An error occurred processing your request', {
          detail: error instanceof Error ? error.message : String(error)
        })
      );
    } finally {
      log.info('Request completed', { status_code: statusCode, duration_ms: Date.now() - start });
    }

    async function route(): Promise<APIGatewayProxyResult> {
      const { httpMethod, resource } = event;

      if (httpMethod === 'OPTIONS') {
        return { statusCode: 204, headers: { ...CORS_HEADERS }, body: '' };
      }

      const methods = allowedMethods(resource);
      if (methods.length === 0) {
        return json(404, errorBody('NOT_FOUND', 'Endpoint not found'));
      }
      if (!methods.includes(httpMethod)) {
        return json(405, errorBody('METHOD_NOT_ALLOWED', `HTTP ${httpMethod} not supported on ${resource}`));
      }

      switch (resource) {
        case '/health':
          return health();
        case '/tts':
          return submit();
        case '/tts/jobs':
          return listJobs();
      }

      const jobId = event.pathParameters?.['job_id'];
      if (!jobId || !isValidJobId(jobId)) {
        return json(
          400,
          errorBody('VALIDATION_ERROR', 'job_id must be 1-128 characters of letters, digits, "-" or "_"')
        );
      }

      if (resource === '/tts/status/{job_id}') return status(jobId);
      return httpMethod === 'DELETE' ? deleteAudio(jobId) : getAudio(jobId);
    }

    async function submit(): Promise<APIGatewayProxyResult> {
      let payload: unknown;
      try {
        payload = event.body ? JSON.parse(decodeBody(event)) : {};
      } catch {
        return json(400, errorBody('VALIDATION_ERROR', 'Request body must be valid JSON'));
      }

      const parsed = parseTtsRequest(payload);
      if (!parsed.success) {
        return json(400, errorBody('VALIDATION_ERROR', parsed.message, { issues: parsed.issues }));
      }

      let jobId: string;
      try {
        jobId = manager.submit(parsed.data);
      } catch (error) {
        if (error instanceof CapacityExceededError) {
          log.warn('Capacity exceeded', { queue_size: error.queueSize, limit: error.limit });
          return json(
            503,
            errorBody('CAPACITY_EXCEEDED', error.message, { queue_size: error.queueSize }),
            { 'Retry-After': String(RETRY_AFTER_SECONDS) }
          );
        }
        throw error;
      }

      const job = manager.getJob(jobId);
      log.info('Job created', { jobId, content_length: parsed.data.text.length });
      return json(200, {
        job_id: jobId,
        status: 'queued',
        created_at: (job?.createdAt ?? new Date()).toISOString()
      });
    }

    async function listJobs(): Promise<APIGatewayProxyResult> {
      const raw = event.queryStringParameters?.['limit'];
      let limit = DEFAULT_LIST_LIMIT;
      if (raw !== undefined) {
        const parsed = Number(raw);
        if (!Number.isInteger(parsed) || parsed < 1 || parsed > DEFAULT_LIST_LIMIT) {
          return json(400, errorBody('VALIDATION_ERROR', `limit must be an integer between 1 and ${DEFAULT_LIST_LIMIT}`));
        }
        limit = parsed;
      }
      return json(200, lister.list(limit));
    }

    async function status(jobId: string): Promise<APIGatewayProxyResult> {
      // A finished artifact wins over whatever the in-memory record says.
      if (await store.exists(jobId)) {
        return json(200, { job_id: jobId, status: 'completed', message: STATUS_MESSAGES.completed });
      }

      const job = manager.getJob(jobId);
      if (!job) {
        return json(404, errorBody('NOT_FOUND', `Job ${jobId} not found`, { job_id: jobId }));
      }
      return json(200, {
        job_id: jobId,
        status: job.status,
        message: STATUS_MESSAGES[job.status],
        ...(job.status === 'failed' ? { error: job.errorMessage ?? 'Synthesis failed' } : {})
      });
    }

    async function getAudio(jobId: string): Promise<APIGatewayProxyResult> {
      const artifact = await store.read(jobId);
      if (artifact.status === 'not_found') {
        return json(
          404,
          errorBody('NOT_FOUND', `Audio for job ${jobId} not found or not ready yet`, { job_id: jobId })
        );
      }
      if (artifact.status === 'incomplete') {
        log.warn('Incomplete artifact', { jobId, bytes: artifact.bytes });
        return json(
          422,
          errorBody('AUDIO_INCOMPLETE', `Audio file appears to be incomplete for job ${jobId}`, { job_id: jobId })
        );
      }

      const cacheHeaders = { 'Cache-Control': artifact.cacheControl, ETag: artifact.etag };
      if (etagMatches(header(event, 'if-none-match'), artifact.etag)) {
        return { statusCode: 304, headers: { ...CORS_HEADERS, ...cacheHeaders }, body: '' };
      }

      log.info('Audio retrieval', { jobId, bytes: artifact.data.byteLength });
      return {
        statusCode: 200,
        headers: { ...CORS_HEADERS, ...cacheHeaders, 'Content-Type': AUDIO_CONTENT_TYPE },
        body: Buffer.from(artifact.data).toString('base64'),
        isBase64Encoded: true
      };
    }

    async function deleteAudio(jobId: string): Promise<APIGatewayProxyResult> {
      if (!(await store.delete(jobId))) {
        return json(404, errorBody('NOT_FOUND', `Audio for job ${jobId} not found`, { job_id: jobId }));
      }

      if (manager.hasJob(jobId)) {
        tasks.enqueue(`cleanup ${jobId}`, () => {
          manager.cleanup(jobId);
        });
      }
      log.info('Audio deleted', { jobId });
      return json(200, { message: `Audio for job ${jobId} deleted successfully` });
    }

    async function health(): Promise<APIGatewayProxyResult> {
      const timestamp = new Date().toISOString();
      try {
        return json(200, {
          status: 'healthy',
          version: API_VERSION,
          timestamp,
          audio_files_count: store.count(),
          active_jobs_size: manager.queueSize(),
          memory_jobs_count: manager.memoryJobsCount(),
          message: 'System is operational'
        });
      } catch (error) {
        log.error('Health check error', describeError(error));
        return json(200, {
          status: 'unhealthy',
          version: API_VERSION,
          timestamp,
          audio_files_count: 0,
          active_jobs_size: 0,
          memory_jobs_count: 0,
          message: `Error: ${error instanceof Error ? error.message : String(error)}`
        });
      }
    }
  };
}

/**
 * Standard JSON response with CORS headers.
 *
 * @example
 * ```typescript
 * return json(404, errorBody('NOT_FOUND', 'Job not found'));
 * ```
 */
export function json(statusCode: number, body: unknown, headers: Record<string, string> = {}): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
      ...headers
    },
    body: JSON.stringify(body)
  };
}

/**
 * Standard error body: machine-readable code, human message, optional context fields.
 */
export function errorBody(error_code: string, message: string, extra: Record<string, unknown> = {}) {
  return { error_code, message, ...extra };
}

function header(event: TtsEvent, name: string): string | undefined {
  for (const [key, value] of Object.entries(event.headers ?? {})) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}

/** Weak comparison against an If-None-Match list (`*`, `W/` prefixes, comma-separated tags). */
function etagMatches(ifNoneMatch: string | undefined, etag: string): boolean {
  if (!ifNoneMatch) return false;
  return ifNoneMatch.split(',').some(candidate => {
    const tag = candidate.trim();
    return tag === '*' || tag.replace(/^W\//, '') === etag;
  });
}

function decodeBody(event: TtsEvent): string {
  const body = event.body ?? '';
  return event.isBase64Encoded ? Buffer.from(body, 'base64').toString('utf8') : body;
}
