import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { APIGatewayProxyResult } from 'aws-lambda';
import { describeError, type Logger } from '@voxq/shared';
import { matchRoute } from './handlers/routes';
import type { TtsEvent, TtsHandler } from './handlers/tts';

/** Largest request body read before answering 413. */
export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Serve a proxy-style handler over node:http.
 */
export function createHttpServer(handler: TtsHandler, logger: Logger): Server {
  return createServer((req, res) => {
    serve(handler, req, res).catch(error => {
      logger.error('Failed to write response', { path: req.url, ...describeError(error) });
      if (!res.headersSent) res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end();
    });
  });
}

async function serve(handler: TtsHandler, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const body = await readBody(req);
  if (body === null) {
    writeResult(res, {
      statusCode: 413,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ error_code: 'PAYLOAD_TOO_LARGE', message: `Request body exceeds ${MAX_BODY_BYTES} bytes` })
    });
    return;
  }
  writeResult(res, await handler(toEvent(req, body)));
}

/**
 * Translate an incoming request into the event shape the handler expects.
 */
export function toEvent(req: IncomingMessage, body: string): TtsEvent {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const match = matchRoute(url.pathname);
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (value !== undefined) headers[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  const query = Object.fromEntries(url.searchParams);

  return {
    httpMethod: (req.method ?? 'GET').toUpperCase(),
    path: url.pathname,
    resource: match?.resource ?? url.pathname,
    pathParameters: match?.pathParameters ?? null,
    queryStringParameters: Object.keys(query).length > 0 ? query : null,
    headers,
    body: body.length > 0 ? body : null,
    isBase64Encoded: false
  };
}

export function writeResult(res: ServerResponse, result: APIGatewayProxyResult): void {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(result.headers ?? {})) {
    headers[key] = String(value);
  }
  const payload = result.isBase64Encoded ? Buffer.from(result.body, 'base64') : Buffer.from(result.body, 'utf8');
  if (result.statusCode === 204 || result.statusCode === 304) {
    res.writeHead(result.statusCode, headers);
    res.end();
    return;
  }
  headers['Content-Length'] = String(payload.byteLength);
  res.writeHead(result.statusCode, headers);
  res.end(payload);
}

/** Reads the whole body; null once it exceeds MAX_BODY_BYTES (the rest is drained, not kept). */
async function readBody(req: IncomingMessage): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.byteLength;
    if (size <= MAX_BODY_BYTES) chunks.push(buffer);
  }
  return size > MAX_BODY_BYTES ? null : Buffer.concat(chunks).toString('utf8');
}
