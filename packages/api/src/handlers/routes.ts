/**
 * Route table shared by the handler (method checks) and the HTTP adapter
 * (path → resource resolution).
 */

export type Resource = '/health' | '/tts' | '/tts/jobs' | '/tts/status/{job_id}' | '/tts/audio/{job_id}';

interface RouteDefinition {
  resource: Resource;
  pattern: RegExp;
  methods: readonly string[];
}

const ROUTES: readonly RouteDefinition[] = [
  { resource: '/health', pattern: /^\/health\/?$/, methods: ['GET'] },
  { resource: '/tts', pattern: /^\/tts\/?$/, methods: ['POST'] },
  { resource: '/tts/jobs', pattern: /^\/tts\/jobs\/?$/, methods: ['GET'] },
  { resource: '/tts/status/{job_id}', pattern: /^\/tts\/status\/([^/]+)\/?$/, methods: ['GET'] },
  { resource: '/tts/audio/{job_id}', pattern: /^\/tts\/audio\/([^/]+)\/?$/, methods: ['GET', 'DELETE'] }
];

export interface RouteMatch {
  resource: Resource;
  pathParameters: { job_id: string } | null;
}

export function matchRoute(path: string): RouteMatch | null {
  for (const route of ROUTES) {
    const match = route.pattern.exec(path);
    if (!match) continue;
    const raw = match[1];
    return { resource: route.resource, pathParameters: raw === undefined ? null : { job_id: safeDecode(raw) } };
  }
  return null;
}

export function allowedMethods(resource: string): readonly string[] {
  return ROUTES.find(route => route.resource === resource)?.methods ?? [];
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes fall through to job id validation
    return segment;
  }
}
