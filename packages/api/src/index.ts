/**
 * @fileoverview Voxqueue API Package Entry Point
 *
 * HTTP front end of the text-to-speech job service. Requests are accepted immediately and
 * turned into background synthesis jobs; clients poll for status and download the finished
 * mp3 once it exists.
 *
 * Architecture Overview:
 * - `handlers/tts.ts` maps proxy-style HTTP events onto the job manager, lister and store
 * - `runtime.ts` wires config, artifact store, synthesis engine and worker pool together
 * - `server.ts` serves the handler over node:http and owns process shutdown
 * - Synthesis engines are pluggable (`internal` HTTP service or Amazon Polly)
 */

/**
 * Current API version following semantic versioning.
 * Reported by the health endpoint.
 */
export const API_VERSION = '1.0.0';

export interface ApiInfo {
  /** The service name identifier */
  name: string;
  /** Current API version */
  version: string;
  /** Overall system health status */
  status: 'healthy' | 'degraded' | 'down';
}

/**
 * Returns basic API information for service discovery.
 *
 * @example
 * ```typescript
 * const info = getApiInfo();
 * console.log(`${info.name} v${info.version} is ${info.status}`);
 * // Output: "voxqueue-api v1.0.0 is healthy"
 * ```
 */
export function getApiInfo(): ApiInfo {
  return {
    name: 'voxqueue-api',
    version: API_VERSION,
    status: 'healthy'
  };
}
