import { Langfuse } from 'langfuse';
import { describeError, silentLogger, type Logger } from '@voxq/shared';
import type { ServiceConfig } from './config';

let langfuse: Langfuse | null = null;

/**
 * Initialise the Langfuse client when both keys are configured.
 * Returns the client, or null when tracing stays disabled.
 */
export function initTracing(settings: ServiceConfig['tracing'], logger: Logger = silentLogger): Langfuse | null {
  if (!settings.publicKey || !settings.secretKey) {
    logger.warn('Langfuse tracing not initialized: LANGFUSE_PUBLIC_KEY or LANGFUSE_SECRET_KEY not set');
    langfuse = null;
    return null;
  }

  langfuse = new Langfuse({
    publicKey: settings.publicKey,
    secretKey: settings.secretKey,
    // Only pass baseUrl when set; Langfuse defaults to its cloud endpoint
    ...(settings.host ? { baseUrl: settings.host } : {}),
    flushAt: 20,
    flushInterval: 1000,
    requestTimeout: 5000
  });
  logger.info('Langfuse tracing initialized', { host: settings.host ?? 'default' });
  return langfuse;
}

export function getLangfuse(): Langfuse | null {
  return langfuse;
}

/**
 * Flush pending traces. Failures are logged, never thrown.
 */
export async function flushSpans(logger: Logger = silentLogger): Promise<void> {
  if (langfuse) {
    try {
      await langfuse.flushAsync();
    } catch (error) {
      logger.error('Failed to flush spans to Langfuse', describeError(error));
    }
  }
}

/**
 * Shutdown the Langfuse client (flushes first).
 */
export async function shutdown(): Promise<void> {
  if (langfuse) {
    await langfuse.shutdownAsync();
    langfuse = null;
  }
}
