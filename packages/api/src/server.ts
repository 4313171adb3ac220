// Process entry point: `npm start`
import 'dotenv/config';
import { createLogger, describeError, getProjectInfo } from '@voxq/shared';
import { ConfigError, loadConfig } from './config';
import { createTtsHandler } from './handlers/tts';
import { createHttpServer } from './http';
import { createRuntime, stopRuntime } from './runtime';

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = await createRuntime(config);
  const { logger } = runtime;
  const server = createHttpServer(createTtsHandler(runtime), logger);

  let closing = false;
  const close = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info('Received shutdown signal', { signal });
    await new Promise<void>(resolve => server.close(() => resolve()));
    await stopRuntime(runtime);
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      close(signal).catch(error => {
        logger.error('Shutdown failed', describeError(error));
        process.exit(1);
      });
    });
  }

  server.listen(config.server.port, () => {
    logger.info('Server listening', {
      ...getProjectInfo(config.environment),
      port: config.server.port,
      engine: runtime.engine.name,
      max_concurrent: config.jobs.maxConcurrent
    });
  });
}

main().catch(error => {
  const log = createLogger({ service: 'voxqueue-api' });
  log.error(error instanceof ConfigError ? 'Invalid configuration' : 'Startup failed', describeError(error));
  process.exit(1);
});
