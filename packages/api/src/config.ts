import { z } from 'zod';
import { ENVIRONMENTS, type Environment, type LogLevel } from '@voxq/shared';

export type EngineKind = 'internal' | 'polly';
export type PollyEngineType = 'standard' | 'neural';

/**
 * Service Configuration
 *
 * Everything the runtime needs to assemble the service. Profiles give each environment sane
 * defaults; individual values can be overridden through environment variables.
 */
export interface ServiceConfig {
  /** Environment name (dev, staging, prod) */
  environment: Environment;

  server: {
    /** HTTP listen port */
    port: number;
  };

  /** Worker pool and admission control */
  jobs: {
    /** Number of synthesis workers */
    maxConcurrent: number;
    /** Submissions are refused once active jobs exceed maxConcurrent * capacityFactor */
    capacityFactor: number;
  };

  /** Artifact storage */
  storage: {
    /** Directory holding `<jobId>.mp3` files and the completion index */
    audioDir: string;
    /** Files smaller than this are reported as incomplete */
    minAudioBytes: number;
  };

  /** Speech synthesis provider */
  engine: {
    kind: EngineKind;
    /** Endpoint of the internal synthesis service (required for `internal`) */
    url: string | null;
    /** Per-request timeout in milliseconds */
    timeoutMs: number;
    /** AWS region for Polly */
    awsRegion: string;
    /** Polly voice engine */
    pollyEngine: PollyEngineType;
  };

  logging: {
    level: LogLevel;
  };

  /** Optional Langfuse tracing; disabled unless both keys are set */
  tracing: {
    publicKey: string | null;
    secretKey: string | null;
    host: string | null;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Environment Configuration Factory
 *
 * - DEV: small pool, debug logging
 * - STAGING: production-like pool size
 * - PROD: largest pool, info logging
 *
 * @throws Error if environment is not recognized
 */
export function getConfig(environment: string): ServiceConfig {
  switch (environment) {
    case 'dev':
      return buildProfile('dev', { maxConcurrent: 2, logLevel: 'debug' });
    case 'staging':
      return buildProfile('staging', { maxConcurrent: 4, logLevel: 'info' });
    case 'prod':
      return buildProfile('prod', { maxConcurrent: 8, logLevel: 'info' });
    default:
      throw new Error(`Unknown environment: ${environment}. Supported environments: ${ENVIRONMENTS.join(', ')}`);
  }
}

function buildProfile(
  environment: Environment,
  tuning: { maxConcurrent: number; logLevel: LogLevel }
): ServiceConfig {
  return {
    environment,
    server: { port: 8000 },
    jobs: { maxConcurrent: tuning.maxConcurrent, capacityFactor: 2 },
    storage: { audioDir: './audio', minAudioBytes: 100 },
    engine: {
      kind: 'internal',
      url: null,
      timeoutMs: 60_000,
      awsRegion: 'us-east-1',
      pollyEngine: 'neural'
    },
    logging: { level: tuning.logLevel },
    tracing: { publicKey: null, secretKey: null, host: null }
  };
}

const EnvSchema = z.object({
  APP_ENV: z.enum(ENVIRONMENTS).default('dev'),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  TTS_MAX_CONCURRENT: z.coerce.number().int().min(1).max(256).optional(),
  TTS_CAPACITY_FACTOR: z.coerce.number().positive().optional(),
  TTS_AUDIO_DIR: z.string().optional(),
  TTS_MIN_AUDIO_BYTES: z.coerce.number().int().min(0).optional(),
  TTS_ENGINE: z.enum(['internal', 'polly']).optional(),
  TTS_ENGINE_URL: z.string().url().optional(),
  TTS_ENGINE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  AWS_REGION: z.string().optional(),
  POLLY_ENGINE: z.enum(['standard', 'neural']).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_HOST: z.string().url().optional()
});

/**
 * Resolve the service configuration from environment variables.
 * `APP_ENV` picks the profile (default `dev`); blank variables count as unset.
 *
 * @throws {ConfigError} listing every variable that failed validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;
  const base = getConfig(vars.APP_ENV);

  return {
    environment: base.environment,
    server: { port: vars.PORT ?? base.server.port },
    jobs: {
      maxConcurrent: vars.TTS_MAX_CONCURRENT ?? base.jobs.maxConcurrent,
      capacityFactor: vars.TTS_CAPACITY_FACTOR ?? base.jobs.capacityFactor
    },
    storage: {
      audioDir: vars.TTS_AUDIO_DIR ?? base.storage.audioDir,
      minAudioBytes: vars.TTS_MIN_AUDIO_BYTES ?? base.storage.minAudioBytes
    },
    engine: {
      kind: vars.TTS_ENGINE ?? base.engine.kind,
      url: vars.TTS_ENGINE_URL ?? base.engine.url,
      timeoutMs: vars.TTS_ENGINE_TIMEOUT_MS ?? base.engine.timeoutMs,
      awsRegion: vars.AWS_REGION ?? base.engine.awsRegion,
      pollyEngine: vars.POLLY_ENGINE ?? base.engine.pollyEngine
    },
    logging: { level: vars.LOG_LEVEL ?? base.logging.level },
    tracing: {
      publicKey: vars.LANGFUSE_PUBLIC_KEY ?? null,
      secretKey: vars.LANGFUSE_SECRET_KEY ?? null,
      host: vars.LANGFUSE_HOST ?? null
    }
  };
}
