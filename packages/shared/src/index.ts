// Shared package entry point
export const PROJECT_NAME = 'voxqueue';
export const VERSION = '1.0.0';

/** Deployment profiles, in promotion order. */
export const ENVIRONMENTS = ['dev', 'staging', 'prod'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some(env => env === value);
}

export interface ProjectInfo {
  name: string;
  version: string;
  environment: Environment;
}

export function getProjectInfo(environment: Environment = 'dev'): ProjectInfo {
  return {
    name: PROJECT_NAME,
    version: VERSION,
    environment
  };
}

export * from './job-status';
export * from './tts-request';
export * from './text';
export * from './logger';
