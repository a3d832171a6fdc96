/**
 * Runtime configuration from environment variables
 *
 * Values are read once at startup and validated; an invalid value is a
 * configuration error and throws immediately.
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const quota = config.resources.destroyPerUpkeep;
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  resources: z.object({
    maxResources: positiveInt,
    destroyPerUpkeep: positiveInt,
  }),
  isDev: z.boolean(),
  isProd: z.boolean(),
  isTest: z.boolean(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  return typeof value === 'string' && value.length > 0 ? value : defaultValue;
}

export function loadConfig(): AppConfig {
  const nodeEnv = getEnvVar('NODE_ENV', 'development');
  const isTest = nodeEnv === 'test';

  return ConfigSchema.parse({
    logLevel: getEnvVar('FRAME_GRAPH_LOG_LEVEL', isTest ? 'warn' : 'info'),
    resources: {
      maxResources: getEnvVar('FRAME_GRAPH_MAX_RESOURCES', '1024'),
      destroyPerUpkeep: getEnvVar('FRAME_GRAPH_DESTROY_PER_UPKEEP', '10'),
    },
    isDev: nodeEnv === 'development',
    isProd: nodeEnv === 'production',
    isTest,
  });
}

export const config: AppConfig = loadConfig();
