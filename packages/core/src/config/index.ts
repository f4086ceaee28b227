/**
 * Engine Configuration
 * 
 * Environment-driven settings. Conversion options themselves (target,
 * compression, quality) are never configured here; they arrive per request.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
  MEDIACONV_BINARIES_DIR: z.string().min(1).optional(),

  // Native backend progress sampling
  PROGRESS_INTERVAL_MS: z.string().regex(/^\d+$/).transform(Number).default('100')
    .refine(ms => ms > 0, 'must be greater than zero'),

  // 0 waits for the external tool however long it takes
  EXTERNAL_TOOL_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).default('0'),

  // Completion side effects
  COMPLETION_SOUND: z.string().min(1).default('Glass'),
  DESKTOP_INTEGRATION: booleanString.default('true'),
});

export interface EngineConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  mediaTools: {
    ffmpeg?: string;
    ffprobe?: string;
    binariesDir?: string;
  };
  progressIntervalMs: number;
  externalToolTimeoutMs: number;
  completion: {
    sound: string;
    desktopIntegration: boolean;
  };
}

/**
 * Parse engine configuration from an environment map
 * Throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const fields = parseResult.error.flatten().fieldErrors;
    const names = Object.keys(fields).join(', ');
    throw new ConfigurationError(`Invalid environment configuration: ${names}`, fields);
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    mediaTools: {
      ffmpeg: parsed.FFMPEG_PATH,
      ffprobe: parsed.FFPROBE_PATH,
      binariesDir: parsed.MEDIACONV_BINARIES_DIR
        ? resolve(parsed.MEDIACONV_BINARIES_DIR)
        : undefined,
    },
    progressIntervalMs: parsed.PROGRESS_INTERVAL_MS,
    externalToolTimeoutMs: parsed.EXTERNAL_TOOL_TIMEOUT_MS,
    completion: {
      sound: parsed.COMPLETION_SOUND,
      desktopIntegration: parsed.DESKTOP_INTEGRATION,
    },
  };
}

let _config: EngineConfig | null = null;

/**
 * Get configuration from process.env, loading .env from the working directory (cached)
 */
export function getConfig(): EngineConfig {
  if (!_config) {
    dotenvConfig({ path: resolve(process.cwd(), '.env') });
    _config = loadConfig(process.env);
  }
  return _config;
}
