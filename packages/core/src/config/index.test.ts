import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig } from './index.js';
import { ConfigurationError } from '../errors/index.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      mediaTools: { ffmpeg: undefined, ffprobe: undefined, binariesDir: undefined },
      progressIntervalMs: 100,
      externalToolTimeoutMs: 0,
      completion: { sound: 'Glass', desktopIntegration: true },
    });
  });

  it('reads tool locations and timings', () => {
    const config = loadConfig({
      FFMPEG_PATH: '/opt/tools/ffmpeg',
      FFPROBE_PATH: '/opt/tools/ffprobe',
      MEDIACONV_BINARIES_DIR: 'vendor/bin',
      PROGRESS_INTERVAL_MS: '250',
      EXTERNAL_TOOL_TIMEOUT_MS: '60000',
      DESKTOP_INTEGRATION: '0',
      COMPLETION_SOUND: 'Ping',
    });

    expect(config.mediaTools.ffmpeg).toBe('/opt/tools/ffmpeg');
    expect(config.mediaTools.ffprobe).toBe('/opt/tools/ffprobe');
    expect(config.mediaTools.binariesDir).toBe(resolve('vendor/bin'));
    expect(config.progressIntervalMs).toBe(250);
    expect(config.externalToolTimeoutMs).toBe(60000);
    expect(config.completion).toEqual({ sound: 'Ping', desktopIntegration: false });
  });

  it('rejects a non-numeric interval', () => {
    expect(() => loadConfig({ PROGRESS_INTERVAL_MS: 'fast' })).toThrow(ConfigurationError);
  });

  it('rejects a zero interval', () => {
    expect(() => loadConfig({ PROGRESS_INTERVAL_MS: '0' })).toThrow(
      'Invalid environment configuration: PROGRESS_INTERVAL_MS'
    );
  });

  it('names every invalid variable', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud', NODE_ENV: 'staging' })).toThrow(
      'Invalid environment configuration: NODE_ENV, LOG_LEVEL'
    );
  });
});
