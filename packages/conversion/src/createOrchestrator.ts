/**
 * Default wiring: configuration → tool lookup, backends and hooks
 */

import { getConfig, locateBinary, type EngineConfig } from '@mediaconv/core';
import { createLogger, type Logger } from '@mediaconv/utils';
import { ExternalToolBackend, type ToolLocator, type ToolLookup } from './backends/externalTool.js';
import { NativeTranscodeBackend } from './backends/native.js';
import { createDesktopHooks, noopCompletionHooks, type CompletionHooks } from './completion.js';
import type { ExportSessionFactory } from './exportSession.js';
import { FFmpegExportSessionFactory } from './ffmpeg/exportSession.js';
import { ConversionOrchestrator } from './orchestrator.js';
import type { EventContext } from './session.js';

export interface CreateOrchestratorOptions {
  config?: EngineConfig;
  /** Replaces the ffmpeg-backed export sessions */
  sessionFactory?: ExportSessionFactory;
  locateTool?: ToolLocator;
  hooks?: CompletionHooks;
  eventContext?: EventContext;
  logger?: Logger;
}

/**
 * ffmpeg lookup following the configured explicit path, bundled folder and PATH
 */
export function lookupFFmpeg(config: EngineConfig): ToolLookup {
  return lookupTool('ffmpeg', config.mediaTools.ffmpeg, config);
}

export function lookupFFprobe(config: EngineConfig): ToolLookup {
  return lookupTool('ffprobe', config.mediaTools.ffprobe, config);
}

function lookupTool(name: string, explicitPath: string | undefined, config: EngineConfig): ToolLookup {
  const location = locateBinary(name, {
    explicitPath,
    binariesDir: config.mediaTools.binariesDir,
  });
  return { path: location.resolvedPath, searched: location.searched };
}

export function createFFmpegLocator(config: EngineConfig): ToolLocator {
  return () => lookupFFmpeg(config);
}

export function createOrchestrator(options: CreateOrchestratorOptions = {}): ConversionOrchestrator {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? createLogger({ component: 'orchestrator' });
  const locateTool = options.locateTool ?? createFFmpegLocator(config);

  const hooks = options.hooks ?? (config.completion.desktopIntegration
    ? createDesktopHooks({ soundName: config.completion.sound })
    : noopCompletionHooks);

  return new ConversionOrchestrator({
    hooks,
    eventContext: options.eventContext,
    logger,
    createBackend: choice => {
      if (choice === 'external-tool') {
        return new ExternalToolBackend({
          locateTool,
          timeoutMs: config.externalToolTimeoutMs,
          logger: logger.child({ backend: choice }),
        });
      }

      const sessionFactory = options.sessionFactory ?? new FFmpegExportSessionFactory({
        // When not found, the spawn error surfaces as a failed export
        ffmpegPath: lookupFFmpeg(config).path ?? 'ffmpeg',
        ffprobePath: lookupFFprobe(config).path ?? 'ffprobe',
        logger: logger.child({ component: 'ffmpeg-export' }),
      });
      return new NativeTranscodeBackend(sessionFactory, {
        progressIntervalMs: config.progressIntervalMs,
        logger: logger.child({ backend: choice }),
      });
    },
  });
}
