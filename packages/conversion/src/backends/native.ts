/**
 * Native Transcode Backend
 * 
 * Negotiates an export session from the candidate presets, runs it, and
 * samples the session's progress counter on a fixed interval until the
 * export stops.
 */

import {
  ExportFailedError,
  InternalInconsistencyError,
  NoCompatiblePresetError,
} from '@mediaconv/core';
import { createLogger, type Logger } from '@mediaconv/utils';
import type { ExportSession, ExportSessionFactory } from '../exportSession.js';
import { describeFormat } from '../formats.js';
import type {
  BackendJob,
  BackendOutcome,
  ConversionBackend,
  ProgressCallback,
  StartedCallback,
} from './types.js';

export const DEFAULT_PROGRESS_INTERVAL_MS = 100;

export interface NativeBackendOptions {
  progressIntervalMs?: number;
  logger?: Logger;
}

export class NativeTranscodeBackend implements ConversionBackend {
  readonly kind = 'native' as const;

  private readonly factory: ExportSessionFactory;
  private readonly progressIntervalMs: number;
  private readonly log: Logger;
  private running = false;
  private cancelRequested = false;
  private activeSession: ExportSession | null = null;

  constructor(factory: ExportSessionFactory, options: NativeBackendOptions = {}) {
    this.factory = factory;
    this.progressIntervalMs = options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
    this.log = options.logger ?? createLogger({ component: 'native-backend' });
  }

  async run(job: BackendJob, onProgress: ProgressCallback, onStarted?: StartedCallback): Promise<BackendOutcome> {
    if (this.running) {
      throw new InternalInconsistencyError('Native backend is already running an export');
    }
    this.running = true;
    this.cancelRequested = false;

    try {
      return await this.runExport(job, onProgress, onStarted);
    } finally {
      this.running = false;
      this.activeSession = null;
    }
  }

  cancel(): boolean {
    if (!this.running) {
      return false;
    }
    if (!this.activeSession) {
      // Still negotiating a preset
      this.log.info('Cancelling before export');
      this.cancelRequested = true;
      return true;
    }
    this.log.info({ preset: this.activeSession.presetName }, 'Cancelling export');
    this.activeSession.cancelExport();
    return true;
  }

  private async runExport(
    job: BackendJob,
    onProgress: ProgressCallback,
    onStarted: StartedCallback | undefined
  ): Promise<BackendOutcome> {
    const { fileType } = describeFormat(job.target);
    const session = await this.selectSession(job);
    if (this.cancelRequested) {
      return { status: 'cancelled' };
    }
    if (!session) {
      return {
        status: 'failed',
        error: new NoCompatiblePresetError(fileType, job.candidates),
      };
    }

    this.activeSession = session;
    onStarted?.();
    const timer = setInterval(() => onProgress(session.progress), this.progressIntervalMs);

    try {
      await session.exportAsync({
        outputPath: job.destination,
        outputFileType: fileType,
        optimizeForNetworkUse: true,
      });
    } catch (error) {
      this.log.error({ err: error, preset: session.presetName }, 'Export session threw');
      return {
        status: 'failed',
        error: new InternalInconsistencyError('Export session threw instead of reporting a status', {
          reason: error instanceof Error ? error.message : String(error),
        }),
      };
    } finally {
      clearInterval(timer);
    }

    return this.classify(session);
  }

  /**
   * First candidate whose session can write the requested file type
   */
  private async selectSession(job: BackendJob): Promise<ExportSession | null> {
    const { fileType } = describeFormat(job.target);

    for (const preset of job.candidates) {
      if (this.cancelRequested) {
        return null;
      }
      const session = await this.factory.createSession(job.source, preset);
      if (session && session.supportedFileTypes.includes(fileType)) {
        this.log.debug({ preset, fileType }, 'Preset accepted');
        return session;
      }
      this.log.debug({ preset, fileType, created: session !== null }, 'Preset not compatible');
    }

    return null;
  }

  private classify(session: ExportSession): BackendOutcome {
    switch (session.status) {
      case 'completed':
        return { status: 'succeeded' };
      case 'failed':
        return { status: 'failed', error: new ExportFailedError(session.error) };
      case 'cancelled':
        return { status: 'cancelled' };
      default:
        return {
          status: 'failed',
          error: new InternalInconsistencyError(
            `Export finished with unexpected status "${session.status}"`,
            { status: session.status, preset: session.presetName }
          ),
        };
    }
  }
}
