/**
 * FFmpeg Export Session
 * 
 * The shipped ExportSession provider: runs one preset-driven ffmpeg export,
 * tracks its progress from `-progress pipe:1`, and cancels by aborting the
 * child process.
 */

import { executeCommand, outputTail, createLogger, type CommandRunner, type Logger } from '@mediaconv/utils';
import type { ExportOptions, ExportSession, ExportSessionFactory, ExportStatus, MediaAsset } from '../exportSession.js';
import type { OutputFileType } from '../formats.js';
import type { PresetName } from '../presets.js';
import { buildExportArgs, PRESET_FILE_TYPES } from './encoders.js';
import { canStreamCopy, FFProbe, type StreamCodecs } from './ffprobe.js';
import { FFmpegProgressParser } from './progressParser.js';

export interface FFmpegExportSessionOptions {
  /** Resolved ffmpeg executable */
  ffmpegPath: string;
  /** Resolved ffprobe executable, used to check passthrough compatibility */
  ffprobePath?: string;
  /** Runs both ffmpeg and ffprobe */
  runCommand?: CommandRunner;
  logger?: Logger;
}

export class FFmpegExportSession implements ExportSession {
  readonly presetName: PresetName;
  readonly supportedFileTypes: readonly OutputFileType[];

  private readonly asset: MediaAsset & { kind: 'video' | 'audio' };
  private readonly ffmpegPath: string;
  private readonly runCommand: CommandRunner;
  private readonly log: Logger;
  private readonly abortController = new AbortController();
  private readonly parser = new FFmpegProgressParser();

  private currentStatus: ExportStatus = 'waiting';
  private lastError: Error | null = null;

  constructor(
    asset: MediaAsset & { kind: 'video' | 'audio' },
    preset: PresetName,
    options: FFmpegExportSessionOptions,
    supportedFileTypes: readonly OutputFileType[] = PRESET_FILE_TYPES[preset][asset.kind]
  ) {
    this.asset = asset;
    this.presetName = preset;
    this.supportedFileTypes = supportedFileTypes;
    this.ffmpegPath = options.ffmpegPath;
    this.runCommand = options.runCommand ?? executeCommand;
    this.log = options.logger ?? createLogger({ component: 'ffmpeg-export', preset });
  }

  get progress(): number {
    return this.parser.fraction;
  }

  get status(): ExportStatus {
    return this.currentStatus;
  }

  get error(): Error | null {
    return this.lastError;
  }

  async exportAsync(options: ExportOptions): Promise<void> {
    // Cancelled before it started
    if (this.currentStatus === 'cancelled') {
      return;
    }
    if (this.currentStatus !== 'waiting') {
      throw new Error(`Export session already used (status: ${this.currentStatus})`);
    }

    if (!this.supportedFileTypes.includes(options.outputFileType)) {
      this.finish('failed', new Error(
        `Preset ${this.presetName} cannot write ${options.outputFileType} files`
      ));
      return;
    }

    const args = buildExportArgs({
      source: this.asset.path,
      kind: this.asset.kind,
      preset: this.presetName,
      outputPath: options.outputPath,
      outputFileType: options.outputFileType,
      optimizeForNetworkUse: options.optimizeForNetworkUse,
    });

    this.currentStatus = 'exporting';
    this.log.debug({ command: this.ffmpegPath, args }, 'FFmpeg export command');

    try {
      const result = await this.runCommand(this.ffmpegPath, args, {
        timeout: 0,
        signal: this.abortController.signal,
        onStdout: chunk => this.parser.parseProgressData(chunk),
        onStderr: chunk => this.parser.parseStderrData(chunk),
      });

      if (result.aborted || this.abortController.signal.aborted) {
        this.finish('cancelled', null);
      } else if (result.exitCode === 0) {
        this.finish('completed', null);
      } else {
        const reason = outputTail(result.stderr, 1) || `ffmpeg exited with code ${result.exitCode}`;
        this.finish('failed', new Error(reason));
      }
    } catch (error) {
      this.finish('failed', error instanceof Error ? error : new Error(String(error)));
    }
  }

  cancelExport(): void {
    if (this.currentStatus === 'waiting') {
      this.finish('cancelled', null);
      return;
    }
    if (this.currentStatus === 'exporting') {
      this.abortController.abort();
    }
  }

  private finish(status: 'completed' | 'failed' | 'cancelled', error: Error | null): void {
    this.currentStatus = status;
    this.lastError = error;
    this.log.debug({ status, error: error?.message }, 'FFmpeg export finished');
  }
}

export class FFmpegExportSessionFactory implements ExportSessionFactory {
  private readonly options: FFmpegExportSessionOptions;
  private readonly ffprobe: FFProbe;
  private readonly log: Logger;
  private lastStreams: { path: string; codecs: Promise<StreamCodecs | null> } | null = null;

  constructor(options: FFmpegExportSessionOptions) {
    this.options = options;
    this.ffprobe = new FFProbe(options.ffprobePath, options.runCommand);
    this.log = options.logger ?? createLogger({ component: 'ffmpeg-export' });
  }

  async createSession(asset: MediaAsset, preset: PresetName): Promise<ExportSession | null> {
    const { kind } = asset;
    if (kind === 'unknown') {
      return null;
    }
    const source = { path: asset.path, kind };

    if (preset !== 'passthrough') {
      return new FFmpegExportSession(source, preset, this.options);
    }

    // A stream copy only works into containers that accept every kept codec
    const codecs = await this.readStreamCodecs(asset.path);
    const supported = codecs === null
      ? []
      : PRESET_FILE_TYPES.passthrough[kind].filter(fileType => canStreamCopy(codecs, fileType, kind === 'audio'));

    return new FFmpegExportSession(source, preset, this.options, supported);
  }

  /**
   * Stream codecs of the source, read once per path. Null when ffprobe
   * cannot read them, which rules passthrough out.
   */
  private readStreamCodecs(path: string): Promise<StreamCodecs | null> {
    if (this.lastStreams?.path === path) {
      return this.lastStreams.codecs;
    }

    const codecs = this.ffprobe.streamCodecs(path).then(
      result => {
        this.log.debug({ path, codecs: result }, 'Source stream codecs');
        return result;
      },
      (error: unknown) => {
        this.log.warn({ err: error, path }, 'Could not read stream codecs, skipping passthrough');
        return null;
      }
    );
    this.lastStreams = { path, codecs };
    return codecs;
  }
}
