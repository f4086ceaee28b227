/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building the single-input, single-output commands the
 * export sessions run.
 */

import { logger } from '@mediaconv/utils';

export interface OutputOptions {
  format?: string;        // -f format
  movflags?: string;      // -movflags for MPEG-4/QuickTime
}

export interface VideoCodecOptions {
  codec: 'copy' | 'libx264';
  preset?: string;
  crf?: number;
  profile?: string;
  pixFmt?: string;
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac' | 'pcm_s24le' | 'pcm_s24be';
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private input: string = '';
  private globalArgs: string[] = [];
  private mappings: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private videoFilters: string[] = [];
  private dropVideo = false;
  private mapMetadata: number | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';

  /**
   * Add global arguments (before the input)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  setInput(file: string): this {
    this.input = file;
    return this;
  }

  /**
   * Map a stream of the input; optional streams may be absent
   */
  map(streamSpec: string, optional: boolean = true): this {
    this.mappings.push(`0:${streamSpec}${optional ? '?' : ''}`);
    return this;
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Write no video stream (-vn)
   */
  disableVideo(): this {
    this.dropVideo = true;
    return this;
  }

  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (!this.input) {
      throw new Error('Input file not specified');
    }
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }

    const args: string[] = [...this.globalArgs, '-i', this.input];

    for (const mapping of this.mappings) {
      args.push('-map', mapping);
    }

    if (this.dropVideo) {
      args.push('-vn');
    } else if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);

      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
        if (this.videoCodec.profile) args.push('-profile:v', this.videoCodec.profile);
        if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
      }
    }

    // Video filters (only when encoding)
    if (this.videoFilters.length > 0) {
      if (this.dropVideo || this.videoCodec?.codec === 'copy') {
        logger.warn('Video filters specified but video is copied or dropped - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);

      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }

    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }

    args.push(this.outputFile);

    return args;
  }
}
