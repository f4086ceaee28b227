/**
 * Encoder Presets
 * 
 * What each named preset can write and how it is expressed as ffmpeg
 * arguments. Passthrough re-muxes without re-encoding; the quality
 * presets re-encode with CRF-based H.264 and AAC, or PCM for the
 * uncompressed audio containers.
 */

import { InternalInconsistencyError, type MediaKind } from '@mediaconv/core';
import type { OutputFileType } from '../formats.js';
import type { PresetName } from '../presets.js';
import {
  FFmpegCommandBuilder,
  type AudioCodecOptions,
  type VideoCodecOptions,
} from './commandBuilder.js';

// Quality levels for CRF-based encoding
export const CRF_LEVELS = {
  highQuality: { x264: 18 },
  balanced: { x264: 23 },
  small: { x264: 28 },
};

const VIDEO_CONTAINERS: readonly OutputFileType[] = ['mov', 'mp4', 'm4v'];
const AUDIO_CONTAINERS: readonly OutputFileType[] = ['m4a', 'wav', 'caf', 'aiff'];

/**
 * Output file types a preset supports for a source of the given kind
 */
export const PRESET_FILE_TYPES: Record<PresetName, Record<Exclude<MediaKind, 'unknown'>, readonly OutputFileType[]>> = {
  'passthrough': { video: VIDEO_CONTAINERS, audio: AUDIO_CONTAINERS },
  'highest-quality': { video: VIDEO_CONTAINERS, audio: AUDIO_CONTAINERS },
  'medium-quality': { video: VIDEO_CONTAINERS, audio: [] },
  'low-quality': { video: VIDEO_CONTAINERS, audio: [] },
  'm4a': { video: ['m4a'], audio: ['m4a'] },
};

const MUXERS: Record<OutputFileType, string> = {
  mov: 'mov',
  mp4: 'mp4',
  m4v: 'ipod',
  m4a: 'ipod',
  wav: 'wav',
  caf: 'caf',
  aiff: 'aiff',
};

const MPEG4_FAMILY: ReadonlySet<OutputFileType> = new Set(['mov', 'mp4', 'm4v', 'm4a']);

const VIDEO_ENCODERS: Record<'highest-quality' | 'medium-quality' | 'low-quality', { video: VideoCodecOptions; audio: AudioCodecOptions; scale?: string }> = {
  'highest-quality': {
    video: { codec: 'libx264', preset: 'slow', crf: CRF_LEVELS.highQuality.x264, profile: 'high', pixFmt: 'yuv420p' },
    audio: { codec: 'aac', bitrate: '256k' },
  },
  'medium-quality': {
    video: { codec: 'libx264', preset: 'medium', crf: CRF_LEVELS.balanced.x264, profile: 'main', pixFmt: 'yuv420p' },
    audio: { codec: 'aac', bitrate: '160k' },
    scale: "scale='min(1280,iw)':-2",
  },
  'low-quality': {
    video: { codec: 'libx264', preset: 'fast', crf: CRF_LEVELS.small.x264, profile: 'baseline', pixFmt: 'yuv420p' },
    audio: { codec: 'aac', bitrate: '96k' },
    scale: "scale='min(640,iw)':-2",
  },
};

const PCM_CODECS: Record<'wav' | 'caf' | 'aiff', AudioCodecOptions['codec']> = {
  wav: 'pcm_s24le',
  caf: 'pcm_s24be',
  aiff: 'pcm_s24be',
};

export interface ExportCommand {
  source: string;
  kind: Exclude<MediaKind, 'unknown'>;
  preset: PresetName;
  outputPath: string;
  outputFileType: OutputFileType;
  optimizeForNetworkUse: boolean;
}

/**
 * Build the ffmpeg arguments for one export
 */
export function buildExportArgs(command: ExportCommand): string[] {
  const { source, kind, preset, outputPath, outputFileType } = command;
  if (!PRESET_FILE_TYPES[preset][kind].includes(outputFileType)) {
    throw unsupportedFileType(preset, outputFileType);
  }
  const isVideoOutput = VIDEO_CONTAINERS.includes(outputFileType);

  const builder = new FFmpegCommandBuilder()
    // -n: never overwrite; the destination is expected to be free
    .addGlobalArg('-hide_banner', '-nostdin', '-nostats', '-n', '-progress', 'pipe:1')
    .setInput(source)
    .copyMetadata(0);

  if (isVideoOutput) {
    builder.map('v').map('a');
    if (preset === 'passthrough') {
      builder.setVideoCodec('copy').setAudioCodec('copy');
    } else if (preset === 'm4a') {
      throw unsupportedFileType(preset, outputFileType);
    } else {
      const encoder = VIDEO_ENCODERS[preset];
      builder.setVideoCodec(encoder.video).setAudioCodec(encoder.audio);
      if (encoder.scale) builder.addVideoFilter(encoder.scale);
    }
  } else {
    builder.disableVideo().map('a', false);
    builder.setAudioCodec(audioCodecFor(preset, outputFileType));
  }

  const movflags = command.optimizeForNetworkUse && MPEG4_FAMILY.has(outputFileType)
    ? '+faststart'
    : undefined;

  return builder
    .setOutputOptions({ format: MUXERS[outputFileType], movflags })
    .setOutput(outputPath)
    .build();
}

function audioCodecFor(preset: PresetName, fileType: OutputFileType): AudioCodecOptions | 'copy' {
  if (preset === 'passthrough') return 'copy';

  switch (fileType) {
    case 'm4a':
      return { codec: 'aac', bitrate: preset === 'm4a' ? '192k' : '256k' };
    case 'wav':
    case 'caf':
    case 'aiff':
      return { codec: PCM_CODECS[fileType] };
    default:
      throw unsupportedFileType(preset, fileType);
  }
}

function unsupportedFileType(preset: PresetName, fileType: OutputFileType): InternalInconsistencyError {
  return new InternalInconsistencyError(`Preset ${preset} cannot write ${fileType}`, { preset, fileType });
}
