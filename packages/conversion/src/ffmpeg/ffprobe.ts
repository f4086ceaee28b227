/**
 * FFProbe Wrapper
 *
 * Lists the codecs of a source's streams, which decides where its streams
 * can be copied without re-encoding.
 */

import { z } from 'zod';
import { executeCommand, outputTail, type CommandRunner } from '@mediaconv/utils';
import type { OutputFileType } from '../formats.js';

export interface StreamCodecs {
  video: string[];
  audio: string[];
}

const ffprobeOutputSchema = z.object({
  streams: z.array(z.object({
    codec_type: z.string(),
    codec_name: z.string().optional(),
  })).default([]),
});

export class FFProbe {
  private readonly ffprobePath: string;
  private readonly runCommand: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', runCommand: CommandRunner = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.runCommand = runCommand;
  }

  /**
   * Codec names of every video and audio stream, in stream order
   */
  async streamCodecs(filePath: string): Promise<StreamCodecs> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_streams',
      filePath,
    ];

    const result = await this.runCommand(this.ffprobePath, args, {
      timeout: 60000, // 1 minute timeout
    });

    if (result.exitCode !== 0) {
      throw new Error(`ffprobe failed: ${outputTail(result.stderr, 1) || `exit code ${result.exitCode}`}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      throw new Error(`Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'malformed'}`);
    }

    const codecs: StreamCodecs = { video: [], audio: [] };
    for (const stream of parsed.data.streams) {
      const codec = stream.codec_name ?? 'unknown';
      if (stream.codec_type === 'video') codecs.video.push(codec);
      if (stream.codec_type === 'audio') codecs.audio.push(codec);
    }
    return codecs;
  }
}

const AAC_FAMILY = ['aac', 'alac'];
const PCM_LITTLE_ENDIAN = ['pcm_s16le', 'pcm_s24le', 'pcm_s32le', 'pcm_f32le', 'pcm_f64le', 'pcm_u8'];
const PCM_BIG_ENDIAN = ['pcm_s16be', 'pcm_s24be', 'pcm_s32be', 'pcm_f32be', 'pcm_f64be'];

/**
 * Codecs each container accepts as a stream copy
 */
const STREAM_COPY_CODECS: Record<OutputFileType, { video: ReadonlySet<string>; audio: ReadonlySet<string> }> = {
  mov: {
    video: new Set(['h264', 'hevc', 'mpeg4', 'prores', 'mjpeg']),
    audio: new Set([...AAC_FAMILY, 'mp3', 'ac3', ...PCM_LITTLE_ENDIAN, ...PCM_BIG_ENDIAN]),
  },
  mp4: {
    video: new Set(['h264', 'hevc', 'mpeg4', 'av1']),
    audio: new Set([...AAC_FAMILY, 'mp3', 'ac3']),
  },
  m4v: {
    video: new Set(['h264', 'mpeg4']),
    audio: new Set([...AAC_FAMILY, 'ac3']),
  },
  m4a: {
    video: new Set(),
    audio: new Set(AAC_FAMILY),
  },
  wav: {
    video: new Set(),
    audio: new Set(PCM_LITTLE_ENDIAN),
  },
  caf: {
    video: new Set(),
    audio: new Set([...AAC_FAMILY, ...PCM_LITTLE_ENDIAN, ...PCM_BIG_ENDIAN]),
  },
  aiff: {
    video: new Set(),
    audio: new Set(PCM_BIG_ENDIAN),
  },
};

/**
 * Whether every stream the export keeps can be copied into the container.
 * Audio outputs drop video; at least one kept stream is required.
 */
export function canStreamCopy(codecs: StreamCodecs, fileType: OutputFileType, audioOnly: boolean): boolean {
  const accepted = STREAM_COPY_CODECS[fileType];
  const video = audioOnly ? [] : codecs.video;

  if (video.length + codecs.audio.length === 0) return false;

  return video.every(codec => accepted.video.has(codec))
    && codecs.audio.every(codec => accepted.audio.has(codec));
}
