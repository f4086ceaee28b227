/**
 * Target Formats
 * 
 * The fixed set of formats a source can be converted to, per media kind,
 * and the output file type each one is written as.
 */

import type { MediaKind } from '@mediaconv/core';

export const VIDEO_FORMATS = ['mov', 'mp4', 'm4v'] as const;
export const AUDIO_FORMATS = ['m4a', 'wav', 'caf', 'aac', 'aiff'] as const;
export const TARGET_FORMATS = [...VIDEO_FORMATS, ...AUDIO_FORMATS] as const;

export type VideoFormat = typeof VIDEO_FORMATS[number];
export type AudioFormat = typeof AUDIO_FORMATS[number];
export type TargetFormat = typeof TARGET_FORMATS[number];

/**
 * Container/file type actually written. AAC output goes into an
 * MPEG-4 audio container while keeping its own extension.
 */
export type OutputFileType = 'mov' | 'mp4' | 'm4v' | 'm4a' | 'wav' | 'caf' | 'aiff';

export interface FormatDescriptor {
  id: TargetFormat;
  label: string;
  kind: Exclude<MediaKind, 'unknown'>;
  extension: string;
  fileType: OutputFileType;
  /** Lossy by nature; no "compressed" variant is needed */
  compressed: boolean;
}

const FORMATS: Record<TargetFormat, FormatDescriptor> = {
  mov: { id: 'mov', label: 'MOV', kind: 'video', extension: 'mov', fileType: 'mov', compressed: true },
  mp4: { id: 'mp4', label: 'MP4', kind: 'video', extension: 'mp4', fileType: 'mp4', compressed: true },
  m4v: { id: 'm4v', label: 'M4V', kind: 'video', extension: 'm4v', fileType: 'm4v', compressed: true },
  m4a: { id: 'm4a', label: 'M4A', kind: 'audio', extension: 'm4a', fileType: 'm4a', compressed: true },
  wav: { id: 'wav', label: 'WAV', kind: 'audio', extension: 'wav', fileType: 'wav', compressed: false },
  caf: { id: 'caf', label: 'CAF', kind: 'audio', extension: 'caf', fileType: 'caf', compressed: false },
  aac: { id: 'aac', label: 'AAC', kind: 'audio', extension: 'aac', fileType: 'm4a', compressed: true },
  aiff: { id: 'aiff', label: 'AIFF', kind: 'audio', extension: 'aiff', fileType: 'aiff', compressed: false },
};

export function describeFormat(format: TargetFormat): FormatDescriptor {
  return FORMATS[format];
}
