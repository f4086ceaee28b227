/**
 * Preset Selection
 * 
 * Ordered candidate presets for the native backend. The first candidate
 * whose export session supports the output file type wins; later entries
 * are fallbacks, not retries.
 */

import { InvalidRequestError, type MediaKind } from '@mediaconv/core';
import { describeFormat, type TargetFormat } from './formats.js';

export const PRESET_NAMES = [
  'passthrough',
  'highest-quality',
  'medium-quality',
  'low-quality',
  'm4a',
] as const;

export type PresetName = typeof PRESET_NAMES[number];

export const QUALITY_LEVELS = ['passthrough', 'high', 'medium', 'low'] as const;
export type QualityLevel = typeof QUALITY_LEVELS[number];

/**
 * Video preset used when compression is requested at a quality level
 */
export const QUALITY_PRESETS: Record<QualityLevel, PresetName> = {
  passthrough: 'passthrough',
  high: 'highest-quality',
  medium: 'medium-quality',
  low: 'low-quality',
};

export interface PresetSelection {
  kind: MediaKind;
  target: TargetFormat;
  compress: boolean;
  qualityLevel: QualityLevel;
}

/**
 * Candidate presets in the order they should be tried (1 to 3 entries)
 */
export function selectPresets(selection: PresetSelection): PresetName[] {
  const { kind, target, compress, qualityLevel } = selection;

  switch (kind) {
    case 'video':
      return compress
        ? [QUALITY_PRESETS[qualityLevel]]
        : ['passthrough', 'highest-quality'];

    case 'audio': {
      const format = describeFormat(target);
      if (format.compressed) {
        // AAC has no passthrough fallback; M4A keeps one when not compressing
        return compress || target === 'aac'
          ? ['m4a']
          : ['m4a', 'passthrough'];
      }
      // Uncompressed targets have no compressed preset of their own
      return compress
        ? ['m4a', 'passthrough', 'highest-quality']
        : ['passthrough', 'highest-quality'];
    }

    case 'unknown':
      throw new InvalidRequestError('Selected file is not recognized as audio or video.', { target });
  }
}
