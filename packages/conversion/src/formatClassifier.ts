/**
 * Format Classifier
 * 
 * Decides whether a source is video, audio or unrecognized, and which
 * target formats are legal for it.
 * 
 * A declared content type is checked first; when it is missing or conforms
 * to neither capability, the extension allow-list decides. Content-type
 * detection is unreliable for unusual or missing extensions, so the
 * allow-list must still gate the enabled actions.
 */

import type { MediaKind } from '@mediaconv/core';
import { getExtension } from '@mediaconv/utils';
import {
  AUDIO_FORMATS,
  VIDEO_FORMATS,
  describeFormat,
  type TargetFormat,
} from './formats.js';

const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set(['mp4', 'mov', 'm4v', 'avi']);
const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set(['m4a', 'wav', 'caf', 'aac', 'aiff']);

/**
 * The one input container the native backend cannot read
 */
export const LEGACY_CONTAINER_EXTENSIONS: ReadonlySet<string> = new Set(['avi']);

/**
 * Kind a MIME type conforms to, ignoring case and parameters
 */
export function conformingKind(contentType: string): MediaKind {
  const essence = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  const [type, subtype] = essence.split('/');
  if (!subtype) return 'unknown';

  switch (type) {
    case 'video':
      return 'video';
    case 'audio':
      return 'audio';
    default:
      return 'unknown';
  }
}

export function classifyMedia(path: string, declaredContentType?: string): MediaKind {
  if (declaredContentType) {
    const declared = conformingKind(declaredContentType);
    if (declared !== 'unknown') return declared;
  }

  const ext = getExtension(path);
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  if (AUDIO_EXTENSIONS.has(ext)) return 'audio';
  return 'unknown';
}

export function legalTargets(kind: MediaKind): readonly TargetFormat[] {
  switch (kind) {
    case 'video':
      return VIDEO_FORMATS;
    case 'audio':
      return AUDIO_FORMATS;
    case 'unknown':
      return [];
  }
}

export function isLegalTarget(kind: MediaKind, target: TargetFormat): boolean {
  return kind !== 'unknown' && describeFormat(target).kind === kind;
}

export function isLegacyContainer(path: string): boolean {
  return LEGACY_CONTAINER_EXTENSIONS.has(getExtension(path));
}
