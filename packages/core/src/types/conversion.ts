/**
 * Conversion domain primitives shared across packages
 */

export const MEDIA_KINDS = ['video', 'audio', 'unknown'] as const;
export type MediaKind = typeof MEDIA_KINDS[number];

/**
 * Which backend drives a session. Decided once per request.
 */
export type BackendChoice = 'native' | 'external-tool';

export const CONVERSION_PHASES = [
  'idle',
  'classifying',
  'backend-selected',
  'in-progress',
  'succeeded',
  'failed',
  'cancelled',
] as const;
export type ConversionPhase = typeof CONVERSION_PHASES[number];

export type TerminalPhase = Extract<ConversionPhase, 'succeeded' | 'failed' | 'cancelled'>;
