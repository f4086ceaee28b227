/**
 * Backend Types
 * 
 * A backend runs one conversion and reports exactly one outcome.
 * Progress, when a backend has any, goes through the callback.
 */

import type { BackendChoice, ConversionError } from '@mediaconv/core';
import type { TargetFormat } from '../formats.js';
import type { PresetName } from '../presets.js';
import type { MediaAsset } from '../exportSession.js';

export interface BackendJob {
  source: MediaAsset;
  destination: string;
  target: TargetFormat;
  /** Native backend only; ordered, first compatible wins */
  candidates: readonly PresetName[];
}

export type BackendOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; error: ConversionError }
  | { status: 'cancelled' };

export type ProgressCallback = (fraction: number) => void;

/** Called once the backend has committed to converting, before any work starts */
export type StartedCallback = () => void;

export interface ConversionBackend {
  readonly kind: BackendChoice;

  run(job: BackendJob, onProgress: ProgressCallback, onStarted?: StartedCallback): Promise<BackendOutcome>;

  /**
   * Ask the running conversion to stop. Returns false when this backend
   * cannot cancel, or nothing is running.
   */
  cancel(): boolean;
}
