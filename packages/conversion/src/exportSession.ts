/**
 * Export Sessions
 * 
 * The seam between the native backend and whatever actually transcodes.
 * A session is bound to one source and one preset; it advertises the
 * output file types it can write and exposes its own progress counter.
 */

import type { MediaKind } from '@mediaconv/core';
import type { OutputFileType } from './formats.js';
import type { PresetName } from './presets.js';

export type ExportStatus =
  | 'unknown'
  | 'waiting'
  | 'exporting'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface MediaAsset {
  path: string;
  kind: MediaKind;
}

export interface ExportOptions {
  outputPath: string;
  outputFileType: OutputFileType;
  /** Move container metadata to the front for progressive playback */
  optimizeForNetworkUse: boolean;
}

export interface ExportSession {
  readonly presetName: PresetName;
  readonly supportedFileTypes: readonly OutputFileType[];
  /** 0..1 */
  readonly progress: number;
  readonly status: ExportStatus;
  readonly error: Error | null;

  /**
   * Run the export. Resolves once the session has stopped, whatever
   * the terminal status; callers read `status` afterwards.
   */
  exportAsync(options: ExportOptions): Promise<void>;

  cancelExport(): void;
}

export interface ExportSessionFactory {
  /**
   * Resolves to null when no session can be built for this asset and preset
   */
  createSession(asset: MediaAsset, preset: PresetName): Promise<ExportSession | null>;
}
