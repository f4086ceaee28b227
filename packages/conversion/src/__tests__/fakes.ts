import type { CommandResult } from '@mediaconv/utils';
import type {
  ExportOptions,
  ExportSession,
  ExportSessionFactory,
  ExportStatus,
  MediaAsset,
} from '../exportSession.js';
import type { OutputFileType } from '../formats.js';
import type { PresetName } from '../presets.js';

/**
 * Export session driven by the test: progress is set directly and the
 * export only ends when `finish` (or `fail`) is called.
 */
export class FakeExportSession implements ExportSession {
  progress = 0;
  status: ExportStatus = 'waiting';
  error: Error | null = null;
  readonly exportCalls: ExportOptions[] = [];
  cancelCalls = 0;
  honoursCancel = true;

  private settle: { resolve: () => void; reject: (error: Error) => void } | null = null;

  constructor(
    readonly presetName: PresetName,
    readonly supportedFileTypes: readonly OutputFileType[],
    private readonly onExport: (session: FakeExportSession) => void = () => {}
  ) {}

  exportAsync(options: ExportOptions): Promise<void> {
    this.exportCalls.push(options);
    this.status = 'exporting';
    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      this.onExport(this);
    });
  }

  cancelExport(): void {
    this.cancelCalls++;
    if (this.honoursCancel && this.status === 'exporting') {
      this.finish('cancelled');
    }
  }

  finish(status: ExportStatus, error: Error | null = null): void {
    this.status = status;
    this.error = error;
    this.settle?.resolve();
    this.settle = null;
  }

  fail(error: Error): void {
    this.settle?.reject(error);
    this.settle = null;
  }
}

/**
 * Builds sessions only for the presets it is given, each advertising
 * the listed file types
 */
export class FakeExportSessionFactory implements ExportSessionFactory {
  readonly attempts: { asset: MediaAsset; preset: PresetName }[] = [];
  readonly sessions: FakeExportSession[] = [];
  /** Resolves with the first session whose export starts */
  readonly exportStarted: Promise<FakeExportSession>;
  private markExportStarted: (session: FakeExportSession) => void = () => {};

  constructor(private readonly supported: Partial<Record<PresetName, readonly OutputFileType[]>>) {
    this.exportStarted = new Promise(resolve => {
      this.markExportStarted = resolve;
    });
  }

  async createSession(asset: MediaAsset, preset: PresetName): Promise<ExportSession | null> {
    this.attempts.push({ asset, preset });
    const fileTypes = this.supported[preset];
    if (fileTypes === undefined) {
      return null;
    }
    const session = new FakeExportSession(preset, fileTypes, started => this.markExportStarted(started));
    this.sessions.push(session);
    return session;
  }

  /**
   * The session the backend started exporting with
   */
  exporting(): FakeExportSession | undefined {
    return this.sessions.find(session => session.exportCalls.length > 0);
  }
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    output: '',
    duration: 25,
    timedOut: false,
    aborted: false,
    ...overrides,
  };
}
