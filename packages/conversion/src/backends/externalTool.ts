/**
 * External Tool Backend
 * 
 * Converts formats the native backend cannot read by running
 * `<tool> -i <source> <destination>` and waiting for it to exit.
 * No progress is reported and a spawned process cannot be cancelled.
 */

import {
  ExternalExitNonzeroError,
  SpawnError,
  ToolMissingError,
} from '@mediaconv/core';
import {
  createLogger,
  executeCommand,
  formatDuration,
  outputTail,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@mediaconv/utils';
import type { BackendJob, BackendOutcome, ConversionBackend, ProgressCallback, StartedCallback } from './types.js';

export interface ToolLookup {
  path: string | null;
  searched: string[];
}

export type ToolLocator = () => ToolLookup | Promise<ToolLookup>;

export interface ExternalToolBackendOptions {
  locateTool: ToolLocator;
  toolName?: string;
  runCommand?: CommandRunner;
  /** 0 waits indefinitely */
  timeoutMs?: number;
  logger?: Logger;
}

export class ExternalToolBackend implements ConversionBackend {
  readonly kind = 'external-tool' as const;

  private readonly locateTool: ToolLocator;
  private readonly toolName: string;
  private readonly runCommand: CommandRunner;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: ExternalToolBackendOptions) {
    this.locateTool = options.locateTool;
    this.toolName = options.toolName ?? 'ffmpeg';
    this.runCommand = options.runCommand ?? executeCommand;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.log = options.logger ?? createLogger({ component: 'external-tool-backend' });
  }

  async run(job: BackendJob, _onProgress?: ProgressCallback, onStarted?: StartedCallback): Promise<BackendOutcome> {
    const lookup = await this.locateTool();
    if (!lookup.path) {
      this.log.warn({ tool: this.toolName, searched: lookup.searched }, 'External tool not found');
      return { status: 'failed', error: new ToolMissingError(this.toolName, lookup.searched) };
    }

    const args = ['-i', job.source.path, job.destination];
    this.log.info({ command: lookup.path, args }, 'Running external tool');
    onStarted?.();

    let result: CommandResult;
    try {
      result = await this.runCommand(lookup.path, args, { timeout: this.timeoutMs });
    } catch (error) {
      this.log.error({ err: error, command: lookup.path }, 'External tool failed to start');
      return { status: 'failed', error: new SpawnError(lookup.path, error) };
    }

    this.log.info({
      exitCode: result.exitCode,
      duration: formatDuration(result.duration),
      timedOut: result.timedOut,
    }, 'External tool exited');

    if (result.exitCode === 0) {
      return { status: 'succeeded' };
    }

    this.log.debug({ output: outputTail(result.output, 20) }, 'External tool output');
    return {
      status: 'failed',
      error: new ExternalExitNonzeroError(this.toolName, result.exitCode, outputTail(result.output)),
    };
  }

  cancel(): boolean {
    return false;
  }
}
