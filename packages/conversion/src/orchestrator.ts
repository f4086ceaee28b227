/**
 * Conversion Orchestrator
 * 
 * Drives one conversion at a time:
 * idle → classifying → backend-selected → in-progress → succeeded | failed | cancelled
 * 
 * Rules:
 * - The backend is chosen once per session and never changes
 * - The destination is resolved once, before any backend work
 * - The backend's outcome is forwarded as-is
 * - Completion hooks run after the session is terminal and cannot change it
 */

import { access, constants } from 'node:fs/promises';
import { basename } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  BusyError,
  ConversionError,
  InternalInconsistencyError,
  InvalidRequestError,
  type BackendChoice,
  type ConversionPhase,
  type MediaKind,
} from '@mediaconv/core';
import { createLogger, formatDuration, type Logger } from '@mediaconv/utils';
import type { BackendJob, ConversionBackend } from './backends/types.js';
import { noopCompletionHooks, type CompletionHooks } from './completion.js';
import { resolveDestination, type ExistsCheck } from './destinationResolver.js';
import {
  classifyMedia,
  isLegacyContainer,
  isLegalTarget,
  legalTargets,
} from './formatClassifier.js';
import { describeFormat, type TargetFormat } from './formats.js';
import { selectPresets } from './presets.js';
import { parseConversionRequest, type ConversionRequest } from './request.js';
import {
  ConversionSession,
  defaultEventContext,
  type ConversionOutcome,
  type EventContext,
} from './session.js';

export interface OrchestratorOptions {
  /** Builds the backend for a session; called once per session */
  createBackend: (choice: BackendChoice) => ConversionBackend;
  hooks?: CompletionHooks;
  eventContext?: EventContext;
  exists?: ExistsCheck;
  logger?: Logger;
}

export type SubmitResult =
  | { accepted: true; session: ConversionSession }
  | { accepted: false; error: BusyError };

export interface SourceInspection {
  kind: MediaKind;
  targets: readonly TargetFormat[];
}

export class ConversionOrchestrator {
  private readonly createBackend: (choice: BackendChoice) => ConversionBackend;
  private readonly hooks: CompletionHooks;
  private readonly eventContext: EventContext;
  private readonly exists: ExistsCheck | undefined;
  private readonly log: Logger;
  private active: ConversionSession | null = null;

  constructor(options: OrchestratorOptions) {
    this.createBackend = options.createBackend;
    this.hooks = options.hooks ?? noopCompletionHooks;
    this.eventContext = options.eventContext ?? defaultEventContext;
    this.exists = options.exists;
    this.log = options.logger ?? createLogger({ component: 'orchestrator' });
  }

  get phase(): ConversionPhase {
    return this.active?.phase ?? 'idle';
  }

  get isBusy(): boolean {
    return this.active !== null;
  }

  /**
   * Classify a picked file and list the formats it may be converted to
   */
  inspect(sourcePath: string, declaredContentType?: string): SourceInspection {
    const kind = classifyMedia(sourcePath, declaredContentType);
    return { kind, targets: legalTargets(kind) };
  }

  /**
   * Start a conversion. Returns immediately; progress and the outcome
   * arrive through the session's events.
   */
  submit(input: unknown): SubmitResult {
    if (this.active) {
      this.log.warn({ activeSessionId: this.active.id, phase: this.active.phase }, 'Rejected request while busy');
      return { accepted: false, error: new BusyError(this.active.id, this.active.phase) };
    }

    let request: ConversionRequest | null = null;
    let rejection: InvalidRequestError | null = null;
    try {
      request = parseConversionRequest(input);
    } catch (error) {
      if (!(error instanceof InvalidRequestError)) throw error;
      rejection = error;
    }

    const session = new ConversionSession(randomUUID(), request, this.eventContext);
    this.active = session;

    this.drive(session, rejection).catch((error: unknown) => {
      this.log.error({ err: error, sessionId: session.id }, 'Failed to deliver conversion outcome');
    });

    return { accepted: true, session };
  }

  private async drive(session: ConversionSession, rejection: InvalidRequestError | null): Promise<void> {
    const log = this.log.child({ sessionId: session.id });
    const startedAt = Date.now();

    let outcome: ConversionOutcome;
    try {
      outcome = await this.convert(session, rejection, log);
    } catch (error) {
      log.error({ err: error }, 'Conversion pipeline threw');
      outcome = {
        status: 'failed',
        error: error instanceof ConversionError
          ? error
          : new InternalInconsistencyError('Conversion stopped unexpectedly', {
            reason: error instanceof Error ? error.message : String(error),
          }),
      };
    }

    log.info({
      status: outcome.status,
      reason: outcome.status === 'failed' ? outcome.error.message : undefined,
      duration: formatDuration(Date.now() - startedAt),
    }, 'Conversion finished');

    session.finish(outcome, () => {
      if (this.active === session) {
        this.active = null;
      }
      if (outcome.status === 'succeeded') {
        this.fireCompletionHooks(outcome.destinationPath, log);
      }
    });
  }

  private async convert(
    session: ConversionSession,
    rejection: InvalidRequestError | null,
    log: Logger
  ): Promise<ConversionOutcome> {
    // Let the caller subscribe before anything happens
    await Promise.resolve();

    session.beginClassifying();
    if (rejection || !session.request) {
      return { status: 'failed', error: rejection ?? new InvalidRequestError('Missing conversion request') };
    }
    const request = session.request;

    try {
      await access(request.sourcePath, constants.R_OK);
    } catch {
      return {
        status: 'failed',
        error: new InvalidRequestError(`Source file not accessible: ${request.sourcePath}`, {
          sourcePath: request.sourcePath,
        }),
      };
    }

    const kind = classifyMedia(request.sourcePath, request.declaredContentType);
    if (kind === 'unknown') {
      return {
        status: 'failed',
        error: new InvalidRequestError('Selected file is not recognized as audio or video.', {
          sourcePath: request.sourcePath,
        }),
      };
    }
    if (!isLegalTarget(kind, request.target)) {
      return {
        status: 'failed',
        error: new InvalidRequestError(
          `Selected file is ${kind}; ${describeFormat(request.target).label} is not a valid ${kind} target.`,
          { kind, target: request.target }
        ),
      };
    }
    if (session.isCancelRequested) {
      return { status: 'cancelled' };
    }

    const choice: BackendChoice = isLegacyContainer(request.sourcePath) ? 'external-tool' : 'native';
    session.selectBackend(kind, choice);
    session.reportStatus(kind === 'video' ? 'Preparing video…' : 'Preparing audio…');
    log.info({ source: request.sourcePath, target: request.target, kind, backend: choice }, 'Backend selected');

    const format = describeFormat(request.target);
    const destination = resolveDestination(request.sourcePath, format.extension, this.exists);
    const candidates = choice === 'native'
      ? selectPresets({ kind, target: request.target, compress: request.compress, qualityLevel: request.qualityLevel })
      : [];

    if (session.isCancelRequested) {
      return { status: 'cancelled' };
    }

    const backend = this.createBackend(choice);
    session.start(destination, backend);
    log.info({ destination, candidates }, 'Conversion started');

    const job: BackendJob = {
      source: { path: request.sourcePath, kind },
      destination,
      target: request.target,
      candidates,
    };

    const converting = choice === 'external-tool'
      ? 'Converting AVI via ffmpeg…'
      : kind === 'video' ? 'Converting video…' : 'Converting audio…';

    const result = await backend.run(
      job,
      fraction => session.reportProgress(fraction),
      () => session.reportStatus(converting)
    );

    switch (result.status) {
      case 'succeeded':
        return { status: 'succeeded', destinationPath: destination };
      case 'failed':
        return { status: 'failed', error: result.error };
      case 'cancelled':
        return { status: 'cancelled' };
    }
  }

  /**
   * Fire-and-forget: failures are logged and otherwise ignored
   */
  private fireCompletionHooks(destinationPath: string, log: Logger): void {
    const fileName = basename(destinationPath);
    const calls: [string, () => void | Promise<void>][] = [
      ['revealFile', () => this.hooks.revealFile(destinationPath)],
      ['playSound', () => this.hooks.playSound()],
      ['postNotification', () => this.hooks.postNotification({
        title: 'Conversion Complete',
        body: `${fileName} is ready.`,
      })],
    ];

    for (const [name, call] of calls) {
      try {
        Promise.resolve(call()).catch((error: unknown) => {
          log.debug({ err: error, hook: name }, 'Completion hook failed');
        });
      } catch (error) {
        log.debug({ err: error, hook: name }, 'Completion hook failed');
      }
    }
  }
}
