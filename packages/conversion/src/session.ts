/**
 * Conversion Session
 * 
 * Per-request state and the caller-facing event stream. Events are
 * delivered through the caller's event context, in the order they were
 * raised, and nothing is delivered after the terminal event.
 * 
 * Events:
 * - status    (message: string)
 * - progress  (event: ProgressEvent)
 * - succeeded (event: { destinationPath })
 * - failed    (event: { error, reason })
 * - cancelled ()
 */

import { EventEmitter } from 'node:events';
import {
  InternalInconsistencyError,
  SessionStateMachine,
  type BackendChoice,
  type ConversionError,
  type ConversionPhase,
  type MediaKind,
  type PhaseTransition,
} from '@mediaconv/core';
import type { ConversionBackend } from './backends/types.js';
import type { ConversionRequest } from './request.js';

export interface ProgressEvent {
  fraction: number;
}

export interface SucceededEvent {
  destinationPath: string;
}

export interface FailedEvent {
  error: ConversionError;
  /** Human-readable, ready to show */
  reason: string;
}

export type ConversionOutcome =
  | { status: 'succeeded'; destinationPath: string }
  | { status: 'failed'; error: ConversionError }
  | { status: 'cancelled' };

/**
 * Runs a task on the caller's event context
 */
export type EventContext = (task: () => void) => void;

export const defaultEventContext: EventContext = task => {
  setImmediate(task);
};

export interface ConversionSession {
  on(event: 'status', listener: (message: string) => void): this;
  on(event: 'progress', listener: (event: ProgressEvent) => void): this;
  on(event: 'succeeded', listener: (event: SucceededEvent) => void): this;
  on(event: 'failed', listener: (event: FailedEvent) => void): this;
  on(event: 'cancelled', listener: () => void): this;
  once(event: 'status', listener: (message: string) => void): this;
  once(event: 'progress', listener: (event: ProgressEvent) => void): this;
  once(event: 'succeeded', listener: (event: SucceededEvent) => void): this;
  once(event: 'failed', listener: (event: FailedEvent) => void): this;
  once(event: 'cancelled', listener: () => void): this;
}

export class ConversionSession extends EventEmitter {
  readonly id: string;
  readonly request: ConversionRequest | null;
  /** Resolves after the terminal event has been delivered */
  readonly outcome: Promise<ConversionOutcome>;

  private readonly machine: SessionStateMachine;
  private readonly deliver: EventContext;
  private settleOutcome: (outcome: ConversionOutcome) => void = () => {};

  private currentProgress = 0;
  private mediaKind: MediaKind | null = null;
  private backendChoice: BackendChoice | null = null;
  private destination: string | null = null;
  private backend: ConversionBackend | null = null;
  private cancelRequested = false;
  private finished = false;

  constructor(id: string, request: ConversionRequest | null, deliver: EventContext) {
    super();
    this.id = id;
    this.request = request;
    this.deliver = deliver;
    this.machine = new SessionStateMachine(id);
    this.outcome = new Promise(resolve => {
      this.settleOutcome = resolve;
    });
  }

  get phase(): ConversionPhase {
    return this.machine.getPhase();
  }

  get progress(): number {
    return this.currentProgress;
  }

  get kind(): MediaKind | null {
    return this.mediaKind;
  }

  get backendKind(): BackendChoice | null {
    return this.backendChoice;
  }

  get destinationPath(): string | null {
    return this.destination;
  }

  get isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  getHistory(): ReadonlyArray<PhaseTransition> {
    return this.machine.getHistory();
  }

  /**
   * Request cancellation. Before the backend starts the request is
   * recorded and honoured before any work; once running it is forwarded to
   * the backend. Returns false when nothing will be cancelled.
   */
  cancel(): boolean {
    if (this.machine.isTerminal()) {
      return false;
    }
    if (this.backend) {
      return this.backend.cancel();
    }
    this.cancelRequested = true;
    return true;
  }

  /** @internal */
  beginClassifying(): void {
    this.machine.transitionTo('classifying');
  }

  /** @internal */
  selectBackend(kind: MediaKind, choice: BackendChoice): void {
    this.mediaKind = kind;
    this.backendChoice = choice;
    this.machine.transitionTo('backend-selected', undefined, { kind, backend: choice });
  }

  /**
   * Enter in-progress with a fixed destination and the backend that will drive it
   * @internal
   */
  start(destination: string, backend: ConversionBackend): void {
    if (this.destination !== null) {
      throw new InternalInconsistencyError('Destination already resolved for this session', {
        sessionId: this.id,
      });
    }
    this.machine.transitionTo('in-progress', undefined, { destination });
    this.destination = destination;
    this.backend = backend;
    this.currentProgress = 0;
  }

  /**
   * Record a progress sample. Samples that would move progress backwards,
   * or reach 1 before success, are dropped.
   * @internal
   */
  reportProgress(fraction: number): void {
    if (this.phase !== 'in-progress' || !Number.isFinite(fraction)) return;
    if (fraction < this.currentProgress || fraction >= 1) return;

    this.currentProgress = fraction;
    this.raise('progress', { fraction });
  }

  /** @internal */
  reportStatus(message: string): void {
    if (this.finished) return;
    this.raise('status', message);
  }

  /**
   * Move to the terminal phase and deliver the terminal event.
   * `onDelivered` runs right after the outcome has been settled.
   * @internal
   */
  finish(outcome: ConversionOutcome, onDelivered: () => void): void {
    if (this.finished) {
      throw new InternalInconsistencyError(`Session ${this.id} already finished`, { sessionId: this.id });
    }

    this.machine.transitionTo(outcome.status, outcome.status === 'failed' ? outcome.error.message : undefined);
    this.backend = null;

    if (outcome.status === 'succeeded') {
      this.currentProgress = 1;
      this.raise('progress', { fraction: 1 });
    }

    switch (outcome.status) {
      case 'succeeded':
        this.raise('status', `Saved to ${baseName(outcome.destinationPath)}`);
        break;
      case 'failed':
        this.raise('status', 'Failed.');
        break;
      case 'cancelled':
        this.raise('status', 'Cancelled.');
        break;
    }
    this.finished = true;

    this.deliver(() => {
      switch (outcome.status) {
        case 'succeeded':
          this.emit('succeeded', { destinationPath: outcome.destinationPath });
          break;
        case 'failed':
          this.emit('failed', { error: outcome.error, reason: outcome.error.message });
          break;
        case 'cancelled':
          this.emit('cancelled');
          break;
      }
      this.settleOutcome(outcome);
      onDelivered();
    });
  }

  private raise(event: 'status' | 'progress', payload: string | ProgressEvent): void {
    this.deliver(() => {
      this.emit(event, payload);
    });
  }
}

function baseName(path: string): string {
  return path.split(/[\\/]/).pop() ?? path;
}
