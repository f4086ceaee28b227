import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InternalInconsistencyError, InvalidRequestError, StateTransitionError } from '@mediaconv/core';
import { ConversionSession, type EventContext } from './session.js';
import { parseConversionRequest } from './request.js';
import type { ConversionBackend } from './backends/types.js';

function fakeBackend(cancelResult = true): ConversionBackend {
  return {
    kind: 'native',
    run: vi.fn<ConversionBackend['run']>(),
    cancel: vi.fn(() => cancelResult),
  };
}

describe('ConversionSession', () => {
  let queue: (() => void)[];
  let context: EventContext;
  let session: ConversionSession;
  let events: string[];

  const flush = () => {
    while (queue.length > 0) {
      queue.shift()?.();
    }
  };

  const toInProgress = (backend: ConversionBackend = fakeBackend()) => {
    session.beginClassifying();
    session.selectBackend('video', 'native');
    session.start('/media/clip.mp4', backend);
  };

  beforeEach(() => {
    queue = [];
    context = task => {
      queue.push(task);
    };
    session = new ConversionSession(
      'session-1',
      parseConversionRequest({ sourcePath: '/media/clip.mov', target: 'mp4' }),
      context
    );
    events = [];
    session.on('status', message => events.push(`status:${message}`));
    session.on('progress', event => events.push(`progress:${event.fraction}`));
    session.on('succeeded', event => events.push(`succeeded:${event.destinationPath}`));
    session.on('failed', event => events.push(`failed:${event.reason}`));
    session.on('cancelled', () => events.push('cancelled'));
  });

  it('starts idle with no progress', () => {
    expect(session.phase).toBe('idle');
    expect(session.progress).toBe(0);
    expect(session.kind).toBeNull();
    expect(session.backendKind).toBeNull();
    expect(session.destinationPath).toBeNull();
  });

  it('records the path through the phases', () => {
    toInProgress();

    expect(session.phase).toBe('in-progress');
    expect(session.kind).toBe('video');
    expect(session.backendKind).toBe('native');
    expect(session.destinationPath).toBe('/media/clip.mp4');
    expect(session.getHistory().map(t => t.to)).toEqual(['classifying', 'backend-selected', 'in-progress']);
  });

  it('refuses to resolve the destination twice', () => {
    toInProgress();

    expect(() => session.start('/media/clip (1).mp4', fakeBackend())).toThrow(InternalInconsistencyError);
    expect(() => session.start('/media/clip (1).mp4', fakeBackend())).toThrow(
      'Destination already resolved for this session'
    );
    expect(session.destinationPath).toBe('/media/clip.mp4');
  });

  it('rejects phase skips', () => {
    expect(() => session.selectBackend('video', 'native')).toThrow(StateTransitionError);
  });

  describe('progress', () => {
    it('ignores samples before the backend starts', () => {
      session.beginClassifying();
      session.reportProgress(0.3);
      flush();

      expect(session.progress).toBe(0);
      expect(events).toEqual([]);
    });

    it('never moves backwards and holds below 1 until success', () => {
      toInProgress();
      session.reportProgress(0.2);
      session.reportProgress(0.1);
      session.reportProgress(0.5);
      session.reportProgress(1);
      session.reportProgress(Number.NaN);
      flush();

      expect(session.progress).toBe(0.5);
      expect(events).toEqual(['progress:0.2', 'progress:0.5']);
    });
  });

  describe('finish', () => {
    it('reaches 1 and reports the saved file before the success event', async () => {
      toInProgress();
      session.reportProgress(0.4);
      const onDelivered = vi.fn();

      session.finish({ status: 'succeeded', destinationPath: '/media/clip.mp4' }, onDelivered);

      expect(session.phase).toBe('succeeded');
      expect(session.progress).toBe(1);
      expect(events).toEqual([]);
      expect(onDelivered).not.toHaveBeenCalled();

      flush();

      expect(events).toEqual([
        'progress:0.4',
        'progress:1',
        'status:Saved to clip.mp4',
        'succeeded:/media/clip.mp4',
      ]);
      expect(onDelivered).toHaveBeenCalledTimes(1);
      await expect(session.outcome).resolves.toEqual({
        status: 'succeeded',
        destinationPath: '/media/clip.mp4',
      });
    });

    it('delivers a failure with a readable reason and no final progress', async () => {
      const error = new InvalidRequestError('Selected file is not recognized as audio or video.');
      session.beginClassifying();

      session.finish({ status: 'failed', error }, () => {});
      flush();

      expect(session.phase).toBe('failed');
      expect(events).toEqual([
        'status:Failed.',
        'failed:Selected file is not recognized as audio or video.',
      ]);
      expect(session.getHistory().at(-1)?.reason).toBe('Selected file is not recognized as audio or video.');
      await expect(session.outcome).resolves.toEqual({ status: 'failed', error });
    });

    it('delivers cancellation', () => {
      toInProgress();

      session.finish({ status: 'cancelled' }, () => {});
      flush();

      expect(events).toEqual(['status:Cancelled.', 'cancelled']);
    });

    it('delivers nothing after the terminal event', () => {
      toInProgress();
      session.finish({ status: 'cancelled' }, () => {});

      session.reportStatus('Converting video…');
      session.reportProgress(0.9);
      flush();

      expect(events).toEqual(['status:Cancelled.', 'cancelled']);
    });

    it('can only finish once', () => {
      toInProgress();
      session.finish({ status: 'cancelled' }, () => {});

      expect(() => session.finish({ status: 'cancelled' }, () => {})).toThrow(InternalInconsistencyError);
      expect(() => session.finish({ status: 'cancelled' }, () => {})).toThrow(
        'Session session-1 already finished'
      );
    });
  });

  describe('cancel', () => {
    it('records a request made before the backend starts', () => {
      session.beginClassifying();

      expect(session.cancel()).toBe(true);
      expect(session.isCancelRequested).toBe(true);
    });

    it('forwards to the running backend', () => {
      const backend = fakeBackend(false);
      toInProgress(backend);

      expect(session.cancel()).toBe(false);
      expect(backend.cancel).toHaveBeenCalledTimes(1);
      expect(session.isCancelRequested).toBe(false);
    });

    it('does nothing once terminal', () => {
      toInProgress();
      session.finish({ status: 'succeeded', destinationPath: '/media/clip.mp4' }, () => {});

      expect(session.cancel()).toBe(false);
    });
  });
});
