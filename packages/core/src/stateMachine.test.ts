import { describe, it, expect } from 'vitest';
import {
  SessionStateMachine,
  getNextPhases,
  isTerminalPhase,
  isValidTransition,
} from './stateMachine.js';
import { StateTransitionError } from './errors/index.js';

describe('isValidTransition', () => {
  it('allows the happy path in order', () => {
    expect(isValidTransition('idle', 'classifying')).toBe(true);
    expect(isValidTransition('classifying', 'backend-selected')).toBe(true);
    expect(isValidTransition('backend-selected', 'in-progress')).toBe(true);
    expect(isValidTransition('in-progress', 'succeeded')).toBe(true);
  });

  it('never reaches succeeded without going through in-progress', () => {
    expect(isValidTransition('classifying', 'succeeded')).toBe(false);
    expect(isValidTransition('backend-selected', 'succeeded')).toBe(false);
  });

  it('has no way out of terminal phases', () => {
    expect(getNextPhases('succeeded')).toEqual([]);
    expect(getNextPhases('failed')).toEqual([]);
    expect(getNextPhases('cancelled')).toEqual([]);
  });
});

describe('isTerminalPhase', () => {
  it('recognises the three terminal phases', () => {
    expect(isTerminalPhase('succeeded')).toBe(true);
    expect(isTerminalPhase('failed')).toBe(true);
    expect(isTerminalPhase('cancelled')).toBe(true);
    expect(isTerminalPhase('in-progress')).toBe(false);
  });
});

describe('SessionStateMachine', () => {
  it('records every transition', () => {
    const machine = new SessionStateMachine('session-1');
    machine.transitionTo('classifying');
    machine.transitionTo('failed', 'unknown media', { kind: 'unknown' });

    expect(machine.getPhase()).toBe('failed');
    expect(machine.isTerminal()).toBe(true);

    const history = machine.getHistory();
    expect(history.map(t => [t.from, t.to])).toEqual([
      ['idle', 'classifying'],
      ['classifying', 'failed'],
    ]);
    expect(history[1]?.reason).toBe('unknown media');
    expect(history[1]?.metadata).toEqual({ kind: 'unknown' });
  });

  it('throws on an invalid transition and keeps its phase', () => {
    const machine = new SessionStateMachine('session-2');

    expect(() => machine.transitionTo('in-progress')).toThrow(StateTransitionError);
    expect(() => machine.transitionTo('in-progress')).toThrow(
      'Invalid state transition from idle to in-progress'
    );
    expect(machine.getPhase()).toBe('idle');
    expect(machine.getHistory()).toEqual([]);
  });
});
