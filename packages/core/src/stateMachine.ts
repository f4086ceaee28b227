/**
 * Conversion Session State Machine
 * 
 * Strict state machine for one conversion session.
 * 
 * State Flow:
 * idle → classifying → backend-selected → in-progress → succeeded
 *              ↘ failed / cancelled (from classifying, backend-selected, in-progress)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal phases have no way out; a new request gets a new session
 */

import { StateTransitionError } from './errors/index.js';
import type { ConversionPhase, TerminalPhase } from './types/conversion.js';

/**
 * Represents a state transition with metadata
 */
export interface PhaseTransition {
  from: ConversionPhase;
  to: ConversionPhase;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each phase to the set of phases it can transition to
 */
const validTransitions: Record<ConversionPhase, ReadonlySet<ConversionPhase>> = {
  'idle': new Set<ConversionPhase>([
    'classifying',
  ]),
  'classifying': new Set<ConversionPhase>([
    'backend-selected',
    'failed',
    'cancelled',
  ]),
  'backend-selected': new Set<ConversionPhase>([
    'in-progress',
    'failed',
    'cancelled',
  ]),
  'in-progress': new Set<ConversionPhase>([
    'succeeded',
    'failed',
    'cancelled',
  ]),
  'succeeded': new Set<ConversionPhase>([]),
  'failed': new Set<ConversionPhase>([]),
  'cancelled': new Set<ConversionPhase>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: ConversionPhase, to: ConversionPhase): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next phases from the current phase
 */
export function getNextPhases(current: ConversionPhase): ConversionPhase[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalPhase(phase: ConversionPhase): phase is TerminalPhase {
  return phase === 'succeeded' || phase === 'failed' || phase === 'cancelled';
}

/**
 * Session State Machine class
 * Manages phase transitions with validation and history
 */
export class SessionStateMachine {
  private currentPhase: ConversionPhase;
  private history: PhaseTransition[];
  private readonly sessionId: string;

  constructor(sessionId: string, initialPhase: ConversionPhase = 'idle') {
    this.sessionId = sessionId;
    this.currentPhase = initialPhase;
    this.history = [];
  }

  /**
   * Get the current phase
   */
  getPhase(): ConversionPhase {
    return this.currentPhase;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<PhaseTransition> {
    return [...this.history];
  }

  canTransitionTo(targetPhase: ConversionPhase): boolean {
    return isValidTransition(this.currentPhase, targetPhase);
  }

  /**
   * Transition to a new phase
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetPhase: ConversionPhase,
    reason?: string,
    metadata?: Record<string, unknown>
  ): PhaseTransition {
    if (!this.canTransitionTo(targetPhase)) {
      throw new StateTransitionError(
        this.sessionId,
        this.currentPhase,
        targetPhase
      );
    }

    const transition: PhaseTransition = {
      from: this.currentPhase,
      to: targetPhase,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentPhase = targetPhase;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalPhase(this.currentPhase);
  }
}
