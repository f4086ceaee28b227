/**
 * Custom Error Classes
 */

import type { ConversionPhase } from '../types/conversion.js';

export type ConversionErrorCode =
  | 'INVALID_REQUEST'
  | 'NO_COMPATIBLE_PRESET'
  | 'TOOL_MISSING'
  | 'SPAWN_ERROR'
  | 'EXTERNAL_EXIT_NONZERO'
  | 'EXPORT_FAILED'
  | 'INTERNAL_INCONSISTENCY'
  | 'BUSY'
  | 'STATE_TRANSITION_ERROR'
  | 'CONFIGURATION_ERROR';

/**
 * Base error class for all conversion errors
 */
export class ConversionError extends Error {
  public readonly code: ConversionErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ConversionErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConversionError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Request rejected before any backend work: malformed, unreadable source,
 * unrecognized media or a target that is illegal for the media kind
 */
export class InvalidRequestError extends ConversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', details);
    this.name = 'InvalidRequestError';
  }
}

/**
 * No candidate preset produced an export session for the output file type
 */
export class NoCompatiblePresetError extends ConversionError {
  constructor(fileType: string, presets: readonly string[]) {
    super(
      `No compatible export preset available for ${fileType.toUpperCase()}. Try a different format.`,
      'NO_COMPATIBLE_PRESET',
      { fileType, presets: [...presets] }
    );
    this.name = 'NoCompatiblePresetError';
  }
}

export class ToolMissingError extends ConversionError {
  constructor(tool: string, searched: readonly string[] = []) {
    super(
      `${tool} executable not found`,
      'TOOL_MISSING',
      { tool, searched: [...searched] }
    );
    this.name = 'ToolMissingError';
  }
}

/**
 * External process could not be started
 */
export class SpawnError extends ConversionError {
  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${command} failed to start: ${reason}`,
      'SPAWN_ERROR',
      { command },
      { cause }
    );
    this.name = 'SpawnError';
  }
}

/**
 * External process ran and exited with a nonzero code
 */
export class ExternalExitNonzeroError extends ConversionError {
  public readonly exitCode: number;

  constructor(command: string, exitCode: number, output: string) {
    super(
      `${command} conversion failed with code ${exitCode}.`,
      'EXTERNAL_EXIT_NONZERO',
      { command, exitCode, output: output.substring(0, 1000) }
    );
    this.name = 'ExternalExitNonzeroError';
    this.exitCode = exitCode;
  }
}

/**
 * Native export reported failure; the underlying reason is passed through
 */
export class ExportFailedError extends ConversionError {
  constructor(cause: Error | null) {
    super(
      cause?.message ?? 'Unknown conversion error.',
      'EXPORT_FAILED',
      undefined,
      { cause }
    );
    this.name = 'ExportFailedError';
  }
}

export class InternalInconsistencyError extends ConversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INTERNAL_INCONSISTENCY', details);
    this.name = 'InternalInconsistencyError';
  }
}

/**
 * A second request arrived while a session is active
 */
export class BusyError extends ConversionError {
  constructor(activeSessionId: string, phase: ConversionPhase) {
    super(
      'A conversion is already in progress',
      'BUSY',
      { activeSessionId, phase }
    );
    this.name = 'BusyError';
  }
}

/**
 * State transition error for invalid phase changes
 */
export class StateTransitionError extends ConversionError {
  constructor(
    sessionId: string,
    fromPhase: ConversionPhase,
    toPhase: ConversionPhase,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromPhase} to ${toPhase}`,
      'STATE_TRANSITION_ERROR',
      { sessionId, fromPhase, toPhase }
    );
    this.name = 'StateTransitionError';
  }
}

export class ConfigurationError extends ConversionError {
  constructor(message: string, issues: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', issues);
    this.name = 'ConfigurationError';
  }
}
