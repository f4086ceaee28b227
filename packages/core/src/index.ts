/**
 * @mediaconv/core
 * 
 * Core package containing:
 * - Conversion session state machine
 * - Error taxonomy
 * - Engine configuration
 * - Binary location
 * - Shared domain types
 */

// State machine
export {
  SessionStateMachine,
  isValidTransition,
  getNextPhases,
  isTerminalPhase,
} from './stateMachine.js';

export type {
  PhaseTransition,
} from './stateMachine.js';

// Types
export {
  MEDIA_KINDS,
  CONVERSION_PHASES,
} from './types/conversion.js';

export type {
  MediaKind,
  BackendChoice,
  ConversionPhase,
  TerminalPhase,
} from './types/conversion.js';

// Errors
export {
  ConversionError,
  InvalidRequestError,
  NoCompatiblePresetError,
  ToolMissingError,
  SpawnError,
  ExternalExitNonzeroError,
  ExportFailedError,
  InternalInconsistencyError,
  BusyError,
  StateTransitionError,
  ConfigurationError,
  type ConversionErrorCode,
} from './errors/index.js';

// Configuration
export {
  loadConfig,
  getConfig,
  type EngineConfig,
} from './config/index.js';

// Binary Location
export {
  locateBinary,
  isExecutableFile,
  type BinaryLookupOptions,
  type BinaryLocation,
} from './config/binaries.js';
