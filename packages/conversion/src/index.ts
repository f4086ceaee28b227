/**
 * @mediaconv/conversion
 * 
 * Conversion orchestration engine.
 * 
 * RULES:
 * - One session per orchestrator at a time
 * - AVI goes through the external tool; everything else through export sessions
 * - Never overwrite an existing file
 * - Exactly one terminal event per session
 */

// Orchestrator
export {
  ConversionOrchestrator,
  type OrchestratorOptions,
  type SubmitResult,
  type SourceInspection,
} from './orchestrator.js';

export {
  createOrchestrator,
  createFFmpegLocator,
  lookupFFmpeg,
  lookupFFprobe,
  type CreateOrchestratorOptions,
} from './createOrchestrator.js';

// Sessions and events
export {
  ConversionSession,
  defaultEventContext,
  type ConversionOutcome,
  type EventContext,
  type ProgressEvent,
  type SucceededEvent,
  type FailedEvent,
} from './session.js';

// Requests
export {
  conversionRequestSchema,
  parseConversionRequest,
  type ConversionRequest,
  type ConversionRequestInput,
} from './request.js';

// Formats and classification
export {
  VIDEO_FORMATS,
  AUDIO_FORMATS,
  TARGET_FORMATS,
  describeFormat,
  type VideoFormat,
  type AudioFormat,
  type TargetFormat,
  type OutputFileType,
  type FormatDescriptor,
} from './formats.js';

export {
  classifyMedia,
  conformingKind,
  legalTargets,
  isLegalTarget,
  isLegacyContainer,
  LEGACY_CONTAINER_EXTENSIONS,
} from './formatClassifier.js';

export { resolveDestination, type ExistsCheck } from './destinationResolver.js';

// Presets
export {
  PRESET_NAMES,
  QUALITY_LEVELS,
  QUALITY_PRESETS,
  selectPresets,
  type PresetName,
  type QualityLevel,
  type PresetSelection,
} from './presets.js';

// Backends
export {
  NativeTranscodeBackend,
  DEFAULT_PROGRESS_INTERVAL_MS,
  type NativeBackendOptions,
} from './backends/native.js';

export {
  ExternalToolBackend,
  type ExternalToolBackendOptions,
  type ToolLocator,
  type ToolLookup,
} from './backends/externalTool.js';

export type {
  BackendJob,
  BackendOutcome,
  ConversionBackend,
  ProgressCallback,
  StartedCallback,
} from './backends/types.js';

// Export sessions
export type {
  ExportSession,
  ExportSessionFactory,
  ExportStatus,
  ExportOptions,
  MediaAsset,
} from './exportSession.js';

export {
  FFmpegExportSession,
  FFmpegExportSessionFactory,
  type FFmpegExportSessionOptions,
} from './ffmpeg/exportSession.js';

export { buildExportArgs, PRESET_FILE_TYPES, CRF_LEVELS } from './ffmpeg/encoders.js';
export { FFProbe, canStreamCopy, type StreamCodecs } from './ffmpeg/ffprobe.js';
export { FFmpegProgressParser } from './ffmpeg/progressParser.js';
export { FFmpegCommandBuilder } from './ffmpeg/commandBuilder.js';

// Completion hooks
export {
  createDesktopHooks,
  noopCompletionHooks,
  type CompletionHooks,
  type CompletionNotification,
  type DesktopHooksOptions,
} from './completion.js';
