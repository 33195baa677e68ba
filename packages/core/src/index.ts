export {
  createComponentLogger,
  JsonLineLogger,
  noopLogger,
  type ComponentLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  describeError,
  escapeHtml,
  formatCount,
  formatElapsed,
  serialiseError,
  type SerialisedError,
} from './reporting/index.js';

export {
  createNullDiagnosticsPort,
  createRecordingDiagnosticsPort,
  DiagnosticCategories,
  DiagnosticScopes,
  formatRenderingScope,
  formatSnapshotScope,
  type DiagnosticCategory,
  type DiagnosticEvent,
  type DiagnosticLevel,
  type DiagnosticsPort,
} from './instrumentation/index.js';

export {
  ConfigLoadError,
  ConfigValidationError,
  DEFAULT_CONFIG_FILES,
  loadConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from './config/index.js';
