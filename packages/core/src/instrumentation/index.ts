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
} from './diagnostics.js';
