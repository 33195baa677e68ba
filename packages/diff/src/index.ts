export type {
  CardTemplate,
  Deck,
  DeckSnapshot,
  Note,
  NoteModel,
  NoteModelKind,
  RenderVariant,
} from './domain/deck.js';
export { DECK_PATH_SEPARATOR, countNotes, createEmptySnapshot } from './domain/deck.js';

export type {
  ContentChange,
  CosmeticKind,
  FieldChangeKind,
  FieldClassification,
  FieldDiff,
  NoteAddition,
  NoteChange,
  NoteChangeKind,
  NoteLocation,
  NoteModification,
  NoteRemoval,
  TagDelta,
} from './domain/changes.js';

export {
  DeckFileNotFoundError,
  DeckParseError,
  MissingNoteModelError,
  NoParentRevisionError,
  SnapshotNotFoundError,
  TemplateRenderError,
  type DeckParseErrorContext,
} from './domain/errors.js';

export {
  DefaultCosmeticClassifier,
  summarizeCosmeticKinds,
  type CosmeticClassifier,
} from './domain/strategies/cosmetic.js';
export {
  computeNoteChanges,
  flattenSnapshot,
  type FlattenedSnapshot,
  type NoteDifferOptions,
} from './domain/note-differ.js';

export { parseDeck, parseDeckJson, selectRenderVariant } from './parsing/deck-parser.js';

export {
  listClozeIndices,
  parseClozeMarkers,
  renderClozeText,
  type CardSide,
  type ClozeMarker,
} from './templating/cloze.js';
export {
  compileTemplate,
  createFieldValues,
  renderCompiledTemplate,
  renderTemplate,
  type CompiledTemplate,
  type FieldValues,
  type TemplateRenderOptions,
} from './templating/template-engine.js';

export type { NoteRenderOptions, NoteRenderer } from './rendering/note-renderer.js';
export { BasicNoteRenderer } from './rendering/basic-renderer.js';
export { ClozeNoteRenderer } from './rendering/cloze-renderer.js';
export {
  ImageOcclusionNoteRenderer,
  parseOcclusionShapes,
  type OcclusionShape,
} from './rendering/image-occlusion-renderer.js';
export { MultiFieldNoteRenderer } from './rendering/multi-field-renderer.js';
export { createRenderContext, type RenderContext } from './rendering/render-context.js';

export {
  assembleReport,
  summarizeReport,
  type AssembleReportOptions,
  type ReportEntry,
  type ReportSummary,
} from './reporting/assembler.js';
export { collectMediaReferences, extractMediaReferences } from './reporting/media-references.js';
export {
  createRunContext,
  type CreateRunContextOptions,
  type ReportRunContext,
} from './reporting/run-context.js';
export { formatReportAsHtml, type HtmlFormatterOptions } from './reporting/renderers/html.js';
export {
  createJsonPayload,
  formatReportAsJson,
  type DeckDiffJson,
  type JsonFormatterOptions,
} from './reporting/renderers/json.js';

export type {
  CommitInfo,
  DeckSnapshotSourcePort,
  RevisionLoader,
  SnapshotLabel,
  SnapshotSourceContext,
} from './application/ports/revision-loader.js';
export type { MediaResolution, MediaResolverPort } from './application/ports/media.js';
export {
  SnapshotLoadError,
  loadDeckSnapshots,
  type SnapshotLoadFailure,
} from './application/snapshot-loader.js';
export {
  runDeckDiffSession,
  type DeckDiffSessionDependencies,
  type DeckDiffSessionRequest,
  type DeckDiffSessionResult,
} from './application/diff-session.js';

export {
  GitCommandError,
  execFileCommandRunner,
  type CommandResult,
  type CommandRunner,
} from './adapters/git/command-runner.js';
export {
  DECK_FILE_NAME,
  GitRevisionLoader,
  type GitRevisionLoaderOptions,
} from './adapters/git/git-revision-loader.js';
export {
  createRevisionSnapshotSource,
  type RevisionSnapshotSourceOptions,
} from './adapters/git/git-snapshot-source.js';
export {
  createFileSnapshotSource,
  type FileSnapshotSources,
} from './adapters/file/file-snapshot-source.js';
export {
  FileSystemMediaHandler,
  MEDIA_DIRECTORY,
  type FileSystemMediaHandlerOptions,
} from './adapters/media/file-system-media-handler.js';
