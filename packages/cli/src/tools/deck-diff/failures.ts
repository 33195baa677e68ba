import { ConfigLoadError, ConfigValidationError } from '@deckdiff/core';
import {
  DeckFileNotFoundError,
  DeckParseError,
  GitCommandError,
  NoParentRevisionError,
  SnapshotLoadError,
  SnapshotNotFoundError,
  TemplateRenderError,
} from '@deckdiff/diff';

/**
 * Errors caused by the inputs of a run rather than by a defect. They are reported through
 * the kernel context as a single message without a stack trace.
 */
export const isInputFailure = (error: unknown): error is Error =>
  error instanceof SnapshotLoadError ||
  error instanceof DeckParseError ||
  error instanceof DeckFileNotFoundError ||
  error instanceof SnapshotNotFoundError ||
  error instanceof NoParentRevisionError ||
  error instanceof TemplateRenderError ||
  error instanceof GitCommandError ||
  error instanceof ConfigLoadError ||
  error instanceof ConfigValidationError;
