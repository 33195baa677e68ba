export interface DeckParseErrorContext {
  /** JSON path of the offending element, e.g. `$.children[0].notes[3]`. */
  readonly path: string;
  readonly deckPath?: string;
  readonly guid?: string;
}

export class DeckParseError extends Error {
  override readonly name: string = 'DeckParseError';
  readonly path: string;
  readonly deckPath: string | undefined;
  readonly guid: string | undefined;

  constructor(message: string, context: DeckParseErrorContext) {
    super(formatParseMessage(message, context));
    Object.setPrototypeOf(this, new.target.prototype);
    this.path = context.path;
    this.deckPath = context.deckPath;
    this.guid = context.guid;
  }
}

export class MissingNoteModelError extends DeckParseError {
  override readonly name: string = 'MissingNoteModelError';
  readonly modelId: string;

  constructor(modelId: string, context: DeckParseErrorContext) {
    super(`Note references unknown note model "${modelId}"`, context);
    Object.setPrototypeOf(this, new.target.prototype);
    this.modelId = modelId;
  }
}

export class TemplateRenderError extends Error {
  override readonly name = 'TemplateRenderError';
  readonly tag: string;
  readonly offset: number;

  constructor(message: string, tag: string, offset: number) {
    super(`${message} at offset ${String(offset)}: ${tag}`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.tag = tag;
    this.offset = offset;
  }
}

export class SnapshotNotFoundError extends Error {
  override readonly name = 'SnapshotNotFoundError';
  readonly path: string;
  readonly revision: string | undefined;

  constructor(path: string, revision?: string) {
    super(
      revision === undefined
        ? `Deck file not found: ${path}`
        : `Deck file ${path} does not exist at revision ${revision}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
    this.path = path;
    this.revision = revision;
  }
}

/**
 * An explicitly named deck file is absent. Unlike {@link SnapshotNotFoundError} this is
 * never read as an empty deck.
 */
export class DeckFileNotFoundError extends Error {
  override readonly name = 'DeckFileNotFoundError';
  readonly path: string;

  constructor(path: string) {
    super(`Deck file ${path} does not exist`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.path = path;
  }
}

export class NoParentRevisionError extends Error {
  override readonly name = 'NoParentRevisionError';
  readonly revision: string;

  constructor(revision: string) {
    super(`Revision ${revision} has no parent revision to compare against`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.revision = revision;
  }
}

function formatParseMessage(message: string, context: DeckParseErrorContext): string {
  const location = [
    context.deckPath ? `deck "${context.deckPath}"` : undefined,
    context.guid ? `note ${context.guid}` : undefined,
  ].filter((part): part is string => part !== undefined);

  const suffix = location.length > 0 ? ` (${location.join(', ')})` : '';
  return `${message} at ${context.path}${suffix}`;
}
