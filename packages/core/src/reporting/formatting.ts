const HTML_ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

const HTML_SPECIAL_CHARACTERS = /[&<>"']/g;

/**
 * Escapes text for HTML element content and for attribute values in either quote style.
 * Deck field values are rendered raw; everything else in a report passes through here.
 */
export function escapeHtml(value: string): string {
  return value.replaceAll(
    HTML_SPECIAL_CHARACTERS,
    (character) => HTML_ENTITIES[character] ?? character,
  );
}

/**
 * Formats a count with the matching singular or plural noun, e.g. `1 note` or `3 notes`.
 */
export function formatCount(count: number, singular: string, plural = `${singular}s`): string {
  return `${String(count)} ${count === 1 ? singular : plural}`;
}

/** Milliseconds below one second, seconds above: `12.3ms`, `4.21s`. */
export function formatElapsed(milliseconds: number): string {
  return milliseconds < 1000
    ? `${milliseconds.toFixed(1)}ms`
    : `${(milliseconds / 1000).toFixed(2)}s`;
}

/** One-line description of a thrown value: `Name: message` for errors. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return typeof error === 'string' ? error : String(error);
}

export interface SerialisedError {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
  /** Own fields of the error, such as the deck path, revision or per-side failures. */
  readonly details?: Readonly<Record<string, unknown>>;
  readonly cause?: SerialisedError;
}

const STANDARD_ERROR_KEYS = new Set(['name', 'message', 'stack', 'cause']);
const MAX_DETAIL_DEPTH = 4;

/**
 * Turns a thrown value into a JSON-safe payload for `run.failed` style log events. Errors
 * nested in fields (a snapshot failure's cause) and `cause` chains are serialised too.
 */
export function serialiseError(error: unknown, depth = 0): SerialisedError {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: describeError(error) };
  }

  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (!STANDARD_ERROR_KEYS.has(key)) {
      details[key] = toLoggable(value, depth + 1);
    }
  }

  return {
    name: error.name,
    message: error.message,
    ...(error.stack === undefined ? {} : { stack: error.stack }),
    ...(Object.keys(details).length === 0 ? {} : { details }),
    ...(error.cause === undefined || depth >= MAX_DETAIL_DEPTH
      ? {}
      : { cause: serialiseError(error.cause, depth + 1) }),
  };
}

function toLoggable(value: unknown, depth: number): unknown {
  if (value instanceof Error) {
    return depth > MAX_DETAIL_DEPTH ? describeError(value) : serialiseError(value, depth);
  }

  if (value === null || typeof value !== 'object') {
    return typeof value === 'bigint' ? value.toString() : value;
  }

  if (depth > MAX_DETAIL_DEPTH) {
    return '[Object]';
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => toLoggable(item, depth + 1));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [key, toLoggable(item, depth + 1)]),
  );
}
