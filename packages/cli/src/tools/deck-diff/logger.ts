import {
  formatElapsed,
  JsonLineLogger,
  noopLogger,
  type StructuredLogEvent,
  type StructuredLogger,
} from '@deckdiff/core';

import type { CliIo } from '../../io/cli-io.js';
import type { CliLogFormat } from '../../kernel/types.js';

/**
 * Selects the run logger: JSON lines on stderr for `--json-logs`, a one-line-per-event
 * logger when stderr is a terminal, and no logging otherwise. Stdout stays free for
 * reports.
 */
export const createCliLogger = (format: CliLogFormat, io: CliIo): StructuredLogger => {
  if (format === 'json') {
    return new JsonLineLogger({ write: (line) => io.writeErr(line) });
  }

  if (io.interactive) {
    return {
      log(entry: StructuredLogEvent) {
        io.writeErr(`${formatLogLine(entry)}\n`);
      },
    } satisfies StructuredLogger;
  }

  return noopLogger;
};

export const formatLogLine = (entry: StructuredLogEvent): string => {
  const elapsed = entry.elapsedMs === undefined ? '' : ` (${formatElapsed(entry.elapsedMs)})`;
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.level}] ${entry.name} ${entry.event}${elapsed}${data}`;
};
