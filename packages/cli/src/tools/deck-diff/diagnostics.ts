import type { DiagnosticEvent, DiagnosticLevel, DiagnosticsPort } from '@deckdiff/core';

import type { CliIo } from '../../io/cli-io.js';

export interface DiagnosticsPrinterOptions {
  readonly quiet: boolean;
  readonly color: boolean;
}

/**
 * Prints diagnostics to stderr, one line each, or discards them when quiet.
 */
export const createCliDiagnosticsPort = (
  options: DiagnosticsPrinterOptions,
  io: CliIo,
): DiagnosticsPort => {
  if (options.quiet) {
    return {
      emit() {
        // diagnostics suppressed
      },
    } satisfies DiagnosticsPort;
  }

  return {
    emit(event: DiagnosticEvent) {
      const message = formatDiagnostic(event);
      const decorated = options.color ? colorize(message, event.level) : message;
      io.writeErr(`${decorated}\n`);
    },
  } satisfies DiagnosticsPort;
};

/**
 * Formats a diagnostic as `[LEVEL] [category] scope: CODE message`, omitting absent parts.
 */
export const formatDiagnostic = (event: DiagnosticEvent): string => {
  const level = event.level.toUpperCase();
  const category = event.category ? `[${event.category}] ` : '';
  const scope = event.scope ? `${event.scope}: ` : '';
  const code = event.code ? `${event.code} ` : '';
  return `[${level}] ${category}${scope}${code}${event.message}`;
};

const colorize = (message: string, level: DiagnosticLevel): string =>
  `${LEVEL_COLORS[level]}${message}${COLOR_RESET}`;

const COLOR_RESET = '\u001B[0m';
const LEVEL_COLORS: Record<DiagnosticLevel, string> = {
  info: '\u001B[36m',
  warn: '\u001B[33m',
  error: '\u001B[31m',
};
