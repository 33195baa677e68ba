export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: { write(line: string): void }) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};

/**
 * Logger that stamps a fixed component name and shared context onto every event so
 * call sites only supply the event and its data.
 */
export interface ComponentLogger {
  readonly name: string;
  debug(event: string, data?: Readonly<Record<string, unknown>>, elapsedMs?: number): void;
  info(event: string, data?: Readonly<Record<string, unknown>>, elapsedMs?: number): void;
  warn(event: string, data?: Readonly<Record<string, unknown>>, elapsedMs?: number): void;
  error(event: string, data?: Readonly<Record<string, unknown>>, elapsedMs?: number): void;
}

/**
 * Binds a structured logger to a component name.
 *
 * @param logger - Destination logger.
 * @param name - Component name recorded on each event.
 * @param context - Optional context merged into every event.
 * @returns A logger exposing one method per level.
 */
export function createComponentLogger(
  logger: StructuredLogger,
  name: string,
  context?: Readonly<Record<string, unknown>>,
): ComponentLogger {
  const emit =
    (level: LogLevel) =>
    (event: string, data?: Readonly<Record<string, unknown>>, elapsedMs?: number): void => {
      logger.log({
        level,
        name,
        event,
        ...(elapsedMs === undefined ? {} : { elapsedMs }),
        ...(context === undefined ? {} : { context }),
        ...(data === undefined ? {} : { data }),
      });
    };

  return {
    name,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
