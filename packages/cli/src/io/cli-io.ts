import process from 'node:process';

/**
 * Output channels of a run. Reports go to stdout when no output file is given; summaries,
 * diagnostics, logs and errors always go to stderr.
 */
export interface CliIo {
  /** Whether stderr is a terminal: diagnostics are coloured and log events are printed. */
  readonly interactive: boolean;
  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
}

/** The part of `process` the command line writes to. */
export interface StandardStreams {
  readonly stdout: { write(chunk: string): unknown };
  readonly stderr: { write(chunk: string): unknown; readonly isTTY?: boolean };
}

export const createProcessCliIo = (streams: StandardStreams = process): CliIo => ({
  interactive: streams.stderr.isTTY === true,
  writeOut: (chunk) => {
    streams.stdout.write(chunk);
  },
  writeErr: (chunk) => {
    streams.stderr.write(chunk);
  },
});
