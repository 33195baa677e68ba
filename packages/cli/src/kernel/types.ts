import type { Command } from 'commander';

import type { CliIo } from '../io/cli-io.js';

export type CliLogFormat = 'pretty' | 'json';

/** Options given before the command name, shared by `commit` and `compare`. */
export interface CliGlobalOptions {
  readonly logFormat: CliLogFormat;
}

export const CliExitCodes = {
  success: 0,
  /** The inputs of a run were unusable: a deck file, revision, template or configuration. */
  inputFailure: 1,
  /** A defect (sysexits `EX_SOFTWARE`); the error is printed with its stack. */
  unexpectedFailure: 70,
} as const;

export type CliExitCode = (typeof CliExitCodes)[keyof typeof CliExitCodes];

export interface CliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export interface CliKernelContext {
  readonly io: CliIo;
  readonly getGlobalOptions: () => CliGlobalOptions;
  /**
   * Ends the run as an input failure: prints `Error: <message>` on stderr and makes the
   * kernel return {@link CliExitCodes.inputFailure}.
   */
  fail(message: string): void;
}

export interface CliCommandModule {
  readonly id: string;
  register(program: Command, context: CliKernelContext): void;
}

export interface CliKernel {
  register(module: CliCommandModule): CliKernel;
  /** Parses `argv` (node executable and script first) and resolves to the exit code. */
  run(argv?: readonly string[]): Promise<number>;
}
