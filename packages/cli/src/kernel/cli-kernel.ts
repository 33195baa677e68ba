import process from 'node:process';

import { describeError } from '@deckdiff/core';
import { Command, CommanderError } from 'commander';

import { createProcessCliIo, type CliIo } from '../io/cli-io.js';
import {
  CliExitCodes,
  type CliCommandModule,
  type CliGlobalOptions,
  type CliKernel,
  type CliKernelContext,
  type CliKernelOptions,
} from './types.js';

interface RunState {
  globalOptions: CliGlobalOptions;
  failed: boolean;
}

const createProgram = (options: CliKernelOptions, io: CliIo): Command =>
  new Command()
    .name(options.programName)
    .description(options.description ?? '')
    .version(options.version)
    .option('--json-logs', 'Emit machine-readable JSON logs on stderr.', false)
    .configureHelp({ sortOptions: true })
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    })
    .enablePositionalOptions()
    .showHelpAfterError('(add --help for usage information)')
    .exitOverride();

const readGlobalOptions = (program: Command): CliGlobalOptions => ({
  logFormat: program.opts<{ jsonLogs?: boolean }>().jsonLogs === true ? 'json' : 'pretty',
});

const formatUnexpectedError = (error: unknown): string => {
  const text = (error instanceof Error ? error.stack : undefined) ?? describeError(error);
  return text.endsWith('\n') ? text : `${text}\n`;
};

/**
 * Creates the `deck-diff` program. `run` resolves to the exit code instead of exiting:
 * a command reports unusable inputs through {@link CliKernelContext.fail}, commander
 * errors keep their own code and anything else thrown is a defect printed with its stack.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createProgram(options, io);
  const state: RunState = { globalOptions: { logFormat: 'pretty' }, failed: false };

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => state.globalOptions,
    fail(message) {
      state.failed = true;
      io.writeErr(`Error: ${message}\n`);
    },
  };

  program.hook('preAction', () => {
    state.globalOptions = readGlobalOptions(program);
  });

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      state.failed = false;

      try {
        await program.parseAsync([...argv], { from: 'node' });
        return state.failed ? CliExitCodes.inputFailure : CliExitCodes.success;
      } catch (error) {
        if (error instanceof CommanderError) {
          return error.exitCode;
        }

        io.writeErr(formatUnexpectedError(error));
        return CliExitCodes.unexpectedFailure;
      }
    },
  };
};
