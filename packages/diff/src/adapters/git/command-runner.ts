import { execFile } from 'node:child_process';

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandRunOptions {
  readonly cwd: string;
}

/**
 * Runs an executable and resolves with its exit code and output. A non-zero exit code
 * resolves normally; only failures to start the process reject.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandRunOptions,
) => Promise<CommandResult>;

const MAX_BUFFER_BYTES = 256 * 1024 * 1024;

export const execFileCommandRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { cwd: options.cwd, encoding: 'utf8', maxBuffer: MAX_BUFFER_BYTES },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        reject(error);
      },
    );
  });

export class GitCommandError extends Error {
  override readonly name = 'GitCommandError';
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: readonly string[], result: CommandResult) {
    super(
      `git ${args.join(' ')} exited with code ${String(result.exitCode)}: ` +
        result.stderr.trim(),
    );
    Object.setPrototypeOf(this, new.target.prototype);
    this.args = args;
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}
