import { describe, expect, it } from 'vitest';

import { createProcessCliIo } from './cli-io.js';

const createStreams = (isTTY?: boolean) => {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    streams: {
      stdout: { write: (chunk: string) => stdout.push(chunk) },
      stderr: {
        ...(isTTY === undefined ? {} : { isTTY }),
        write: (chunk: string) => stderr.push(chunk),
      },
    },
  };
};

describe('createProcessCliIo', () => {
  it('keeps reports on stdout and everything else on stderr', () => {
    const { streams, stdout, stderr } = createStreams();
    const io = createProcessCliIo(streams);

    io.writeOut('{"summary":{}}\n');
    io.writeErr('No changes detected.\n');

    expect(stdout).toEqual(['{"summary":{}}\n']);
    expect(stderr).toEqual(['No changes detected.\n']);
  });

  it('is interactive only when stderr is a terminal', () => {
    expect(createProcessCliIo(createStreams(true).streams).interactive).toBe(true);
    expect(createProcessCliIo(createStreams(false).streams).interactive).toBe(false);
    expect(createProcessCliIo(createStreams().streams).interactive).toBe(false);
  });
});
