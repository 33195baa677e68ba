import { noopLogger } from '@deckdiff/core';
import { describe, expect, it } from 'vitest';

import { MemoryCliIo } from '../../testing/memory-cli-io.js';
import { createCliLogger, formatLogLine } from './logger.js';

describe('createCliLogger', () => {
  it('writes JSON lines to stderr when JSON logs are requested', () => {
    const io = new MemoryCliIo();
    const logger = createCliLogger('json', io);

    logger.log({ level: 'info', name: 'deck-diff.session', event: 'report.assembled' });

    const line: unknown = JSON.parse(io.stderrBuffer);
    expect(line).toMatchObject({
      level: 'info',
      name: 'deck-diff.session',
      event: 'report.assembled',
    });
    expect(io.stdoutBuffer).toBe('');
  });

  it('prints readable lines when stderr is a terminal', () => {
    const io = new MemoryCliIo({ interactive: true });
    const logger = createCliLogger('pretty', io);

    logger.log({ level: 'debug', name: 'deck-diff.git', event: 'git.command' });

    expect(io.stderrBuffer).toBe('[debug] deck-diff.git git.command\n');
  });

  it('stays silent when stderr is not a terminal', () => {
    expect(createCliLogger('pretty', new MemoryCliIo())).toBe(noopLogger);
  });
});

describe('formatLogLine', () => {
  it('appends the elapsed time and event data', () => {
    expect(
      formatLogLine({
        level: 'info',
        name: 'deck-diff.session',
        event: 'report.assembled',
        elapsedMs: 12.34,
        data: { entries: 2 },
      }),
    ).toBe('[info] deck-diff.session report.assembled (12.3ms) {"entries":2}');
  });
});
