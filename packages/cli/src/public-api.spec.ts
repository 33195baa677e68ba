import { describe, expect, it } from 'vitest';

import * as cli from './index.js';
import { createCliKernel } from './kernel/cli-kernel.js';
import { createProcessCliIo } from './io/cli-io.js';
import { CliExitCodes } from './kernel/types.js';
import {
  createDeckDiffCommandModule,
  deckDiffCommandModule,
} from './tools/deck-diff/deck-diff-command-module.js';
import { deckDiffConfigSchema, loadDeckDiffConfig } from './tools/deck-diff/config.js';

describe('CLI public API surface', () => {
  it('re-exports the kernel and the deck-diff command module', () => {
    expect(cli.createCliKernel).toBe(createCliKernel);
    expect(cli.createProcessCliIo).toBe(createProcessCliIo);
    expect(cli.CliExitCodes).toBe(CliExitCodes);
    expect(cli.deckDiffCommandModule).toBe(deckDiffCommandModule);
    expect(cli.createDeckDiffCommandModule).toBe(createDeckDiffCommandModule);
    expect(cli.deckDiffConfigSchema).toBe(deckDiffConfigSchema);
    expect(cli.loadDeckDiffConfig).toBe(loadDeckDiffConfig);
  });

  it('registers the deck-diff module under a stable id', () => {
    expect(deckDiffCommandModule.id).toBe('deck-diff');
  });
});
