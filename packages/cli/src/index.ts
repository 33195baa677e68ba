export { createCliKernel } from './kernel/cli-kernel.js';
export {
  CliExitCodes,
  type CliCommandModule,
  type CliExitCode,
  type CliGlobalOptions,
  type CliKernel,
  type CliKernelContext,
  type CliKernelOptions,
  type CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo, type CliIo } from './io/cli-io.js';
export {
  createDeckDiffCommandModule,
  deckDiffCommandModule,
  type DeckDiffCommandDependencies,
} from './tools/deck-diff/deck-diff-command-module.js';
export {
  deckDiffConfigSchema,
  loadDeckDiffConfig,
  type DeckDiffConfig,
  type LoadedDeckDiffConfig,
} from './tools/deck-diff/config.js';
export type { ReportCommandOptions, ReportFormat } from './tools/deck-diff/report-options.js';
