import { loadConfig } from '@deckdiff/core';
import { z } from 'zod';

export const deckDiffConfigSchema = z
  .object({
    output: z.string().min(1).optional(),
    format: z.enum(['html', 'json']).optional(),
    media: z.boolean().optional(),
    showCosmetic: z.boolean().optional(),
    title: z.string().optional(),
  })
  .strict();

export type DeckDiffConfig = z.infer<typeof deckDiffConfigSchema>;

export interface LoadedDeckDiffConfig {
  /** Absolute path of the configuration file, when one was found. */
  readonly path?: string;
  /** Directory relative paths in the configuration resolve against. */
  readonly directory: string;
  readonly config: DeckDiffConfig;
}

export interface LoadDeckDiffConfigOptions {
  readonly cwd: string;
  readonly configPath?: string;
}

/**
 * Discovers and validates the deck-diff configuration. Without a configuration file the
 * result is an empty configuration rooted at `cwd`.
 *
 * @throws {ConfigLoadError} When `--config` names a missing or unloadable file.
 * @throws {ConfigValidationError} When the file does not match the configuration schema.
 */
export const loadDeckDiffConfig = async (
  options: LoadDeckDiffConfigOptions,
): Promise<LoadedDeckDiffConfig> => {
  const loaded = await loadConfig({
    cwd: options.cwd,
    configPath: options.configPath,
    schema: deckDiffConfigSchema,
  });

  return loaded ?? { directory: options.cwd, config: {} };
};
