import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';

export const DEFAULT_CONFIG_FILES = Object.freeze([
  'deckdiff.config.json',
  'deckdiff.config.mjs',
  'deckdiff.config.js',
  'deckdiff.config.cjs',
] as const);

export interface LoadConfigOptions<TConfig> {
  /** Directory discovery starts from; it is also where discovery stops. */
  readonly cwd: string;
  /** Explicit file, relative to `cwd`. It must exist, unlike a discovered one. */
  readonly configPath?: string | undefined;
  readonly schema: ZodType<TConfig, ZodTypeDef, unknown>;
}

export interface LoadedConfig<TConfig> {
  readonly path: string;
  /** Directory relative paths in the file resolve against. */
  readonly directory: string;
  readonly config: TConfig;
}

/** A configuration file could not be found, read or evaluated. */
export class ConfigLoadError extends Error {
  override readonly name = 'ConfigLoadError';
  readonly path: string;

  constructor(configPath: string, reason: string, options?: { readonly cause?: unknown }) {
    super(`Cannot load configuration ${configPath}: ${reason}`, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.path = configPath;
  }
}

export class ConfigValidationError extends Error {
  override readonly name = 'ConfigValidationError';
  readonly path: string;
  readonly issues: readonly string[];

  constructor(configPath: string, issues: readonly string[]) {
    const listing = issues.map((issue) => `- ${issue}`).join('\n');
    super(`Invalid configuration in ${configPath}:\n${listing}`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.path = configPath;
    this.issues = issues;
  }
}

/** Script configs export the object as `default` or `config`, or a factory that may be async. */
const importConfigModule: Loader = async (filepath) => {
  const exported: unknown = await import(pathToFileURL(filepath).href);
  if (exported === null || typeof exported !== 'object') {
    return exported;
  }

  if ('default' in exported) {
    return exported.default;
  }

  return 'config' in exported ? exported.config : exported;
};

const evaluateExport = async (value: unknown): Promise<unknown> => {
  const resolved: unknown = await (typeof value === 'function' ? value() : value);
  return typeof resolved === 'function' ? evaluateExport(resolved) : resolved;
};

const createExplorer = (cwd: string) =>
  cosmiconfig('deckdiff', {
    cache: false,
    searchPlaces: [...DEFAULT_CONFIG_FILES],
    stopDir: cwd,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': importConfigModule,
      '.mjs': importConfigModule,
      '.cjs': importConfigModule,
    },
  });

const readConfigFile = async (
  cwd: string,
  configPath: string | undefined,
): Promise<CosmiconfigResult> => {
  const explorer = createExplorer(cwd);

  try {
    if (configPath === undefined) {
      return await explorer.search(cwd);
    }

    const result = await explorer.load(path.resolve(cwd, configPath));
    if (result === null || result.isEmpty === true) {
      throw new ConfigLoadError(configPath, 'the file is empty');
    }
    return result;
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw error;
    }
    throw new ConfigLoadError(
      configPath ?? cwd,
      isMissingFileError(error) ? 'the file does not exist' : describeLoadFailure(error),
      { cause: error },
    );
  }
};

/**
 * Finds the deck-diff configuration (an explicit `configPath`, or the first of
 * {@link DEFAULT_CONFIG_FILES} in `cwd`), evaluates it and validates it against `schema`.
 * Resolves to `undefined` when discovery finds nothing.
 *
 * @throws {ConfigLoadError} When the explicit file is missing or a file cannot be evaluated.
 * @throws {ConfigValidationError} When the value does not match the schema.
 */
export async function loadConfig<TConfig>(
  options: LoadConfigOptions<TConfig>,
): Promise<LoadedConfig<TConfig> | undefined> {
  const cwd = path.resolve(options.cwd);
  const result = await readConfigFile(cwd, options.configPath);
  if (result === null || result.isEmpty === true) {
    return undefined;
  }

  const value = await evaluateExport(result.config).catch((error: unknown) => {
    throw new ConfigLoadError(result.filepath, describeLoadFailure(error), { cause: error });
  });

  try {
    return {
      path: result.filepath,
      directory: path.dirname(result.filepath),
      config: options.schema.parse(value),
    };
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(
        result.filepath,
        error.issues.map((issue) =>
          issue.path.length === 0 ? issue.message : `${issue.path.join('.')}: ${issue.message}`,
        ),
      );
    }
    throw error;
  }
}

function describeLoadFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
