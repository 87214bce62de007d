import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

export const DEFAULT_STAGEPACK_CONFIG_FILES = Object.freeze([
  'stagepack.config.mjs',
  'stagepack.config.js',
  'stagepack.config.cjs',
  'stagepack.config.json',
] as const);

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule<TConfig = unknown> {
  readonly path: string;
  readonly directory: string;
  readonly config: TConfig;
}

export class ConfigNotFoundError extends Error {
  constructor(readonly location: string | undefined) {
    super(
      location === undefined
        ? 'Unable to locate stagepack configuration file in the current directory.'
        : `Configuration file not found: ${location}`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

const MODULE_NAME = 'stagepack';

const moduleLoader: Loader = async (filepath: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!isRecord(importedModule)) {
    return importedModule;
  }

  if ('default' in importedModule) {
    return importedModule['default'];
  }
  if ('config' in importedModule) {
    return importedModule['config'];
  }

  return importedModule;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) =>
      result ? { ...result, config: await resolveExportedValue(result.config) } : result,
  });
}

/**
 * Determines the absolute path to a stagepack configuration file.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The resolved configuration path.
 * @throws {ConfigNotFoundError} When the configuration cannot be found in the provided locations.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const searchPlaces = options.candidates
    ? [...options.candidates]
    : [...DEFAULT_STAGEPACK_CONFIG_FILES];
  const explorer = createExplorer(searchPlaces, cwd);

  if (options.configPath) {
    const resolvedPath = path.resolve(cwd, options.configPath);
    try {
      const loaded = await explorer.load(resolvedPath);
      if (!loaded || loaded.isEmpty) {
        throw new ConfigNotFoundError(options.configPath);
      }
      return loaded.filepath;
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ConfigNotFoundError(options.configPath);
      }
      throw error;
    }
  }

  const result = await explorer.search(cwd);
  if (!result || result.isEmpty) {
    throw new ConfigNotFoundError(undefined);
  }

  return result.filepath;
}

/**
 * Loads a configuration module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded configuration metadata and the resolved configuration value.
 */
export async function loadConfigModule(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_STAGEPACK_CONFIG_FILES, path.dirname(resolvedPath));

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new ConfigNotFoundError(resolvedPath);
    }

    return {
      path: result.filepath,
      directory: path.dirname(result.filepath),
      config: result.config,
    } satisfies LoadedConfigModule;
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigNotFoundError(resolvedPath);
    }
    throw error;
  }
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value: unknown = candidate;

  for (;;) {
    if (typeof value === 'function') {
      value = value();
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error['code'] === 'ENOENT';
}
