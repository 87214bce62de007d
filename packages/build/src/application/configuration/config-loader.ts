import path from 'node:path';

import {
  loadConfigModule,
  resolveConfigPath as coreResolveConfigPath,
  type ResolveConfigPathOptions as CoreResolveConfigPathOptions,
} from '@stagepack/core/config';
import { z } from 'zod';

import type { StagepackConfig } from '../../config/index.js';
import { ConfigValidationError } from '../../domain/errors.js';
import { BUILD_STAGES } from '../../domain/models/stages.js';
import {
  DEFAULT_BASE_CONFIGURATION_OPTIONS,
  type BaseConfigurationOptions,
} from '../../domain/services/base-configuration.js';

export type ResolveConfigPathOptions = CoreResolveConfigPathOptions;

/**
 * Resolves the stagepack configuration path using the shared loader.
 *
 * @param options - Overrides for the working directory or explicit configuration path.
 * @returns The resolved configuration path on disk.
 * @throws {ConfigNotFoundError} When no configuration file exists at the requested location.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  return coreResolveConfigPath(options);
}

/**
 * Result object returned when configuration data has been loaded and validated.
 */
export interface LoadedConfig {
  readonly path: string;
  readonly directory: string;
  readonly config: StagepackConfig;
}

const nonEmptyString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

const hookModuleSchema = z
  .object({
    module: nonEmptyString,
    export: nonEmptyString.optional(),
    options: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

const stagepackConfigSchema: z.ZodType<StagepackConfig, z.ZodTypeDef, unknown> = z
  .object({
    hooks: z.array(z.union([nonEmptyString, hookModuleSchema])).optional(),
    stages: z.array(z.enum(BUILD_STAGES)).optional(),
    rootDirectory: nonEmptyString.optional(),
    output: z
      .object({
        directory: nonEmptyString.optional(),
        publicPath: z.string().optional(),
      })
      .passthrough()
      .optional(),
    entries: z
      .object({
        client: nonEmptyString.optional(),
        render: nonEmptyString.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Loads a stagepack configuration file, resolves any function or promise exports, and validates
 * the resulting structure.
 *
 * @param configPath - Path to the configuration file provided by the caller or discovered via
 *   {@link resolveConfigPath}.
 * @returns The validated configuration and related metadata.
 * @throws {ConfigNotFoundError} When the file does not exist.
 * @throws {ConfigValidationError} When the file exports data with an unexpected shape.
 */
export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  const loaded = await loadConfigModule({ path: configPath });
  const result = stagepackConfigSchema.safeParse(loaded.config ?? {});
  if (!result.success) {
    throw new ConfigValidationError(
      `configuration file ${loaded.path}`,
      result.error.issues.map((issue) => ({
        path: issue.path.length === 0 ? '(root)' : issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  return {
    path: loaded.path,
    directory: loaded.directory,
    config: result.data,
  };
}

/**
 * Derives base configuration options from a loaded configuration, filling in defaults.
 *
 * @param config - Validated project configuration.
 * @param configDirectory - Directory the configuration file lives in.
 * @returns Options for {@link createBaseConfiguration}.
 */
export function resolveBaseConfigurationOptions(
  config: StagepackConfig,
  configDirectory: string,
): BaseConfigurationOptions {
  return {
    rootDirectory: path.resolve(configDirectory, config.rootDirectory ?? '.'),
    outputDirectory: config.output?.directory ?? DEFAULT_BASE_CONFIGURATION_OPTIONS.outputDirectory,
    publicPath: config.output?.publicPath ?? DEFAULT_BASE_CONFIGURATION_OPTIONS.publicPath,
    clientEntry: config.entries?.client ?? DEFAULT_BASE_CONFIGURATION_OPTIONS.clientEntry,
    renderEntry: config.entries?.render ?? DEFAULT_BASE_CONFIGURATION_OPTIONS.renderEntry,
  };
}
