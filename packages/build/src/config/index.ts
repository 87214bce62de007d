import type { BuildStage } from '../domain/models/stages.js';
import type { HookOptions } from '../domain/ports/hooks.js';

/**
 * Hook module entry: a bare module specifier or path, or an object selecting an export and
 * supplying options.
 */
export type HookModuleConfigEntry = string | HookModuleConfig;

export interface HookModuleConfig {
  /** Package name or path; relative paths resolve against the configuration directory. */
  readonly module: string;
  /** Name of the export to call instead of `onCreateBuildConfig`. */
  readonly export?: string;
  /** Passed as the second argument of every invocation of the hook. */
  readonly options?: HookOptions;
}

export interface OutputConfig {
  readonly directory?: string;
  readonly publicPath?: string;
}

export interface EntryConfig {
  /** Module bundled for the browser. */
  readonly client?: string;
  /** Module bundled as the page renderer in html stages. */
  readonly render?: string;
}

/**
 * Top-level shape of a `stagepack.config.*` file.
 */
export interface StagepackConfig {
  readonly hooks?: readonly HookModuleConfigEntry[];
  /** Stages built when none are requested explicitly. */
  readonly stages?: readonly BuildStage[];
  /** Site root, relative to the configuration directory. Defaults to that directory. */
  readonly rootDirectory?: string;
  readonly output?: OutputConfig;
  readonly entries?: EntryConfig;
}

/**
 * Helper that preserves {@link StagepackConfig} typing in configuration modules.
 *
 * @param config - The user-authored configuration object.
 * @returns The provided configuration object typed as a {@link StagepackConfig}.
 */
export function defineConfig(config: StagepackConfig): StagepackConfig {
  return config;
}
