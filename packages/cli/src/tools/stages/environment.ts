import type { BuildStage, LoadedConfig, StageConfigurationService } from '@stagepack/build';
import type { StructuredLogger } from '@stagepack/core/logging';

import type { StageSelectionOptions } from './options.js';
import type { StagepackBuildModule } from './build-module.js';

export interface PreparedStageEnvironment {
  readonly loaded: LoadedConfig;
  /** Stages to build, in the order they were requested. */
  readonly stages: readonly BuildStage[];
  readonly service: StageConfigurationService;
}

export interface PrepareStageEnvironmentOptions {
  readonly build: StagepackBuildModule;
  readonly selection: StageSelectionOptions;
  readonly logger: StructuredLogger;
  readonly cwd?: string;
}

/**
 * Loads the project configuration and its hook modules and wires a stage configuration service
 * around them.
 */
export const prepareStageEnvironment = async ({
  build,
  selection,
  logger,
  cwd,
}: PrepareStageEnvironmentOptions): Promise<PreparedStageEnvironment> => {
  const configPath = await build.resolveConfigPath({
    ...(cwd === undefined ? {} : { cwd }),
    ...(selection.config === undefined ? {} : { configPath: selection.config }),
  });
  const loaded = await build.loadConfig(configPath);
  const { hooks, registries } = await build.loadHookRegistrations({
    config: loaded.config,
    configDirectory: loaded.directory,
  });

  logger.log({
    level: 'debug',
    name: 'stagepack-cli',
    event: 'cli.config.loaded',
    data: { path: loaded.path, hookCount: hooks.length },
  });

  const service = build.createStageConfigurationService({
    hooks,
    registries,
    base: build.resolveBaseConfigurationOptions(loaded.config, loaded.directory),
    logger,
  });

  return {
    loaded,
    stages: selectStages(build, selection.stages, loaded.config.stages),
    service,
  };
};

const selectStages = (
  build: StagepackBuildModule,
  requested: readonly string[],
  configured: readonly BuildStage[] | undefined,
): readonly BuildStage[] => {
  if (requested.length > 0) {
    return [...new Set(requested.map((stage) => build.parseBuildStage(stage)))];
  }
  if (configured && configured.length > 0) {
    return [...new Set(configured)];
  }
  return build.BUILD_STAGES;
};
