import type * as BuildModule from '@stagepack/build';

import type { CliIo } from '../../io/cli-io.js';

export type StagepackBuildModule = typeof BuildModule;

let buildModulePromise: Promise<StagepackBuildModule> | undefined;

export const loadBuildModule = async (io: CliIo): Promise<StagepackBuildModule | undefined> => {
  if (!buildModulePromise) {
    buildModulePromise = import('@stagepack/build');
  }

  try {
    return await buildModulePromise;
  } catch (error) {
    buildModulePromise = undefined;

    if (isModuleNotFoundError(error)) {
      io.writeErr('The "@stagepack/build" package is required. Please install @stagepack/build.\n');
      return;
    }

    throw error;
  }
};

const isModuleNotFoundError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ERR_MODULE_NOT_FOUND';
