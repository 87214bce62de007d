import process from 'node:process';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import type { CliKernel } from '../../kernel/types.js';
import type { CliIo } from '../../io/cli-io.js';
import { stagesCommandModule } from './stages-command-module.js';

export interface CreateStagepackCliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export const createStagepackCliKernel = (options: CreateStagepackCliKernelOptions): CliKernel => {
  const kernel = createCliKernel(options);
  kernel.register(stagesCommandModule);
  return kernel;
};

export interface RunStagepackCliOptions extends CreateStagepackCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runStagepackCli = async ({
  argv = process.argv,
  programName,
  version,
  description,
  io,
}: RunStagepackCliOptions): Promise<number> => {
  const kernel = createStagepackCliKernel({ programName, version, description, io });
  return kernel.run(argv);
};
