export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo } from './io/process-cli-io.js';
export type { CliIo } from './io/cli-io.js';
export { formatCliError } from './utils/format-cli-error.js';
export { stagesCommandModule } from './tools/stages/stages-command-module.js';
export { createStagepackCliKernel, runStagepackCli } from './tools/stages/run-stagepack-cli.js';
export type {
  CreateStagepackCliKernelOptions,
  RunStagepackCliOptions,
} from './tools/stages/run-stagepack-cli.js';
