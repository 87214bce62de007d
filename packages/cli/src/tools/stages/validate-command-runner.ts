import process from 'node:process';

import type { Command } from 'commander';
import type { StructuredLogger } from '@stagepack/core/logging';
import { serialiseError, writeLine, type WritableTarget } from '@stagepack/core/reporting';

import type { CliIo } from '../../io/cli-io.js';
import { resolveStageSelectionOptions } from './options.js';
import { prepareStageEnvironment } from './environment.js';
import { loadBuildModule } from './build-module.js';

export interface ExecuteValidateCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
  readonly logger: StructuredLogger;
}

export const executeValidateCommand = async ({
  command,
  io,
  logger,
}: ExecuteValidateCommandOptions): Promise<void> => {
  const selection = resolveStageSelectionOptions(command);
  const build = await loadBuildModule(io);
  if (!build) {
    process.exitCode = 1;
    return;
  }

  const environment = await prepareStageEnvironment({ build, selection, logger });
  const outcomes = await environment.service.buildAll(environment.stages);
  const stdout: WritableTarget = { write: (line: string) => io.writeOut(line) };

  let failures = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      writeLine(stdout, `✔ ${outcome.stage}`);
      continue;
    }

    failures += 1;
    writeLine(stdout, `✖ ${outcome.stage}: ${serialiseError(outcome.error).message}`);
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
};
