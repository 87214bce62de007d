import process from 'node:process';

import type { Command } from 'commander';
import type { StageOutcome } from '@stagepack/build';
import type { StructuredLogger } from '@stagepack/core/logging';
import {
  serialiseError,
  writeJson,
  writeLine,
  type WritableTarget,
} from '@stagepack/core/reporting';

import type { CliIo } from '../../io/cli-io.js';
import { resolveInspectCommandOptions } from './options.js';
import { prepareStageEnvironment } from './environment.js';
import { loadBuildModule } from './build-module.js';

export interface ExecuteInspectCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
  readonly logger: StructuredLogger;
}

/**
 * Builds the selected stages and prints each final configuration. Regular expressions in rule
 * conditions are printed as their literal source.
 */
export const executeInspectCommand = async ({
  command,
  io,
  logger,
}: ExecuteInspectCommandOptions): Promise<void> => {
  const options = resolveInspectCommandOptions(command);
  const build = await loadBuildModule(io);
  if (!build) {
    process.exitCode = 1;
    return;
  }

  const environment = await prepareStageEnvironment({ build, selection: options, logger });
  const outcomes = await environment.service.buildAll(environment.stages);

  const stdout: WritableTarget = { write: (line: string) => io.writeOut(line) };
  const stderr: WritableTarget = { write: (line: string) => io.writeErr(line) };

  if (options.json) {
    writeJson(stdout, { stages: outcomes.map(toInspectPayload) }, { pretty: true });
  } else {
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        writeLine(stderr, `✖ ${outcome.stage}: ${serialiseError(outcome.error).message}`);
        continue;
      }

      const traits = build.describeStage(outcome.stage);
      writeLine(stdout, `# ${outcome.stage} (${traits.mode}, ${traits.target})`);
      writeJson(stdout, outcome.configuration, { pretty: true });
    }
  }

  if (outcomes.some((outcome) => outcome.status === 'rejected')) {
    process.exitCode = 1;
  }
};

const toInspectPayload = (outcome: StageOutcome) => {
  if (outcome.status === 'rejected') {
    const { name, message } = serialiseError(outcome.error);
    return { stage: outcome.stage, error: { name, message } };
  }

  return { stage: outcome.stage, configuration: outcome.configuration };
};
