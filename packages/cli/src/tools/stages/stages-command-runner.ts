import process from 'node:process';

import type { Command } from 'commander';
import { writeJson, writeLine, type WritableTarget } from '@stagepack/core/reporting';

import type { CliIo } from '../../io/cli-io.js';
import { loadBuildModule } from './build-module.js';

export interface ExecuteStagesCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
}

export const executeStagesCommand = async ({
  command,
  io,
}: ExecuteStagesCommandOptions): Promise<void> => {
  const json = command.opts<Record<string, unknown>>()['json'] === true;
  const build = await loadBuildModule(io);
  if (!build) {
    process.exitCode = 1;
    return;
  }

  const stdout: WritableTarget = { write: (line: string) => io.writeOut(line) };
  const traits = build.BUILD_STAGES.map((stage) => build.describeStage(stage));

  if (json) {
    writeJson(stdout, { stages: traits }, { pretty: true });
    return;
  }

  const stageWidth = Math.max(...traits.map((entry) => entry.stage.length));
  const modeWidth = Math.max(...traits.map((entry) => entry.mode.length));
  const targetWidth = Math.max(...traits.map((entry) => entry.target.length));

  for (const entry of traits) {
    writeLine(
      stdout,
      [
        entry.stage.padEnd(stageWidth),
        entry.mode.padEnd(modeWidth),
        entry.target.padEnd(targetWidth),
        entry.description,
      ].join('  '),
    );
  }
};
