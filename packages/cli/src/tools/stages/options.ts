import type { Command } from 'commander';

export interface StageSelectionOptions {
  readonly config?: string;
  /** Stage names as typed; validated once the build package is loaded. */
  readonly stages: readonly string[];
}

export interface InspectCommandOptions extends StageSelectionOptions {
  readonly json: boolean;
}

export const registerStageSelectionOptions = (command: Command): Command =>
  command
    .option('-c, --config <path>', 'Path to the stagepack configuration file')
    .option('-s, --stage <stage...>', 'Stages to build (defaults to the configured stages)');

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string');

export const resolveStageSelectionOptions = (command: Command): StageSelectionOptions => {
  const options = command.opts<Record<string, unknown>>();
  const config = options['config'];
  const stage = options['stage'];

  return {
    stages: isStringArray(stage) ? stage : [],
    ...(typeof config === 'string' ? { config } : {}),
  } satisfies StageSelectionOptions;
};

export const resolveInspectCommandOptions = (command: Command): InspectCommandOptions => ({
  ...resolveStageSelectionOptions(command),
  json: command.opts<Record<string, unknown>>()['json'] === true,
});
