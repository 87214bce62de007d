import type { Command } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import { registerStageSelectionOptions } from './options.js';
import { executeInspectCommand } from './inspect-command-runner.js';
import { executeStagesCommand } from './stages-command-runner.js';
import { executeValidateCommand } from './validate-command-runner.js';

export const stagesCommandModule: CliCommandModule = {
  id: 'stagepack.stages',
  register(program, context) {
    program
      .command('stages')
      .summary('List build stages.')
      .description('List every build stage with its mode and target.')
      .option('--json', 'Emit JSON instead of a table.', false)
      .action(async (_options: unknown, command: Command) => {
        await executeStagesCommand({ command, io: context.io });
      });

    const inspectCommand = program
      .command('inspect')
      .summary('Print the final configuration of each stage.')
      .description(
        'Build the configuration of the selected stages, running every hook, and print the result.',
      );

    registerStageSelectionOptions(inspectCommand).option(
      '--json',
      'Emit JSON instead of human-readable output.',
      false,
    );
    inspectCommand.action(async (_options: unknown, command: Command) => {
      await executeInspectCommand({ command, io: context.io, logger: context.createLogger() });
    });

    const validateCommand = program
      .command('validate')
      .summary('Check that every stage builds.')
      .description('Build the selected stages and report which ones fail.');

    registerStageSelectionOptions(validateCommand);
    validateCommand.action(async (_options: unknown, command: Command) => {
      await executeValidateCommand({ command, io: context.io, logger: context.createLogger() });
    });
  },
};
