import process from 'node:process';

import { CommanderError } from 'commander';
import { JsonLineLogger, noopLogger, type StructuredLogger } from '@stagepack/core/logging';

import { createCommanderProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
} from './types.js';

const readNonZeroProcessExitCode = (): number | undefined => {
  const exitCode = process.exitCode;
  if (typeof exitCode !== 'number') {
    return undefined;
  }

  return exitCode === 0 ? undefined : exitCode;
};

const readCommanderExitCode = (error: CommanderError): number | undefined => {
  const { exitCode } = error;
  return Number.isInteger(exitCode) ? exitCode : undefined;
};

export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });

  const state: { globalOptions: CliGlobalOptions } = {
    globalOptions: createDefaultGlobalOptions(),
  };

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => state.globalOptions,
    createLogger: (): StructuredLogger => {
      const { logFormat, logLevel } = state.globalOptions;
      if (logFormat === 'json') {
        return new JsonLineLogger({ write: (line) => io.writeErr(line) }, { level: logLevel });
      }
      return noopLogger;
    },
  };

  program.hook('preAction', () => {
    state.globalOptions = readGlobalOptions(program);
  });

  const runProgram = async (argv: readonly string[]): Promise<void> => {
    const args = [...argv];
    if (args.length === 0) {
      throw new Error('Argument vector must include at least the node executable.');
    }

    await program.parseAsync(args, { from: 'node' });
    state.globalOptions = readGlobalOptions(program);
  };

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      const previousExitCode = process.exitCode;

      try {
        await runProgram(argv);

        return readNonZeroProcessExitCode() ?? 0;
      } catch (error) {
        if (error instanceof CommanderError) {
          return readNonZeroProcessExitCode() ?? readCommanderExitCode(error) ?? 1;
        }

        const message = formatCliError(error);
        const needsNewline = message.endsWith('\n') ? '' : '\n';
        io.writeErr(`${message}${needsNewline}`);

        return readNonZeroProcessExitCode() ?? 1;
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };
};
