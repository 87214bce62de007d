import process from 'node:process';

import type { CliIo } from './cli-io.js';

export interface ProcessCliIoOptions {
  readonly process?: NodeJS.Process;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  return {
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    exit: (code: number): never => {
      // A command that already flagged a failure keeps it even when asked to exit cleanly.
      const pending = typeof target.exitCode === 'number' ? target.exitCode : 0;
      return target.exit(code === 0 && pending !== 0 ? pending : code);
    },
  };
};
