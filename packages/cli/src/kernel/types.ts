import type { Command } from 'commander';
import type { LogLevel, StructuredLogger } from '@stagepack/core/logging';

import type { CliIo } from '../io/cli-io.js';

export type CliLogFormat = 'none' | 'json';

export interface CliGlobalOptions {
  readonly logFormat: CliLogFormat;
  readonly logLevel: LogLevel;
}

export interface CliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export interface CliKernelContext {
  readonly io: CliIo;
  readonly getGlobalOptions: () => CliGlobalOptions;
  /** Logger honouring `--json-logs` and `--log-level`; NDJSON on stderr or nothing at all. */
  readonly createLogger: () => StructuredLogger;
}

export interface CliCommandModule {
  readonly id: string;
  register(command: Command, context: CliKernelContext): void;
}

export interface CliKernel {
  register(module: CliCommandModule): CliKernel;
  run(argv?: readonly string[]): Promise<number>;
}
