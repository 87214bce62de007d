import { Option, type Command } from 'commander';
import { LOG_LEVELS, type LogLevel } from '@stagepack/core/logging';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit NDJSON structured logs on stderr.';
const LOG_LEVEL_HELP = 'Lowest level written when structured logs are enabled.';

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'none',
  logLevel: 'info',
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
  logLevel: defaultGlobalOptions.logLevel,
});

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', JSON_LOGS_HELP, false)
    .addOption(
      new Option('--log-level <level>', LOG_LEVEL_HELP)
        .choices(LOG_LEVELS)
        .default(defaultGlobalOptions.logLevel),
    );
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.optsWithGlobals<Record<string, unknown>>();
  const logLevel = options['logLevel'];

  return {
    logFormat: options['jsonLogs'] === true ? 'json' : 'none',
    logLevel: isLogLevel(logLevel) ? logLevel : defaultGlobalOptions.logLevel,
  };
};

const isLogLevel = (value: unknown): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);
