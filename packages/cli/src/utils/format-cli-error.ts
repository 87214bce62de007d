import { inspect } from 'node:util';

/**
 * Errors raised for user mistakes (bad configuration, misbehaving hooks). Their message says
 * everything there is to say, so the stack trace is left out.
 */
const USAGE_ERROR_NAMES: ReadonlySet<string> = new Set([
  'ConfigNotFoundError',
  'ConfigValidationError',
  'UnknownStageError',
  'HookUsageError',
  'FactoryNotFoundError',
  'DuplicateFactoryError',
  'FactoryStageError',
]);

export const formatCliError = (error: unknown): string => {
  if (error instanceof Error) {
    if (USAGE_ERROR_NAMES.has(error.name)) {
      return `${error.name}: ${error.message}`;
    }
    return error.stack ?? error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};
