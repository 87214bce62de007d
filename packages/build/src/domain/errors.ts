import type { BuildStage } from './models/stages.js';

export class UnknownStageError extends Error {
  constructor(readonly value: unknown) {
    super(
      `Unknown build stage "${String(value)}". ` +
        'Expected one of: develop, develop-html, build-javascript, build-html.',
    );
    this.name = 'UnknownStageError';
  }
}

export interface ConfigValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Raised when a configuration or configuration fragment does not have the expected shape.
 */
export class ConfigValidationError extends Error {
  constructor(
    readonly subject: string,
    readonly issues: readonly ConfigValidationIssue[],
  ) {
    super(
      [`Invalid ${subject}:`, ...issues.map((issue) => `  - ${issue.path}: ${issue.message}`)].join(
        '\n',
      ),
    );
    this.name = 'ConfigValidationError';
  }
}

export interface HookUsageContext {
  readonly stage: BuildStage;
  readonly hook: string;
}

/**
 * Raised when a hook misuses the actions it was handed.
 */
export class HookUsageError extends Error {
  readonly stage: BuildStage;
  readonly hook: string;

  constructor(message: string, context: HookUsageContext) {
    super(`Hook "${context.hook}" in stage "${context.stage}": ${message}`);
    this.name = 'HookUsageError';
    this.stage = context.stage;
    this.hook = context.hook;
  }
}

export type FactoryKind = 'loader' | 'plugin' | 'rule';

export class FactoryNotFoundError extends Error {
  constructor(
    readonly kind: FactoryKind,
    readonly factory: string,
    readonly available: readonly string[],
  ) {
    super(
      `Unknown ${kind} factory "${factory}". Registered ${kind} factories: ${
        available.length === 0 ? '(none)' : available.join(', ')
      }.`,
    );
    this.name = 'FactoryNotFoundError';
  }
}

export class DuplicateFactoryError extends Error {
  constructor(
    readonly kind: FactoryKind,
    readonly factory: string,
  ) {
    super(`A ${kind} factory named "${factory}" is already registered.`);
    this.name = 'DuplicateFactoryError';
  }
}

export class FactoryStageError extends Error {
  constructor(
    readonly kind: FactoryKind,
    readonly factory: string,
    readonly stage: BuildStage,
  ) {
    super(`The ${kind} factory "${factory}" is not available in stage "${stage}".`);
    this.name = 'FactoryStageError';
  }
}
