import type { StructuredLogger } from '@stagepack/core/logging';

import { HookUsageError } from '../domain/errors.js';
import {
  finalizeConfiguration,
  validateConfigurationFragment,
  type BuildConfiguration,
  type ConfigurationFragment,
} from '../domain/models/configuration.js';
import type { BuildStage } from '../domain/models/stages.js';
import type {
  ConfigMutator,
  HookArgs,
  HookOptions,
  HookRegistration,
} from '../domain/ports/hooks.js';
import { mergeConfigurations } from '../domain/services/configuration-merge.js';
import type { StageFactories } from '../factories/factory-registry.js';

export type HookAction = 'none' | 'merge' | 'replace';

export interface HookInvocationRecord {
  readonly hook: string;
  readonly action: HookAction;
  readonly fragments: number;
}

export interface DispatchStageHooksOptions {
  readonly stage: BuildStage;
  readonly configuration: BuildConfiguration;
  readonly hooks: readonly HookRegistration[];
  readonly factories: StageFactories;
  readonly logger?: StructuredLogger;
}

export interface StageDispatchResult {
  readonly configuration: BuildConfiguration;
  readonly invocations: readonly HookInvocationRecord[];
}

const NO_OPTIONS: HookOptions = Object.freeze({});

type PendingAction =
  | { readonly kind: 'merge'; readonly fragments: ConfigurationFragment[] }
  | { readonly kind: 'replace'; readonly configuration: BuildConfiguration };

/**
 * Tracks the actions issued by one hook invocation and enforces the one-kind-of-action rule.
 * A failed action is remembered so that the stage aborts even if the hook catches the error.
 */
class HookInvocation implements ConfigMutator {
  private pending: PendingAction | undefined;
  private failure: unknown;
  private failed = false;
  private closed = false;

  constructor(
    private readonly stage: BuildStage,
    private readonly hook: string,
  ) {}

  setConfig(fragment: ConfigurationFragment): void {
    this.guard(() => {
      this.ensureOpen('setConfig');
      if (this.pending?.kind === 'replace') {
        throw this.usageError('setConfig and replaceConfig cannot both be called in one invocation.');
      }
      const validated = validateConfigurationFragment(fragment);
      if (this.pending?.kind === 'merge') {
        this.pending.fragments.push(validated);
        return;
      }
      this.pending = { kind: 'merge', fragments: [validated] };
    });
  }

  replaceConfig(configuration: BuildConfiguration): void {
    this.guard(() => {
      this.ensureOpen('replaceConfig');
      if (this.pending?.kind === 'merge') {
        throw this.usageError('setConfig and replaceConfig cannot both be called in one invocation.');
      }
      if (this.pending?.kind === 'replace') {
        throw this.usageError('replaceConfig can only be called once per invocation.');
      }
      this.pending = { kind: 'replace', configuration: finalizeConfiguration(configuration) };
    });
  }

  close(): void {
    this.closed = true;
  }

  /**
   * Rethrows the first action failure, if any, and applies the pending action to `current`.
   */
  settle(current: BuildConfiguration): { configuration: BuildConfiguration; record: HookInvocationRecord } {
    if (this.failed) {
      throw this.failure;
    }
    const pending = this.pending;
    if (pending === undefined) {
      return { configuration: current, record: { hook: this.hook, action: 'none', fragments: 0 } };
    }
    if (pending.kind === 'replace') {
      return {
        configuration: pending.configuration,
        record: { hook: this.hook, action: 'replace', fragments: 0 },
      };
    }
    return {
      configuration: mergeConfigurations(current, pending.fragments),
      record: { hook: this.hook, action: 'merge', fragments: pending.fragments.length },
    };
  }

  usageError(message: string): HookUsageError {
    return new HookUsageError(message, { stage: this.stage, hook: this.hook });
  }

  private ensureOpen(action: string): void {
    if (this.closed) {
      throw this.usageError(`${action} was called after the hook returned.`);
    }
  }

  private guard(action: () => void): void {
    try {
      action();
    } catch (error) {
      if (!this.failed && !this.closed) {
        this.failed = true;
        this.failure = error;
      }
      throw error;
    }
  }
}

/**
 * Runs every hook registered for a stage, in registration order, against the stage configuration.
 *
 * Hooks are called synchronously, one at a time. The actions a hook issues are applied after it
 * returns, so `getConfig` and `rules` reflect the previous hooks only. Any error aborts the stage.
 *
 * @param options - Stage, starting configuration, hooks and factories bound to the stage.
 * @returns The final configuration and a record of what each hook did.
 * @throws {HookUsageError} When a hook mixes actions, replaces twice, acts after returning, or
 *   returns a promise.
 * @throws {ConfigValidationError} When a fragment or replacement has an invalid shape.
 */
export function dispatchStageHooks(options: DispatchStageHooksOptions): StageDispatchResult {
  const { stage, hooks, factories, logger } = options;
  let configuration = options.configuration;
  const invocations: HookInvocationRecord[] = [];

  for (const registration of hooks) {
    const invocation = new HookInvocation(stage, registration.name);
    const snapshot = configuration;
    const args: HookArgs = {
      stage,
      rules: snapshot.module.rules,
      loaders: factories.loaders,
      plugins: factories.plugins,
      presets: factories.presets,
      actions: {
        setConfig: (fragment) => invocation.setConfig(fragment),
        replaceConfig: (replacement) => invocation.replaceConfig(replacement),
      },
      getConfig: () => snapshot,
    };

    let returned: unknown;
    try {
      returned = registration.onCreateBuildConfig(args, registration.options ?? NO_OPTIONS);
    } finally {
      invocation.close();
    }

    if (isPromiseLike(returned)) {
      // The stage is already aborted; a later rejection is only reported.
      void Promise.resolve(returned).catch((reason: unknown) => {
        logger?.log({
          level: 'error',
          name: 'stagepack-build',
          event: 'build.hook.rejected',
          data: {
            stage,
            hook: registration.name,
            message: reason instanceof Error ? reason.message : String(reason),
          },
        });
      });
      throw invocation.usageError('hooks must run synchronously but a promise was returned.');
    }

    const settled = invocation.settle(configuration);
    configuration = settled.configuration;
    invocations.push(settled.record);

    logger?.log({
      level: 'debug',
      name: 'stagepack-build',
      event: 'build.hook.invoke',
      data: { stage, ...settled.record },
    });
  }

  return { configuration, invocations };
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
