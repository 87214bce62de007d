import { performance } from 'node:perf_hooks';

import { noopLogger, type StructuredLogger } from '@stagepack/core/logging';
import { InMemoryDomainEventBus, type DomainEventBusPort } from '@stagepack/core/runtime';

import type { BuildConfiguration } from '../domain/models/configuration.js';
import { BUILD_STAGES, type BuildStage } from '../domain/models/stages.js';
import type { HookRegistration } from '../domain/ports/hooks.js';
import {
  createBaseConfiguration,
  type BaseConfigurationOptions,
} from '../domain/services/base-configuration.js';
import { createDefaultFactoryRegistries } from '../factories/default-factories.js';
import { bindStageFactories, type FactoryRegistries } from '../factories/factory-registry.js';
import { createBuildStageLoggingSubscriber } from '../logging/build-event-subscriber.js';
import { dispatchStageHooks, type HookInvocationRecord } from './hook-dispatcher.js';

export interface StageConfigurationServiceOptions {
  /** Hooks invoked for every stage, in this order. */
  readonly hooks: readonly HookRegistration[];
  readonly base: BaseConfigurationOptions;
  /** Defaults to fresh registries holding the built-in factories. */
  readonly registries?: FactoryRegistries;
  /**
   * Bus receiving `stage:*` lifecycle events. When omitted an in-memory bus is created and, if a
   * logger is supplied, lifecycle events are logged through it.
   */
  readonly eventBus?: DomainEventBusPort;
  readonly logger?: StructuredLogger;
}

export interface StageBuildResult {
  readonly stage: BuildStage;
  readonly configuration: BuildConfiguration;
  readonly invocations: readonly HookInvocationRecord[];
  readonly durationMs: number;
}

export type StageOutcome =
  | ({ readonly status: 'fulfilled' } & StageBuildResult)
  | {
      readonly status: 'rejected';
      readonly stage: BuildStage;
      readonly error: unknown;
      readonly durationMs: number;
    };

/**
 * Produces the final configuration of each stage: base configuration, then every hook.
 * Stages share nothing; each starts from a fresh base configuration.
 */
export class StageConfigurationService {
  private readonly hooks: readonly HookRegistration[];
  private readonly base: BaseConfigurationOptions;
  private readonly registries: FactoryRegistries;
  private readonly logger: StructuredLogger;
  readonly eventBus: DomainEventBusPort;

  constructor(options: StageConfigurationServiceOptions) {
    this.hooks = [...options.hooks];
    this.base = options.base;
    this.registries = options.registries ?? createDefaultFactoryRegistries();
    this.logger = options.logger ?? noopLogger;
    if (options.eventBus) {
      this.eventBus = options.eventBus;
    } else {
      this.eventBus = new InMemoryDomainEventBus();
      if (options.logger) {
        this.eventBus.subscribe(createBuildStageLoggingSubscriber(options.logger));
      }
    }
  }

  /**
   * Builds the configuration of a single stage.
   *
   * @param stage - Stage to build.
   * @returns The final configuration along with what each hook did.
   * @throws The first error raised while building the stage; a `stage:error` event is published
   *   before it propagates.
   */
  async build(stage: BuildStage): Promise<StageBuildResult> {
    const start = performance.now();
    await this.eventBus.publish({
      type: 'stage:start',
      payload: { stage, timestamp: new Date() },
    });

    try {
      const factories = bindStageFactories(this.registries, stage);
      const { configuration, invocations } = dispatchStageHooks({
        stage,
        configuration: createBaseConfiguration(stage, this.base, factories),
        hooks: this.hooks,
        factories,
        logger: this.logger,
      });
      const durationMs = performance.now() - start;

      await this.eventBus.publish({
        type: 'stage:complete',
        payload: {
          stage,
          timestamp: new Date(),
          attributes: {
            durationMs,
            hookCount: invocations.length,
            ruleCount: configuration.module.rules.length,
            pluginCount: configuration.plugins.length,
          },
        },
      });

      return { stage, configuration, invocations, durationMs } satisfies StageBuildResult;
    } catch (error) {
      await this.eventBus.publish({
        type: 'stage:error',
        payload: { stage, timestamp: new Date(), error },
      });
      throw error;
    }
  }

  /**
   * Builds several stages one after another. A failing stage is reported in its outcome and does
   * not prevent the remaining stages from being built.
   *
   * @param stages - Stages to build, defaulting to all of them.
   * @returns One outcome per requested stage, in the requested order.
   */
  async buildAll(stages: readonly BuildStage[] = BUILD_STAGES): Promise<readonly StageOutcome[]> {
    const outcomes: StageOutcome[] = [];
    for (const stage of stages) {
      const start = performance.now();
      try {
        const result = await this.build(stage);
        outcomes.push({ status: 'fulfilled', ...result });
      } catch (error) {
        outcomes.push({ status: 'rejected', stage, error, durationMs: performance.now() - start });
      }
    }
    return outcomes;
  }
}

export function createStageConfigurationService(
  options: StageConfigurationServiceOptions,
): StageConfigurationService {
  return new StageConfigurationService(options);
}

export interface CreateStageConfigurationsOptions extends StageConfigurationServiceOptions {
  /** Stages to build, defaulting to all of them in their canonical order. */
  readonly stages?: readonly BuildStage[];
}

/**
 * Builds every requested stage independently and reports one outcome per stage.
 */
export async function createStageConfigurations(
  options: CreateStageConfigurationsOptions,
): Promise<readonly StageOutcome[]> {
  const { stages, ...serviceOptions } = options;
  return new StageConfigurationService(serviceOptions).buildAll(stages);
}

/**
 * Builds one stage and returns its final configuration.
 *
 * @throws The error that aborted the stage.
 */
export async function buildStageConfiguration(
  stage: BuildStage,
  options: StageConfigurationServiceOptions,
): Promise<BuildConfiguration> {
  const result = await new StageConfigurationService(options).build(stage);
  return result.configuration;
}
