import { describe, expect, it, vi } from 'vitest';

import type { StructuredLogEvent } from '@stagepack/core/logging';
import { InMemoryDomainEventBus, type LifecycleEvent } from '@stagepack/core/runtime';

import type { RuleDescriptor } from '../domain/models/configuration.js';
import type { HookRegistration } from '../domain/ports/hooks.js';
import {
  DEFAULT_BASE_CONFIGURATION_OPTIONS,
  type BaseConfigurationOptions,
} from '../domain/services/base-configuration.js';
import { createDefaultFactoryRegistries } from '../factories/default-factories.js';
import {
  StageConfigurationService,
  buildStageConfiguration,
  createStageConfigurations,
} from './build-runtime.js';

const base: BaseConfigurationOptions = {
  rootDirectory: '/site',
  ...DEFAULT_BASE_CONFIGURATION_OPTIONS,
};

const svgRule: RuleDescriptor = { test: /\.svg$/, use: [{ loader: 'svgr-loader' }] };

const svgHook: HookRegistration = {
  name: 'svg',
  onCreateBuildConfig: ({ actions }) => actions.setConfig({ module: { rules: [svgRule] } }),
};

function collectEvents(bus: InMemoryDomainEventBus): LifecycleEvent[] {
  const events: LifecycleEvent[] = [];
  bus.subscribe((event) => {
    events.push(event);
  });
  return events;
}

describe('StageConfigurationService', () => {
  it('builds a stage from its base configuration and hooks', async () => {
    const service = new StageConfigurationService({ hooks: [svgHook], base });

    const result = await service.build('develop');

    expect(result.stage).toBe('develop');
    expect(result.configuration.module.rules).toHaveLength(9);
    expect(result.configuration.module.rules[8]).toEqual(svgRule);
    expect(result.invocations).toEqual([{ hook: 'svg', action: 'merge', fragments: 1 }]);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('publishes start and completion events with stage statistics', async () => {
    const eventBus = new InMemoryDomainEventBus();
    const events = collectEvents(eventBus);
    const service = new StageConfigurationService({ hooks: [svgHook], base, eventBus });

    await service.build('develop');

    expect(events.map((event) => event.type)).toEqual(['stage:start', 'stage:complete']);
    expect(events[0]?.payload.stage).toBe('develop');
    expect(events[1]?.payload.attributes).toMatchObject({
      hookCount: 1,
      ruleCount: 9,
      pluginCount: 2,
    });
    expect(events[1]?.payload.attributes?.['durationMs']).toEqual(expect.any(Number));
  });

  it('publishes an error event and rethrows when a stage fails', async () => {
    const failure = new Error('hook exploded');
    const eventBus = new InMemoryDomainEventBus();
    const events = collectEvents(eventBus);
    const service = new StageConfigurationService({
      hooks: [
        {
          name: 'exploding',
          onCreateBuildConfig: () => {
            throw failure;
          },
        },
      ],
      base,
      eventBus,
    });

    await expect(service.build('build-html')).rejects.toBe(failure);

    expect(events.map((event) => event.type)).toEqual(['stage:start', 'stage:error']);
    const errorEvent = events[1];
    expect(errorEvent?.type === 'stage:error' ? errorEvent.payload.error : undefined).toBe(failure);
  });

  it('builds every stage independently, in order', async () => {
    const seen: string[] = [];
    const service = new StageConfigurationService({
      hooks: [{ name: 'recorder', onCreateBuildConfig: ({ stage }) => seen.push(stage) }],
      base,
    });

    const outcomes = await service.buildAll();

    expect(outcomes.map((outcome) => [outcome.stage, outcome.status])).toEqual([
      ['develop', 'fulfilled'],
      ['develop-html', 'fulfilled'],
      ['build-javascript', 'fulfilled'],
      ['build-html', 'fulfilled'],
    ]);
    expect(seen).toEqual(['develop', 'develop-html', 'build-javascript', 'build-html']);
  });

  it('reports a failing stage without affecting the others', async () => {
    const service = new StageConfigurationService({
      hooks: [
        {
          name: 'renderer-only',
          onCreateBuildConfig: ({ stage, actions, getConfig }) => {
            if (stage === 'build-html') {
              actions.setConfig({ devtool: false });
              actions.replaceConfig(getConfig());
            }
          },
        },
      ],
      base,
    });

    const outcomes = await service.buildAll(['build-javascript', 'build-html', 'develop']);

    expect(outcomes.map((outcome) => outcome.status)).toEqual([
      'fulfilled',
      'rejected',
      'fulfilled',
    ]);
    const rejected = outcomes[1];
    expect(rejected?.status === 'rejected' ? rejected.error : undefined).toHaveProperty(
      'name',
      'HookUsageError',
    );
  });

  it('logs lifecycle events through the supplied logger', async () => {
    const log = vi.fn<(entry: StructuredLogEvent) => void>();
    const service = new StageConfigurationService({ hooks: [svgHook], base, logger: { log } });

    await service.build('build-javascript');

    expect(log.mock.calls.map(([entry]) => entry.event)).toEqual([
      'build.stage.start',
      'build.hook.invoke',
      'build.stage.complete',
    ]);
  });

  it('uses custom factories registered on the supplied registries', async () => {
    const registries = createDefaultFactoryRegistries();
    registries.loaders.register({
      name: 'sass',
      create: (_context, options = {}) => ({ loader: 'sass-loader', options: { ...options } }),
    });
    const service = new StageConfigurationService({
      hooks: [
        {
          name: 'sass',
          onCreateBuildConfig: ({ actions, loaders }) =>
            actions.setConfig({
              module: { rules: [{ test: /\.scss$/, use: [loaders.sass({ indented: false })] }] },
            }),
        },
      ],
      base,
      registries,
    });

    const { configuration } = await service.build('develop');

    expect(configuration.module.rules.at(-1)).toEqual({
      test: /\.scss$/,
      use: [{ loader: 'sass-loader', options: { indented: false } }],
    });
  });
});

describe('stage configuration helpers', () => {
  it('returns the final configuration of one stage', async () => {
    const configuration = await buildStageConfiguration('build-html', { hooks: [], base });

    expect(configuration.target).toBe('node');
    expect(configuration.output.filename).toBe('render-page.js');
  });

  it('builds only the requested stages', async () => {
    const outcomes = await createStageConfigurations({
      stages: ['develop', 'build-html'],
      hooks: [svgHook],
      base,
    });

    expect(outcomes.map((outcome) => outcome.stage)).toEqual(['develop', 'build-html']);
    expect(outcomes.every((outcome) => outcome.status === 'fulfilled')).toBe(true);
  });
});
