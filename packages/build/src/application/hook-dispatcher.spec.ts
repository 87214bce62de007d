import { describe, expect, it, vi } from 'vitest';

import type { StructuredLogEvent } from '@stagepack/core/logging';

import { ConfigValidationError, FactoryNotFoundError, HookUsageError } from '../domain/errors.js';
import type { BuildConfiguration, RuleDescriptor } from '../domain/models/configuration.js';
import type { BuildStage } from '../domain/models/stages.js';
import type { ConfigMutator, HookArgs, HookRegistration } from '../domain/ports/hooks.js';
import {
  DEFAULT_BASE_CONFIGURATION_OPTIONS,
  createBaseConfiguration,
} from '../domain/services/base-configuration.js';
import { createDefaultFactoryRegistries } from '../factories/default-factories.js';
import { bindStageFactories } from '../factories/factory-registry.js';
import { dispatchStageHooks } from './hook-dispatcher.js';

const svgRule: RuleDescriptor = { test: /\.svg$/, use: [{ loader: 'svgr-loader' }] };

function runStage(
  stage: BuildStage,
  hooks: readonly HookRegistration[],
  logger?: { log(entry: StructuredLogEvent): void },
) {
  const factories = bindStageFactories(createDefaultFactoryRegistries(), stage);
  return dispatchStageHooks({
    stage,
    configuration: createBaseConfiguration(
      stage,
      { rootDirectory: '/site', ...DEFAULT_BASE_CONFIGURATION_OPTIONS },
      factories,
    ),
    hooks,
    factories,
    ...(logger ? { logger } : {}),
  });
}

function hook(name: string, onCreateBuildConfig: HookRegistration['onCreateBuildConfig']) {
  return { name, onCreateBuildConfig } satisfies HookRegistration;
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('dispatchStageHooks', () => {
  it('invokes every hook exactly once in registration order', () => {
    const calls: string[] = [];

    runStage('develop-html', [
      hook('first', ({ stage }) => calls.push(`first:${stage}`)),
      hook('second', ({ stage }) => calls.push(`second:${stage}`)),
      hook('third', ({ stage }) => calls.push(`third:${stage}`)),
    ]);

    expect(calls).toEqual(['first:develop-html', 'second:develop-html', 'third:develop-html']);
  });

  it('returns the base configuration when no hook acts', () => {
    const result = runStage('develop', [hook('idle', () => undefined)]);

    expect(result.configuration.module.rules).toHaveLength(8);
    expect(result.invocations).toEqual([{ hook: 'idle', action: 'none', fragments: 0 }]);
  });

  it('appends merged rules after the existing rules', () => {
    const result = runStage('build-javascript', [
      hook('svg', ({ actions }) => actions.setConfig({ module: { rules: [svgRule] } })),
    ]);

    const rules = result.configuration.module.rules;
    expect(rules).toHaveLength(9);
    expect(rules[8]).toEqual(svgRule);
    expect(result.invocations).toEqual([{ hook: 'svg', action: 'merge', fragments: 1 }]);
  });

  it('applies actions after the hook returns', () => {
    const seen: number[] = [];

    runStage('develop', [
      hook('svg', ({ actions, getConfig }) => {
        actions.setConfig({ module: { rules: [svgRule] } });
        seen.push(getConfig().module.rules.length);
      }),
      hook('observer', ({ rules }) => {
        seen.push(rules.length);
      }),
    ]);

    expect(seen).toEqual([8, 9]);
  });

  it('hands hooks frozen snapshots', () => {
    const snapshots: BuildConfiguration[] = [];

    runStage('develop', [
      hook('reader', ({ getConfig }) => {
        snapshots.push(getConfig());
      }),
    ]);

    expect(snapshots).toHaveLength(1);
    expect(Object.isFrozen(snapshots[0]?.module.rules)).toBe(true);
  });

  it('allows several merges in one invocation and applies them in order', () => {
    const result = runStage('develop', [
      hook('twice', ({ actions, loaders }) => {
        actions.setConfig({ module: { rules: [{ test: /\.txt$/, use: [loaders.raw()] }] } });
        actions.setConfig({ module: { rules: [svgRule] } });
      }),
    ]);

    const rules = result.configuration.module.rules;
    expect(rules.slice(8)).toEqual([
      { test: /\.txt$/, use: [{ loader: 'raw-loader', options: {} }] },
      svgRule,
    ]);
    expect(result.invocations).toEqual([{ hook: 'twice', action: 'merge', fragments: 2 }]);
  });

  it('uses a replaced configuration exactly', () => {
    let replacement: BuildConfiguration | undefined;

    const result = runStage('build-html', [
      hook('replacer', ({ actions, getConfig }) => {
        const current = getConfig();
        replacement = {
          ...current,
          module: { rules: [svgRule] },
          plugins: [],
          devtool: 'nosources-source-map',
        };
        actions.replaceConfig(replacement);
      }),
    ]);

    expect(result.configuration).toEqual(replacement);
    expect(result.configuration).not.toBe(replacement);
    expect(result.invocations).toEqual([{ hook: 'replacer', action: 'replace', fragments: 0 }]);
  });

  it('lets later hooks build on a replaced configuration', () => {
    const result = runStage('develop', [
      hook('replacer', ({ actions, getConfig }) =>
        actions.replaceConfig({ ...getConfig(), module: { rules: [] } }),
      ),
      hook('svg', ({ actions }) => actions.setConfig({ module: { rules: [svgRule] } })),
    ]);

    expect(result.configuration.module.rules).toEqual([svgRule]);
  });

  it('aborts the stage when a hook merges and replaces', () => {
    const error = captureError(() =>
      runStage('develop', [
        hook('mixer', ({ actions, getConfig }) => {
          actions.setConfig({ devtool: false });
          actions.replaceConfig(getConfig());
        }),
      ]),
    );

    expect(error).toBeInstanceOf(HookUsageError);
    expect(error).toHaveProperty(
      'message',
      'Hook "mixer" in stage "develop": setConfig and replaceConfig cannot both be called in one invocation.',
    );
    expect(error).toHaveProperty('hook', 'mixer');
    expect(error).toHaveProperty('stage', 'develop');
  });

  it('aborts the stage even when the hook swallows the usage error', () => {
    let thrownInsideHook: unknown;

    const error = captureError(() =>
      runStage('build-javascript', [
        hook('sneaky', ({ actions, getConfig }) => {
          actions.replaceConfig(getConfig());
          try {
            actions.setConfig({ devtool: false });
          } catch (caught) {
            thrownInsideHook = caught;
          }
        }),
      ]),
    );

    expect(thrownInsideHook).toBeInstanceOf(HookUsageError);
    expect(error).toBe(thrownInsideHook);
  });

  it('rejects a second replacement in one invocation', () => {
    const error = captureError(() =>
      runStage('develop', [
        hook('double', ({ actions, getConfig }) => {
          actions.replaceConfig(getConfig());
          actions.replaceConfig(getConfig());
        }),
      ]),
    );

    expect(error).toHaveProperty(
      'message',
      'Hook "double" in stage "develop": replaceConfig can only be called once per invocation.',
    );
  });

  it('rejects actions used after the hook returned', () => {
    const stashed: ConfigMutator[] = [];

    const result = runStage('develop', [
      hook('late', ({ actions }) => {
        stashed.push(actions);
      }),
    ]);

    expect(() => stashed[0]?.setConfig({ devtool: false })).toThrow(
      'Hook "late" in stage "develop": setConfig was called after the hook returned.',
    );
    expect(result.configuration.devtool).toBe('eval-cheap-module-source-map');
  });

  it('rejects hooks that return a promise', () => {
    const error = captureError(() =>
      runStage('develop', [
        hook('async', async () => {
          await Promise.resolve();
        }),
      ]),
    );

    expect(error).toBeInstanceOf(HookUsageError);
    expect(error).toHaveProperty(
      'message',
      'Hook "async" in stage "develop": hooks must run synchronously but a promise was returned.',
    );
  });

  it('reports a rejected promise from an async hook without leaving it unhandled', async () => {
    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown): void => {
      unhandled.push(reason);
    };
    process.on('unhandledRejection', onUnhandled);
    const entries: StructuredLogEvent[] = [];

    try {
      const error = captureError(() =>
        runStage(
          'develop',
          [
            hook('async-svg', async ({ loaders }) => {
              await Promise.resolve();
              loaders.svgr();
            }),
          ],
          { log: (entry) => entries.push(entry) },
        ),
      );
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(error).toBeInstanceOf(HookUsageError);
      expect(unhandled).toEqual([]);
      expect(entries.filter((entry) => entry.event === 'build.hook.rejected')).toEqual([
        {
          level: 'error',
          name: 'stagepack-build',
          event: 'build.hook.rejected',
          data: {
            stage: 'develop',
            hook: 'async-svg',
            message: 'Unknown loader factory "svgr". Registered loader factories: ' +
              'json, yaml, null, raw, style, miniCssExtract, css, postcss, file, url, js, eslint.',
          },
        },
      ]);
    } finally {
      process.off('unhandledRejection', onUnhandled);
    }
  });

  it('validates replacements when replaceConfig is called', () => {
    let thrownInsideHook: unknown;

    const error = captureError(() =>
      runStage('develop', [
        hook('broken', ({ actions, getConfig }) => {
          const current = getConfig();
          try {
            actions.replaceConfig({ ...current, output: { ...current.output, filename: '' } });
          } catch (caught) {
            thrownInsideHook = caught;
          }
        }),
      ]),
    );

    expect(thrownInsideHook).toBeInstanceOf(ConfigValidationError);
    expect(error).toBe(thrownInsideHook);
    expect(error).toHaveProperty(
      'message',
      'Invalid build configuration:\n  - output.filename: String must not be empty.',
    );
  });

  it('propagates errors thrown by hooks unchanged', () => {
    const failure = new Error('hook exploded');

    const error = captureError(() =>
      runStage('develop', [
        hook('exploding', () => {
          throw failure;
        }),
      ]),
    );

    expect(error).toBe(failure);
  });

  it('stops at the first failing hook', () => {
    const after = vi.fn();

    captureError(() =>
      runStage('develop', [
        hook('exploding', () => {
          throw new Error('hook exploded');
        }),
        hook('after', after),
      ]),
    );

    expect(after).not.toHaveBeenCalled();
  });

  it('fails when a hook asks for an unknown factory', () => {
    const error = captureError(() =>
      runStage('develop', [
        hook('sass', ({ actions, loaders }) =>
          actions.setConfig({ module: { rules: [{ test: /\.scss$/, use: [loaders.sass()] }] } }),
        ),
      ]),
    );

    expect(error).toBeInstanceOf(FactoryNotFoundError);
  });

  it('passes registration options as the second argument', () => {
    const received: unknown[] = [];
    const record = (_args: HookArgs, options: unknown) => {
      received.push(options);
    };

    runStage('develop', [
      { name: 'configured', onCreateBuildConfig: record, options: { verbose: true } },
      hook('plain', record),
    ]);

    expect(received).toEqual([{ verbose: true }, {}]);
    expect(Object.isFrozen(received[1])).toBe(true);
  });

  it('logs each invocation at debug level', () => {
    const log = vi.fn<(entry: StructuredLogEvent) => void>();

    runStage(
      'develop',
      [hook('svg', ({ actions }) => actions.setConfig({ module: { rules: [svgRule] } }))],
      { log },
    );

    expect(log).toHaveBeenCalledWith({
      level: 'debug',
      name: 'stagepack-build',
      event: 'build.hook.invoke',
      data: { stage: 'develop', hook: 'svg', action: 'merge', fragments: 1 },
    });
  });
});
