import path from 'node:path';

import type { StageFactories } from '../../factories/factory-registry.js';
import {
  finalizeConfiguration,
  type BuildConfiguration,
  type PluginDescriptor,
} from '../models/configuration.js';
import { describeStage, type BuildStage } from '../models/stages.js';

export interface BaseConfigurationOptions {
  /** Absolute path of the site being built. */
  readonly rootDirectory: string;
  /** Directory browser bundles are written to, relative to `rootDirectory` unless absolute. */
  readonly outputDirectory: string;
  readonly publicPath: string;
  /** Module request bundled for the browser. */
  readonly clientEntry: string;
  /** Module request bundled as the page renderer. */
  readonly renderEntry: string;
}

export const DEFAULT_BASE_CONFIGURATION_OPTIONS: Omit<BaseConfigurationOptions, 'rootDirectory'> =
  Object.freeze({
    outputDirectory: 'public',
    publicPath: '/',
    clientEntry: './src/app.js',
    renderEntry: './src/render-page.js',
  });

const HOT_CLIENT_ENTRY = 'webpack-hot-middleware/client';
const RENDERER_OUTPUT_DIRECTORIES: Readonly<Record<'develop-html' | 'build-html', string>> = {
  'develop-html': path.join('.cache', 'develop-html'),
  'build-html': path.join('.cache', 'page-ssr'),
};

/**
 * Builds the configuration a stage starts from before any hook runs.
 *
 * @param stage - Stage to configure.
 * @param options - Site locations and entry modules.
 * @param factories - Factories bound to `stage`, used for the default rules and plugins.
 * @returns A validated, frozen configuration.
 */
export function createBaseConfiguration(
  stage: BuildStage,
  options: BaseConfigurationOptions,
  factories: StageFactories,
): BuildConfiguration {
  const traits = describeStage(stage);
  const { presets, plugins } = factories;

  return finalizeConfiguration({
    mode: traits.mode,
    target: traits.target,
    devtool: resolveDevtool(stage),
    entry: resolveEntry(stage, options),
    output: resolveOutput(stage, options),
    module: {
      rules: [
        presets.js(),
        presets.yaml(),
        presets.fonts(),
        presets.images(),
        presets.media(),
        presets.miscAssets(),
        presets.css(),
        presets.cssModules(),
      ],
    },
    resolve: {
      extensions: ['.mjs', '.js', '.jsx', '.ts', '.tsx', '.json'],
      alias: {},
      modules: [path.join(options.rootDirectory, 'node_modules'), 'node_modules'],
    },
    plugins: resolvePlugins(stage, plugins),
    optimization:
      stage === 'build-javascript'
        ? { minimize: true, runtimeChunk: { name: 'webpack-runtime' }, splitChunks: { chunks: 'all' } }
        : { minimize: false },
    ...(traits.html ? { performance: { hints: false } } : {}),
  });
}

function resolvePlugins(
  stage: BuildStage,
  plugins: StageFactories['plugins'],
): PluginDescriptor[] {
  const descriptors = [plugins.define()];
  if (stage === 'develop') {
    descriptors.push(plugins.hotModuleReplacement());
  }
  if (stage === 'build-javascript') {
    descriptors.push(plugins.miniCssExtract());
  }
  return descriptors;
}

function resolveDevtool(stage: BuildStage): string | false {
  switch (stage) {
    case 'develop': {
      return 'eval-cheap-module-source-map';
    }
    case 'build-javascript': {
      return 'source-map';
    }
    default: {
      return false;
    }
  }
}

function resolveEntry(
  stage: BuildStage,
  options: BaseConfigurationOptions,
): Record<string, string[]> {
  switch (stage) {
    case 'develop': {
      return { app: [HOT_CLIENT_ENTRY, options.clientEntry] };
    }
    case 'build-javascript': {
      return { app: [options.clientEntry] };
    }
    default: {
      return { 'render-page': [options.renderEntry] };
    }
  }
}

function resolveOutput(stage: BuildStage, options: BaseConfigurationOptions) {
  const publicDirectory = path.resolve(options.rootDirectory, options.outputDirectory);

  switch (stage) {
    case 'develop': {
      return {
        path: publicDirectory,
        filename: '[name].js',
        chunkFilename: '[name].js',
        publicPath: options.publicPath,
      };
    }
    case 'build-javascript': {
      return {
        path: publicDirectory,
        filename: '[name]-[contenthash].js',
        chunkFilename: '[name]-[contenthash].js',
        publicPath: options.publicPath,
      };
    }
    default: {
      return {
        path: path.join(options.rootDirectory, RENDERER_OUTPUT_DIRECTORIES[stage]),
        filename: 'render-page.js',
        publicPath: options.publicPath,
        libraryTarget: 'commonjs',
      };
    }
  }
}
