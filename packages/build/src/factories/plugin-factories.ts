import { FactoryStageError } from '../domain/errors.js';
import type { PluginDescriptor } from '../domain/models/configuration.js';
import type { FactoryOptions, PluginFactory, StageFactoryContext } from './factory-registry.js';

const createPluginFactory = (
  name: string,
  plugin: string,
  defaults: (context: StageFactoryContext) => FactoryOptions = () => ({}),
): PluginFactory => ({
  name,
  create: (context, options = {}): PluginDescriptor => ({
    name: plugin,
    options: { ...defaults(context), ...options },
  }),
});

const hotModuleReplacementPluginFactory: PluginFactory = {
  name: 'hotModuleReplacement',
  create: (context, options = {}) => {
    if (context.stage !== 'develop') {
      throw new FactoryStageError('plugin', 'hotModuleReplacement', context.stage);
    }
    return { name: 'HotModuleReplacementPlugin', options: { ...options } };
  },
};

/** Caller definitions are kept, but the mode and stage always describe the bound stage. */
const definePluginFactory: PluginFactory = {
  name: 'define',
  create: (context, options = {}) => ({
    name: 'DefinePlugin',
    options: {
      ...options,
      'process.env.NODE_ENV': JSON.stringify(context.traits.mode),
      'process.env.BUILD_STAGE': JSON.stringify(context.stage),
    },
  }),
};

/**
 * Plugin factories available to every stage.
 */
export function createDefaultPluginFactories(): readonly PluginFactory[] {
  return [
    definePluginFactory,
    createPluginFactory('provide', 'ProvidePlugin'),
    createPluginFactory('ignore', 'IgnorePlugin'),
    createPluginFactory('environment', 'EnvironmentPlugin'),
    createPluginFactory('miniCssExtract', 'MiniCssExtractPlugin', (context) =>
      context.traits.development
        ? { filename: '[name].css', chunkFilename: '[id].css' }
        : { filename: '[name].[contenthash].css', chunkFilename: '[name].[contenthash].css' },
    ),
    hotModuleReplacementPluginFactory,
    createPluginFactory('banner', 'BannerPlugin'),
    createPluginFactory('limitChunkCount', 'LimitChunkCountPlugin'),
    createPluginFactory('normalModuleReplacement', 'NormalModuleReplacementPlugin'),
    createPluginFactory('contextReplacement', 'ContextReplacementPlugin'),
  ];
}
