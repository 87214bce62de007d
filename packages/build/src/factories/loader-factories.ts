import type { LoaderDescriptor } from '../domain/models/configuration.js';
import type { FactoryOptions, LoaderFactory, StageFactoryContext } from './factory-registry.js';

const ASSET_FILENAME = '[name]-[contenthash].[ext]';
const URL_INLINE_LIMIT = 10_000;

const createLoaderFactory = (
  name: string,
  loader: string,
  defaults: (context: StageFactoryContext) => FactoryOptions = () => ({}),
): LoaderFactory => ({
  name,
  create: (context, options = {}): LoaderDescriptor => ({
    loader,
    options: { ...defaults(context), ...options },
  }),
});

const miniCssExtractLoaderFactory: LoaderFactory = {
  name: 'miniCssExtract',
  create: (context, options = {}) => {
    // Styles are injected at runtime while developing; extraction only happens for real builds.
    if (context.stage === 'develop') {
      return context.loaders.style(options);
    }
    return { loader: 'mini-css-extract-plugin/loader', options: { ...options } };
  },
};

const cssLoaderFactory: LoaderFactory = {
  name: 'css',
  create: (context, options = {}) => {
    const { modules, ...rest } = options;
    return {
      loader: 'css-loader',
      options: {
        sourceMap: context.traits.development,
        ...rest,
        modules: resolveCssModules(modules, context),
      },
    };
  },
};

function resolveCssModules(requested: unknown, context: StageFactoryContext): unknown {
  if (requested === undefined || requested === false) {
    return false;
  }
  const overrides = typeof requested === 'object' && requested !== null ? requested : {};
  return {
    localIdentName: context.traits.development
      ? '[path]---[name]--[local]--[hash:base64:5]'
      : '[hash:base64]',
    // Page renderers only need the class name mapping, not the styles themselves.
    exportOnlyLocals: context.traits.html,
    ...overrides,
  };
}

/**
 * Loader factories available to every stage.
 */
export function createDefaultLoaderFactories(): readonly LoaderFactory[] {
  return [
    createLoaderFactory('json', 'json-loader'),
    createLoaderFactory('yaml', 'yaml-loader'),
    createLoaderFactory('null', 'null-loader'),
    createLoaderFactory('raw', 'raw-loader'),
    createLoaderFactory('style', 'style-loader'),
    miniCssExtractLoaderFactory,
    cssLoaderFactory,
    createLoaderFactory('postcss', 'postcss-loader', (context) => ({
      sourceMap: context.traits.development,
    })),
    createLoaderFactory('file', 'file-loader', () => ({ name: ASSET_FILENAME })),
    createLoaderFactory('url', 'url-loader', () => ({
      limit: URL_INLINE_LIMIT,
      name: ASSET_FILENAME,
      fallback: 'file-loader',
    })),
    createLoaderFactory('js', 'babel-loader', (context) => ({
      stage: context.stage,
      cacheDirectory: true,
    })),
    createLoaderFactory('eslint', 'eslint-loader', (context) => ({
      emitWarning: context.traits.development,
    })),
  ];
}
