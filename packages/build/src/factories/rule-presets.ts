import type { RuleDescriptor } from '../domain/models/configuration.js';
import type { FactoryOptions, RulePresetFactory, StageFactoryContext } from './factory-registry.js';

const SCRIPT_PATTERN = /\.(js|mjs|jsx|ts|tsx)$/;
const YAML_PATTERN = /\.ya?ml$/;
const FONT_PATTERN = /\.(eot|otf|ttf|woff2?)(\?.*)?$/;
const IMAGE_PATTERN = /\.(ico|svg|jpe?g|png|gif|webp|avif)(\?.*)?$/;
const MEDIA_PATTERN = /\.(mp4|webm|ogv|wav|mp3|m4a|aac|oga|flac)$/;
const MISC_ASSET_PATTERN = /\.pdf$/;
const CSS_PATTERN = /\.css$/;
const CSS_MODULE_PATTERN = /\.module\.css$/;
const NODE_MODULES_PATTERN = /node_modules/;

const createRulePreset = (
  name: string,
  build: (context: StageFactoryContext, options: FactoryOptions) => RuleDescriptor,
): RulePresetFactory => ({
  name,
  create: (context, options = {}) => build(context, options),
});

function styleLoaders(context: StageFactoryContext, cssOptions: FactoryOptions) {
  return [
    context.loaders.miniCssExtract(),
    context.loaders.css({ importLoaders: 1, ...cssOptions }),
    context.loaders.postcss(),
  ];
}

/**
 * Rule presets combining the loader factories into complete rules.
 */
export function createDefaultRulePresets(): readonly RulePresetFactory[] {
  return [
    createRulePreset('js', (context, options) => ({
      test: SCRIPT_PATTERN,
      exclude: NODE_MODULES_PATTERN,
      type: 'javascript/auto',
      use: [context.loaders.js(options)],
    })),
    createRulePreset('yaml', (context) => ({
      test: YAML_PATTERN,
      use: [context.loaders.json(), context.loaders.yaml()],
    })),
    createRulePreset('fonts', (context, options) => ({
      test: FONT_PATTERN,
      use: [context.loaders.url(options)],
    })),
    createRulePreset('images', (context, options) => ({
      test: IMAGE_PATTERN,
      use: [context.loaders.url(options)],
    })),
    createRulePreset('media', (context, options) => ({
      test: MEDIA_PATTERN,
      use: [context.loaders.url(options)],
    })),
    createRulePreset('miscAssets', (context, options) => ({
      test: MISC_ASSET_PATTERN,
      use: [context.loaders.file(options)],
    })),
    createRulePreset('css', (context, options) => ({
      test: CSS_PATTERN,
      exclude: CSS_MODULE_PATTERN,
      // Global stylesheets have no effect on rendered markup.
      use: context.traits.html ? [context.loaders.null()] : styleLoaders(context, options),
    })),
    createRulePreset('cssModules', (context, options) => ({
      test: CSS_MODULE_PATTERN,
      use: context.traits.html
        ? [context.loaders.css({ ...options, modules: options['modules'] ?? true })]
        : styleLoaders(context, { ...options, modules: options['modules'] ?? true }),
    })),
  ];
}
