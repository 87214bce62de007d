import {
  FactoryRegistry,
  type FactoryRegistries,
} from './factory-registry.js';
import { createDefaultLoaderFactories } from './loader-factories.js';
import { createDefaultPluginFactories } from './plugin-factories.js';
import { createDefaultRulePresets } from './rule-presets.js';

/**
 * Creates fresh registries seeded with the built-in loaders, plugins and rule presets.
 * Each call returns independent registries.
 */
export function createDefaultFactoryRegistries(): FactoryRegistries {
  return {
    loaders: new FactoryRegistry('loader', createDefaultLoaderFactories()),
    plugins: new FactoryRegistry('plugin', createDefaultPluginFactories()),
    presets: new FactoryRegistry('rule', createDefaultRulePresets()),
  };
}
