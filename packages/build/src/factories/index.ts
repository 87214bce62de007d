export {
  FactoryRegistry,
  bindFactories,
  bindStageFactories,
  type DescriptorFactory,
  type FactoryAccessor,
  type FactoryOptions,
  type FactoryRegistries,
  type LoaderFactory,
  type PluginFactory,
  type RulePresetFactory,
  type StageFactories,
  type StageFactoryContext,
} from './factory-registry.js';
export { createDefaultFactoryRegistries } from './default-factories.js';
export { createDefaultLoaderFactories } from './loader-factories.js';
export { createDefaultPluginFactories } from './plugin-factories.js';
export { createDefaultRulePresets } from './rule-presets.js';
