export type {
  EntryConfig,
  HookModuleConfig,
  HookModuleConfigEntry,
  OutputConfig,
  StagepackConfig,
} from './config/index.js';
export { defineConfig } from './config/index.js';

export {
  loadConfig,
  resolveBaseConfigurationOptions,
  resolveConfigPath,
} from './application/configuration/config-loader.js';
export type {
  LoadedConfig,
  ResolveConfigPathOptions,
} from './application/configuration/config-loader.js';
export { loadHookRegistrations } from './application/configuration/hooks.js';
export type {
  FactoryRegistrationContext,
  HookModule,
  HookModuleImporter,
  LoadHookRegistrationsOptions,
  LoadedHookModules,
} from './application/configuration/hooks.js';

export {
  StageConfigurationService,
  buildStageConfiguration,
  createStageConfigurationService,
  createStageConfigurations,
} from './application/build-runtime.js';
export type {
  CreateStageConfigurationsOptions,
  StageBuildResult,
  StageConfigurationServiceOptions,
  StageOutcome,
} from './application/build-runtime.js';
export { dispatchStageHooks } from './application/hook-dispatcher.js';
export type {
  DispatchStageHooksOptions,
  HookAction,
  HookInvocationRecord,
  StageDispatchResult,
} from './application/hook-dispatcher.js';

export {
  ConfigValidationError,
  DuplicateFactoryError,
  FactoryNotFoundError,
  FactoryStageError,
  HookUsageError,
  UnknownStageError,
} from './domain/errors.js';
export type { ConfigValidationIssue, FactoryKind, HookUsageContext } from './domain/errors.js';

export {
  BUILD_STAGES,
  describeStage,
  isBuildStage,
  parseBuildStage,
} from './domain/models/stages.js';
export type { BuildMode, BuildStage, BuildTarget, StageTraits } from './domain/models/stages.js';
export {
  finalizeConfiguration,
  validateConfigurationFragment,
} from './domain/models/configuration.js';
export type {
  BuildConfiguration,
  ConfigurationFragment,
  DescriptorOptions,
  LoaderDescriptor,
  ModuleConfiguration,
  OutputConfiguration,
  PluginDescriptor,
  ResolveConfiguration,
  RuleCondition,
  RuleDescriptor,
} from './domain/models/configuration.js';
export type {
  BuildConfigHook,
  ConfigMutator,
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
  HookArgs,
  HookOptions,
  HookRegistration,
} from './domain/ports/index.js';
export { mergeConfiguration, mergeConfigurations } from './domain/services/configuration-merge.js';
export {
  DEFAULT_BASE_CONFIGURATION_OPTIONS,
  createBaseConfiguration,
} from './domain/services/base-configuration.js';
export type { BaseConfigurationOptions } from './domain/services/base-configuration.js';

export * from './factories/index.js';

export { createBuildStageLoggingSubscriber } from './logging/index.js';
