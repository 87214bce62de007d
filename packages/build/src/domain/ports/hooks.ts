import type { FactoryAccessor } from '../../factories/factory-registry.js';
import type {
  BuildConfiguration,
  ConfigurationFragment,
  LoaderDescriptor,
  PluginDescriptor,
  RuleDescriptor,
} from '../models/configuration.js';
import type { BuildStage } from '../models/stages.js';

/**
 * Terminal actions a hook may take on the stage configuration. A single invocation may merge any
 * number of fragments or replace the configuration once, never both.
 */
export interface ConfigMutator {
  /** Merges `fragment` into the configuration once the hook returns. */
  setConfig(fragment: ConfigurationFragment): void;
  /** Discards the configuration and uses `configuration` instead once the hook returns. */
  replaceConfig(configuration: BuildConfiguration): void;
}

export type HookOptions = Readonly<Record<string, unknown>>;

export interface HookArgs {
  readonly stage: BuildStage;
  /** Rules of the configuration as it stood when the hook was called. */
  readonly rules: readonly RuleDescriptor[];
  readonly loaders: FactoryAccessor<LoaderDescriptor>;
  readonly plugins: FactoryAccessor<PluginDescriptor>;
  readonly presets: FactoryAccessor<RuleDescriptor>;
  readonly actions: ConfigMutator;
  /** Returns a frozen snapshot of the configuration as it stood when the hook was called. */
  readonly getConfig: () => BuildConfiguration;
}

/**
 * User callback invoked once per stage. Hooks run synchronously and report changes only through
 * `args.actions`.
 */
export type BuildConfigHook = (args: HookArgs, options: HookOptions) => void;

export interface HookRegistration {
  /** Label used in logs and error messages, usually the module the hook came from. */
  readonly name: string;
  readonly onCreateBuildConfig: BuildConfigHook;
  readonly options?: HookOptions;
}
