import {
  DuplicateFactoryError,
  FactoryNotFoundError,
  type FactoryKind,
} from '../domain/errors.js';
import type {
  LoaderDescriptor,
  PluginDescriptor,
  RuleDescriptor,
} from '../domain/models/configuration.js';
import { describeStage, type BuildStage, type StageTraits } from '../domain/models/stages.js';

export type FactoryOptions = Readonly<Record<string, unknown>>;

/**
 * Callable view of a registry bound to one stage: `loaders.css({ importLoaders: 1 })`.
 */
export type FactoryAccessor<TDescriptor> = Readonly<
  Record<string, (options?: FactoryOptions) => TDescriptor>
>;

/**
 * Context handed to every factory. Factories branch on `traits` to pick stage defaults and may
 * compose loaders through `loaders`.
 */
export interface StageFactoryContext {
  readonly stage: BuildStage;
  readonly traits: StageTraits;
  readonly loaders: FactoryAccessor<LoaderDescriptor>;
}

export interface DescriptorFactory<TDescriptor> {
  readonly name: string;
  create(context: StageFactoryContext, options?: FactoryOptions): TDescriptor;
}

export type LoaderFactory = DescriptorFactory<LoaderDescriptor>;
export type PluginFactory = DescriptorFactory<PluginDescriptor>;
export type RulePresetFactory = DescriptorFactory<RuleDescriptor>;

/**
 * Named factories of one kind. Lookups of unregistered names fail with
 * {@link FactoryNotFoundError}; there is no fallback factory.
 */
export class FactoryRegistry<TDescriptor> {
  private readonly factories = new Map<string, DescriptorFactory<TDescriptor>>();

  constructor(
    readonly kind: FactoryKind,
    initial: readonly DescriptorFactory<TDescriptor>[] = [],
  ) {
    for (const factory of initial) {
      this.register(factory);
    }
  }

  register(factory: DescriptorFactory<TDescriptor>): void {
    if (this.factories.has(factory.name)) {
      throw new DuplicateFactoryError(this.kind, factory.name);
    }
    this.factories.set(factory.name, factory);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /**
   * Lists registered factory names in registration order.
   */
  list(): readonly string[] {
    return [...this.factories.keys()];
  }

  resolve(name: string): DescriptorFactory<TDescriptor> {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new FactoryNotFoundError(this.kind, name, this.list());
    }
    return factory;
  }

  create(name: string, context: StageFactoryContext, options?: FactoryOptions): TDescriptor {
    return this.resolve(name).create(context, options);
  }
}

/**
 * The three registries consulted while building a stage.
 */
export interface FactoryRegistries {
  readonly loaders: FactoryRegistry<LoaderDescriptor>;
  readonly plugins: FactoryRegistry<PluginDescriptor>;
  readonly presets: FactoryRegistry<RuleDescriptor>;
}

/**
 * Registries bound to a single stage.
 */
export interface StageFactories {
  readonly stage: BuildStage;
  readonly loaders: FactoryAccessor<LoaderDescriptor>;
  readonly plugins: FactoryAccessor<PluginDescriptor>;
  readonly presets: FactoryAccessor<RuleDescriptor>;
}

/** Names read by `await` and `JSON.stringify`, which must not look like factories. */
const PROTOCOL_PROPERTIES: ReadonlySet<string> = new Set(['then', 'toJSON']);

/**
 * Exposes a registry as an object whose properties are its factories. Reading a name that is not
 * registered yields a function that throws {@link FactoryNotFoundError} when called, except for
 * `then`, `toJSON` and the members of `Object.prototype`, so the accessor stays a plain object.
 *
 * @param registry - Registry to expose.
 * @param context - Stage context forwarded to each factory.
 * @returns Accessor object bound to the context's stage.
 */
export function bindFactories<TDescriptor>(
  registry: FactoryRegistry<TDescriptor>,
  context: StageFactoryContext,
): FactoryAccessor<TDescriptor> {
  const invoke =
    (name: string) =>
    (options?: FactoryOptions): TDescriptor =>
      registry.create(name, context, options);

  return new Proxy<Record<string, (options?: FactoryOptions) => TDescriptor>>(
    {},
    {
      get: (_target, property) => {
        if (typeof property !== 'string') {
          return undefined;
        }
        if (registry.has(property)) {
          return invoke(property);
        }
        if (PROTOCOL_PROPERTIES.has(property)) {
          return undefined;
        }
        if (property in Object.prototype) {
          return Reflect.get(Object.prototype, property);
        }
        return invoke(property);
      },
      has: (_target, property) => typeof property === 'string' && registry.has(property),
      ownKeys: () => [...registry.list()],
      getOwnPropertyDescriptor: (_target, property) =>
        typeof property === 'string' && registry.has(property)
          ? { configurable: true, enumerable: true, writable: false, value: invoke(property) }
          : undefined,
      set: () => false,
      defineProperty: () => false,
      deleteProperty: () => false,
    },
  );
}

/**
 * Binds every registry to `stage`.
 */
export function bindStageFactories(registries: FactoryRegistries, stage: BuildStage): StageFactories {
  const traits = describeStage(stage);
  const context: { stage: BuildStage; traits: StageTraits; loaders: FactoryAccessor<LoaderDescriptor> } =
    { stage, traits, loaders: {} };
  context.loaders = bindFactories(registries.loaders, context);

  return {
    stage,
    loaders: context.loaders,
    plugins: bindFactories(registries.plugins, context),
    presets: bindFactories(registries.presets, context),
  };
}
