import path from 'node:path';
import { pathToFileURL } from 'node:url';

import type { HookModuleConfigEntry, StagepackConfig } from '../../config/index.js';
import type { BuildConfigHook, HookOptions, HookRegistration } from '../../domain/ports/hooks.js';
import { createDefaultFactoryRegistries } from '../../factories/default-factories.js';
import type { FactoryRegistries } from '../../factories/factory-registry.js';

/**
 * Context passed to a hook module's `registerFactories` export.
 */
export interface FactoryRegistrationContext {
  readonly registries: FactoryRegistries;
  readonly options: HookOptions;
}

/**
 * Shape of modules that can be consumed as hook modules. They may provide a named
 * `onCreateBuildConfig` export, a default function export, a default object carrying
 * `onCreateBuildConfig`, or let configuration select a named export.
 */
export interface HookModule {
  readonly default?: unknown;
  readonly onCreateBuildConfig?: unknown;
  readonly registerFactories?: unknown;
  [exportName: string]: unknown;
}

/**
 * Function responsible for importing hook modules. Tests may provide a custom importer to
 * control module resolution.
 */
export type HookModuleImporter = (specifier: string) => Promise<HookModule>;

export interface LoadHookRegistrationsOptions {
  readonly config: StagepackConfig;
  readonly configDirectory: string;
  /** Overrides `config.hooks`. */
  readonly hooks?: readonly HookModuleConfigEntry[];
  /** Registries receiving factories from `registerFactories` exports. */
  readonly registries?: FactoryRegistries;
  readonly importModule?: HookModuleImporter;
}

export interface LoadedHookModules {
  /** Hooks in configuration order. */
  readonly hooks: readonly HookRegistration[];
  readonly registries: FactoryRegistries;
}

interface NormalisedHookModuleEntry {
  readonly module: string;
  readonly export?: string;
  readonly options: HookOptions;
}

/**
 * Imports every hook module declared in configuration, in order, and returns their hooks along
 * with the factory registries they extended.
 *
 * @param options - Configuration describing which modules to load and how to import them.
 * @returns Hook registrations ready for the build runtime.
 * @throws {TypeError} When an entry is malformed or a module exports no usable hook.
 */
export async function loadHookRegistrations(
  options: LoadHookRegistrationsOptions,
): Promise<LoadedHookModules> {
  const registries = options.registries ?? createDefaultFactoryRegistries();
  const entries = options.hooks ?? options.config.hooks ?? [];
  const importModule = options.importModule ?? defaultHookModuleImporter;
  const hooks: HookRegistration[] = [];

  for (const entry of entries) {
    const normalised = normaliseHookModuleEntry(entry);
    const specifier = resolveHookModuleSpecifier(normalised.module, options.configDirectory);
    const module = await importModule(specifier);

    const registerFactories = resolveFactoryRegistration(module);
    if (registerFactories) {
      await Reflect.apply(registerFactories, undefined, [
        { registries, options: normalised.options } satisfies FactoryRegistrationContext,
      ]);
    }

    const hook = resolveHookExport(module, normalised, specifier, registerFactories !== undefined);
    if (hook) {
      hooks.push({
        name: normalised.export ? `${normalised.module}#${normalised.export}` : normalised.module,
        onCreateBuildConfig: hook,
        options: normalised.options,
      });
    }
  }

  return { hooks, registries };
}

function normaliseHookModuleEntry(entry: HookModuleConfigEntry): NormalisedHookModuleEntry {
  if (typeof entry === 'string') {
    const trimmed = entry.trim();
    if (trimmed.length === 0) {
      throw new TypeError('Hook module specifiers must be non-empty strings.');
    }
    return { module: trimmed, options: Object.freeze({}) };
  }
  if (isPlainObject(entry)) {
    const moduleSpecifier = entry.module;
    if (typeof moduleSpecifier !== 'string' || moduleSpecifier.trim().length === 0) {
      throw new TypeError('Hook module objects must include a non-empty "module" string.');
    }
    const exportName: unknown = entry.export;
    let trimmedExport: string | undefined;
    if (typeof exportName === 'string') {
      trimmedExport = exportName.trim();
    } else if (exportName !== undefined) {
      throw new TypeError('Hook module "export" field must be a string when provided.');
    }
    const hookOptions: unknown = entry.options;
    let frozenOptions: HookOptions = Object.freeze({});
    if (isPlainObject(hookOptions)) {
      frozenOptions = Object.freeze({ ...hookOptions });
    } else if (hookOptions !== undefined) {
      throw new TypeError('Hook module "options" field must be an object when provided.');
    }
    return {
      module: moduleSpecifier.trim(),
      ...(trimmedExport ? { export: trimmedExport } : {}),
      options: frozenOptions,
    };
  }
  throw new TypeError('Hook module entries must be strings or objects with a "module" field.');
}

/**
 * Resolves a hook module specifier relative to the configuration directory when required.
 */
function resolveHookModuleSpecifier(specifier: string, configDirectory: string): string {
  if (specifier.startsWith('file:')) {
    return specifier;
  }
  if (specifier.startsWith('.')) {
    return pathToFileURL(path.resolve(configDirectory, specifier)).href;
  }
  if (path.isAbsolute(specifier) || path.win32.isAbsolute(specifier)) {
    return pathToFileURL(specifier).href;
  }
  if (/^[a-zA-Z][a-zA-Z0-9+.-]*:/.test(specifier)) {
    throw new TypeError(
      `Hook module specifiers must be bare package names or filesystem paths. Received "${specifier}".`,
    );
  }
  return specifier;
}

async function defaultHookModuleImporter(specifier: string): Promise<HookModule> {
  const imported: unknown = await import(specifier);
  if (isModuleNamespace(imported)) {
    return imported;
  }
  throw new TypeError(`Hook module ${specifier} did not resolve to an object export.`);
}

function resolveHookExport(
  module: HookModule,
  entry: NormalisedHookModuleEntry,
  specifier: string,
  registersFactories: boolean,
): BuildConfigHook | undefined {
  if (entry.export) {
    const candidate = module[entry.export];
    if (typeof candidate !== 'function') {
      throw new TypeError(`Hook export "${entry.export}" from ${specifier} must be a function.`);
    }
    return toBuildConfigHook(candidate);
  }

  const named = module.onCreateBuildConfig;
  if (typeof named === 'function') {
    return toBuildConfigHook(named);
  }

  const defaultExport = module.default;
  if (typeof defaultExport === 'function') {
    return toBuildConfigHook(defaultExport);
  }
  if (isPlainObject(defaultExport)) {
    const nested = defaultExport['onCreateBuildConfig'];
    if (typeof nested === 'function') {
      return toBuildConfigHook(nested);
    }
  }

  if (registersFactories) {
    return undefined;
  }
  throw new TypeError(
    `Hook module ${specifier} must export a function named "onCreateBuildConfig" ` +
      'or a default function export.',
  );
}

function resolveFactoryRegistration(module: HookModule): Function | undefined {
  if (typeof module.registerFactories === 'function') {
    return module.registerFactories;
  }
  const defaultExport = module.default;
  if (isPlainObject(defaultExport)) {
    const nested = defaultExport['registerFactories'];
    if (typeof nested === 'function') {
      return nested;
    }
  }
  return undefined;
}

/**
 * Wraps an untyped export so the dispatcher still sees what it returns.
 */
function toBuildConfigHook(candidate: Function): BuildConfigHook {
  return (args, options) => Reflect.apply(candidate, undefined, [args, options]);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isModuleNamespace(value: unknown): value is HookModule {
  return typeof value === 'object' && value !== null;
}
