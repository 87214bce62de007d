export type PackageName = `@stagepack/${string}`;

export interface PackageManifest {
  readonly name: PackageName;
  readonly summary: string;
}

export type FrozenManifest<T extends PackageManifest = PackageManifest> = Readonly<T>;

export const createPackageManifest = <T extends PackageManifest>(manifest: T): FrozenManifest<T> =>
  Object.freeze({ ...manifest });

export {
  JsonLineLogger,
  LOG_LEVELS,
  noopLogger,
  type JsonLineLoggerOptions,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  jsonReplacer,
  serialiseError,
  writeJson,
  writeLine,
  type WritableTarget,
  type WriteJsonOptions,
} from './reporting/index.js';

export * from './runtime/index.js';

export {
  ConfigNotFoundError,
  DEFAULT_STAGEPACK_CONFIG_FILES,
  loadConfigModule,
  resolveConfigPath,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
  type ResolveConfigPathOptions,
} from './config/index.js';

const manifestDefinition = {
  name: '@stagepack/core',
  summary: 'Structured logging, lifecycle events, and configuration discovery shared by stagepack packages.',
} as const satisfies PackageManifest;

export const manifest = createPackageManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
