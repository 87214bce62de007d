import { z } from 'zod';

import { ConfigValidationError, type ConfigValidationIssue } from '../errors.js';
import type { BuildMode, BuildTarget } from './stages.js';

export type DescriptorOptions = Readonly<Record<string, unknown>>;

/**
 * A single loader applied by a rule, e.g. `{ loader: 'css-loader', options: { importLoaders: 1 } }`.
 */
export interface LoaderDescriptor {
  readonly loader: string;
  readonly options?: DescriptorOptions;
  readonly [key: string]: unknown;
}

export type RuleCondition = RegExp | string;

export interface RuleDescriptor {
  readonly test: RuleCondition;
  readonly include?: RuleCondition | readonly RuleCondition[];
  readonly exclude?: RuleCondition | readonly RuleCondition[];
  readonly type?: string;
  readonly use?: readonly LoaderDescriptor[];
  readonly [key: string]: unknown;
}

export interface PluginDescriptor {
  readonly name: string;
  readonly options: DescriptorOptions;
  readonly [key: string]: unknown;
}

export interface OutputConfiguration {
  readonly path: string;
  readonly filename: string;
  readonly publicPath: string;
  readonly chunkFilename?: string;
  readonly libraryTarget?: string;
  readonly [key: string]: unknown;
}

export interface ResolveConfiguration {
  readonly extensions: readonly string[];
  readonly alias: Readonly<Record<string, string | false>>;
  readonly modules: readonly string[];
  readonly [key: string]: unknown;
}

export interface ModuleConfiguration {
  readonly rules: readonly RuleDescriptor[];
  readonly [key: string]: unknown;
}

/**
 * Bundler configuration produced for one stage.
 */
export interface BuildConfiguration {
  readonly mode: BuildMode;
  readonly target: BuildTarget;
  readonly devtool?: string | false;
  readonly entry: Readonly<Record<string, readonly string[]>>;
  readonly output: OutputConfiguration;
  readonly module: ModuleConfiguration;
  readonly resolve: ResolveConfiguration;
  readonly plugins: readonly PluginDescriptor[];
  readonly optimization?: DescriptorOptions;
  readonly performance?: DescriptorOptions;
  readonly externals?: readonly (string | DescriptorOptions)[];
  readonly [key: string]: unknown;
}

/**
 * Partial configuration accepted by the merge action. Every level is optional.
 */
export interface ConfigurationFragment {
  readonly mode?: BuildMode;
  readonly target?: BuildTarget;
  readonly devtool?: string | false;
  readonly entry?: Readonly<Record<string, readonly string[]>>;
  readonly output?: Partial<OutputConfiguration>;
  readonly module?: Partial<ModuleConfiguration>;
  readonly resolve?: Partial<ResolveConfiguration>;
  readonly plugins?: readonly PluginDescriptor[];
  readonly optimization?: DescriptorOptions;
  readonly performance?: DescriptorOptions;
  readonly externals?: readonly (string | DescriptorOptions)[];
  readonly [key: string]: unknown;
}

const nonEmptyString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

const optionsRecordSchema = z.record(z.string(), z.unknown());

const conditionSchema = z.union([z.instanceof(RegExp), z.string()]);

const conditionListSchema = z.union([conditionSchema, z.array(conditionSchema)]);

const loaderDescriptorSchema = z
  .object({
    loader: nonEmptyString,
    options: optionsRecordSchema.optional(),
  })
  .passthrough();

const ruleDescriptorSchema = z
  .object({
    test: conditionSchema,
    include: conditionListSchema.optional(),
    exclude: conditionListSchema.optional(),
    type: z.string().optional(),
    use: z.array(loaderDescriptorSchema).optional(),
  })
  .passthrough();

const pluginDescriptorSchema = z
  .object({
    name: nonEmptyString,
    options: optionsRecordSchema,
  })
  .passthrough();

const modeSchema = z.enum(['development', 'production']);
const targetSchema = z.enum(['web', 'node']);
const devtoolSchema = z.union([z.string(), z.literal(false)]);
const entrySchema = z.record(z.string(), z.array(z.string()));
const externalsSchema = z.array(z.union([z.string(), optionsRecordSchema]));

const outputShape = {
  path: nonEmptyString,
  filename: nonEmptyString,
  publicPath: z.string(),
  chunkFilename: z.string().optional(),
  libraryTarget: z.string().optional(),
};

const resolveShape = {
  extensions: z.array(z.string()),
  alias: z.record(z.string(), z.union([z.string(), z.literal(false)])),
  modules: z.array(z.string()),
};

const buildConfigurationSchema: z.ZodType<BuildConfiguration, z.ZodTypeDef, unknown> = z
  .object({
    mode: modeSchema,
    target: targetSchema,
    devtool: devtoolSchema.optional(),
    entry: entrySchema,
    output: z.object(outputShape).passthrough(),
    module: z.object({ rules: z.array(ruleDescriptorSchema) }).passthrough(),
    resolve: z.object(resolveShape).passthrough(),
    plugins: z.array(pluginDescriptorSchema),
    optimization: optionsRecordSchema.optional(),
    performance: optionsRecordSchema.optional(),
    externals: externalsSchema.optional(),
  })
  .passthrough();

const configurationFragmentSchema: z.ZodType<ConfigurationFragment, z.ZodTypeDef, unknown> = z
  .object({
    mode: modeSchema.optional(),
    target: targetSchema.optional(),
    devtool: devtoolSchema.optional(),
    entry: entrySchema.optional(),
    output: z.object(outputShape).partial().passthrough().optional(),
    module: z
      .object({ rules: z.array(ruleDescriptorSchema) })
      .partial()
      .passthrough()
      .optional(),
    resolve: z.object(resolveShape).partial().passthrough().optional(),
    plugins: z.array(pluginDescriptorSchema).optional(),
    optimization: optionsRecordSchema.optional(),
    performance: optionsRecordSchema.optional(),
    externals: externalsSchema.optional(),
  })
  .passthrough();

/**
 * Validates a complete configuration and returns a deep-frozen copy of it.
 *
 * Plain objects and arrays are copied before freezing; RegExp and class instances are shared.
 *
 * @param candidate - Value expected to hold every required top-level key.
 * @returns The validated, frozen configuration.
 * @throws {ConfigValidationError} When required keys are missing or fields have the wrong type.
 */
export function finalizeConfiguration(candidate: unknown): BuildConfiguration {
  const result = buildConfigurationSchema.safeParse(clonePlainData(candidate));
  if (!result.success) {
    throw new ConfigValidationError('build configuration', toValidationIssues(result.error));
  }
  return deepFreeze(result.data);
}

/**
 * Checks the shape of a merge fragment without completing it.
 *
 * @param candidate - Fragment handed to the merge action.
 * @returns A frozen copy of the fragment.
 * @throws {ConfigValidationError} When a field the fragment defines has the wrong type.
 */
export function validateConfigurationFragment(candidate: unknown): ConfigurationFragment {
  const result = configurationFragmentSchema.safeParse(clonePlainData(candidate));
  if (!result.success) {
    throw new ConfigValidationError('configuration fragment', toValidationIssues(result.error));
  }
  return deepFreeze(result.data);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function clonePlainData(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => clonePlainData(entry));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, clonePlainData(entry)]),
    );
  }
  return value;
}

function deepFreeze<T>(value: T): T {
  freezePlainData(value);
  return value;
}

function freezePlainData(value: unknown): void {
  if (Array.isArray(value)) {
    for (const entry of value) {
      freezePlainData(entry);
    }
    Object.freeze(value);
    return;
  }
  if (isPlainObject(value)) {
    for (const entry of Object.values(value)) {
      freezePlainData(entry);
    }
    Object.freeze(value);
  }
}

function toValidationIssues(error: z.ZodError): readonly ConfigValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length === 0 ? '(root)' : issue.path.join('.'),
    message: issue.message,
  }));
}
