import {
  finalizeConfiguration,
  isPlainObject,
  validateConfigurationFragment,
  type BuildConfiguration,
  type ConfigurationFragment,
} from '../models/configuration.js';

/**
 * Merges a partial configuration into a complete one.
 *
 * - Arrays are concatenated, base entries first. Nothing is deduplicated, so registering the same
 *   rule twice yields two entries.
 * - Plain objects are merged key by key.
 * - Any other value defined by the fragment replaces the base value. Keys whose value is
 *   `undefined` leave the base untouched.
 *
 * Neither argument is modified.
 *
 * @param base - Configuration to extend.
 * @param fragment - Partial configuration layered on top of `base`.
 * @returns A new validated, frozen configuration.
 * @throws {ConfigValidationError} When the fragment or the merged result has an invalid shape.
 */
export function mergeConfiguration(
  base: BuildConfiguration,
  fragment: ConfigurationFragment,
): BuildConfiguration {
  const validated = validateConfigurationFragment(fragment);
  return finalizeConfiguration(mergeValues(base, validated));
}

/**
 * Applies several fragments in order, each on top of the previous result.
 */
export function mergeConfigurations(
  base: BuildConfiguration,
  fragments: readonly ConfigurationFragment[],
): BuildConfiguration {
  return fragments.reduce<BuildConfiguration>(
    (configuration, fragment) => mergeConfiguration(configuration, fragment),
    base,
  );
}

export function mergeValues(base: unknown, patch: unknown): unknown {
  if (patch === undefined) {
    return base;
  }
  if (Array.isArray(base) && Array.isArray(patch)) {
    return [...base, ...patch];
  }
  if (isPlainObject(base) && isPlainObject(patch)) {
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(patch)) {
      merged[key] = mergeValues(base[key], value);
    }
    return merged;
  }
  return patch;
}
