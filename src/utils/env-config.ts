/**
 * Environment Variable Configuration Utilities
 *
 * Turns environment variables into a nested partial configuration object
 * that can be layered over file-based settings.
 */

export type ConfigTree = { [key: string]: unknown };

/**
 * Defines a mapping between an environment variable and a configuration object path
 */
export interface EnvMapping {
  /** The name of the environment variable to read from */
  envVar: string;
  /** The nested path in the configuration object where the value should be set */
  configPath: string[];
  /** Optional transformation function to process the environment variable value */
  transform?: (value: string) => unknown;
}

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sets a nested value in an object, creating intermediate objects as needed
 *
 * @example
 * ```typescript
 * const config = {};
 * setNestedValue(config, ['loop', 'interval_ms'], 250);
 * // Result: { loop: { interval_ms: 250 } }
 * ```
 */
export function setNestedValue(obj: ConfigTree, path: string[], value: unknown): ConfigTree {
  if (path.length === 0) {
    return obj;
  }

  let current = obj;

  // Navigate to the parent of the target property
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isConfigTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[key] = created;
      current = created;
    }
  }

  current[path[path.length - 1]] = value;

  return obj;
}

/**
 * Processes an array of environment variable mappings into a configuration object.
 * Unset variables are skipped, as are values the transform maps to NaN.
 */
export function processEnvMappings(
  mappings: EnvMapping[],
  env: NodeJS.ProcessEnv = process.env
): ConfigTree {
  const config: ConfigTree = {};

  for (const mapping of mappings) {
    const envValue = env[mapping.envVar];

    if (envValue === undefined || envValue.trim() === '') {
      continue;
    }

    const processedValue = mapping.transform ? mapping.transform(envValue) : envValue;
    if (typeof processedValue === 'number' && Number.isNaN(processedValue)) {
      continue;
    }

    setNestedValue(config, mapping.configPath, processedValue);
  }

  return config;
}

/**
 * Common transformation functions for environment variable processing
 */
export const transforms = {
  /** Convert string to number */
  number: (value: string): number => Number(value),

  /** Trimmed, lower-cased string */
  lower: (value: string): string => value.trim().toLowerCase()
};

/**
 * Deep-merges `override` onto `base`. Plain objects merge key by key;
 * any other override value replaces the base value.
 */
export function mergeTree(base: unknown, override: unknown): unknown {
  if (!isConfigTree(base) || !isConfigTree(override)) {
    return override === undefined ? base : override;
  }

  const merged: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeTree(base[key], value);
  }
  return merged;
}
