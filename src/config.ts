/**
 * Configuration loader with validation
 */

import { METRIC_NAMES, OPTIMIZATION_STRATEGIES, type OptimizationStrategy, type OptimizerConfig } from './types/common.js';
import * as yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from './utils/logger.js';
import { processEnvMappings, transforms, isConfigTree, mergeTree, type EnvMapping, type ConfigTree } from './utils/env-config.js';

const DEFAULT_CONFIG_PATHS = [
  'config.yaml',
  'config.yml',
  'config.example.yaml',
  path.join(process.cwd(), 'config.yaml'),
  path.join(process.cwd(), 'config.example.yaml')
];

/**
 * Load and validate configuration. Values in the file are layered over
 * the defaults, so a file only needs the keys it changes.
 */
export async function loadConfig(configPath?: string): Promise<OptimizerConfig> {
  const pathsToTry = configPath ? [configPath] : DEFAULT_CONFIG_PATHS;

  for (const filePath of pathsToTry) {
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = yaml.load(content) ?? {};
      const config = mergeTree(getDefaultConfig(), parsed);

      validateConfig(config);

      Logger.info(`Loaded configuration from: ${filePath}`);
      return config;
    } catch (error) {
      if (configPath) {
        // If specific path was provided, throw error
        throw new Error(`Failed to load config from ${configPath}: ${error}`);
      }
      // Continue trying other paths
      continue;
    }
  }

  Logger.warn('No configuration file found, using defaults');
  return getDefaultConfig();
}

function requireSection(c: ConfigTree, name: string): ConfigTree {
  const section = c[name];
  if (!isConfigTree(section)) {
    throw new Error(`Missing required ${name} configuration`);
  }
  return section;
}

function requireNumber(
  section: ConfigTree,
  key: string,
  label: string,
  min: number,
  max: number,
  integer = false
): void {
  const value = section[key];
  if (typeof value !== 'number' || Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${label} must be between ${min} and ${max}`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new Error(`${label} must be an integer`);
  }
}

export function isOptimizationStrategy(value: unknown): value is OptimizationStrategy {
  return typeof value === 'string' && OPTIMIZATION_STRATEGIES.some(strategy => strategy === value);
}

/**
 * Validate configuration structure
 */
export function validateConfig(config: unknown): asserts config is OptimizerConfig {
  if (!isConfigTree(config)) {
    throw new Error('Configuration must be an object');
  }

  const loop = requireSection(config, 'loop');
  requireNumber(loop, 'interval_ms', 'loop.interval_ms', 1, Number.MAX_SAFE_INTEGER);
  requireNumber(loop, 'history_capacity', 'loop.history_capacity', 1, Number.MAX_SAFE_INTEGER, true);
  requireNumber(loop, 'action_history_capacity', 'loop.action_history_capacity', 1, Number.MAX_SAFE_INTEGER, true);
  requireNumber(loop, 'stop_timeout_ms', 'loop.stop_timeout_ms', 0, Number.MAX_SAFE_INTEGER);
  if (!isOptimizationStrategy(loop.strategy)) {
    throw new Error(`loop.strategy must be one of: ${OPTIMIZATION_STRATEGIES.join(', ')}`);
  }

  const policy = requireSection(config, 'policy');
  requireNumber(policy, 'global_threshold', 'policy.global_threshold', 0, 1);
  requireNumber(policy, 'trend_window', 'policy.trend_window', 4, Number.MAX_SAFE_INTEGER, true);
  requireNumber(policy, 'decline_ratio', 'policy.decline_ratio', 0, 1);

  const critical = requireSection(policy, 'critical_thresholds');
  for (const metric of METRIC_NAMES) {
    requireNumber(critical, metric, `policy.critical_thresholds.${metric}`, 0, 1);
  }

  const executor = requireSection(config, 'executor');
  requireNumber(executor, 'max_adjustment_rate', 'executor.max_adjustment_rate', 0, 1);

  const analytics = requireSection(config, 'analytics');
  requireNumber(analytics, 'recent_window', 'analytics.recent_window', 3, Number.MAX_SAFE_INTEGER, true);
  requireNumber(analytics, 'improvement_ratio', 'analytics.improvement_ratio', 1, Number.MAX_SAFE_INTEGER);
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): OptimizerConfig {
  return {
    loop: {
      interval_ms: 100,
      history_capacity: 100,
      action_history_capacity: 50,
      stop_timeout_ms: 2000,
      strategy: 'adaptive'
    },
    policy: {
      global_threshold: 0.6,
      critical_thresholds: {
        coherence: 0.5,
        stability: 0.6,
        resonance: 0.4,
        efficiency: 0.7,
        harmony: 0.5
      },
      trend_window: 5,
      decline_ratio: 0.95
    },
    executor: {
      max_adjustment_rate: 0.1
    },
    analytics: {
      recent_window: 10,
      improvement_ratio: 1.02
    }
  };
}

const ENV_MAPPINGS: EnvMapping[] = [
  {
    envVar: 'OPTIMIZER_INTERVAL_MS',
    configPath: ['loop', 'interval_ms'],
    transform: transforms.number
  },
  {
    envVar: 'OPTIMIZER_STOP_TIMEOUT_MS',
    configPath: ['loop', 'stop_timeout_ms'],
    transform: transforms.number
  },
  {
    envVar: 'OPTIMIZER_STRATEGY',
    configPath: ['loop', 'strategy'],
    transform: transforms.lower
  },
  {
    envVar: 'OPTIMIZER_GLOBAL_THRESHOLD',
    configPath: ['policy', 'global_threshold'],
    transform: transforms.number
  },
  {
    envVar: 'OPTIMIZER_MAX_ADJUSTMENT_RATE',
    configPath: ['executor', 'max_adjustment_rate'],
    transform: transforms.number
  }
];

/**
 * Get environment-based config structure
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  return processEnvMappings(ENV_MAPPINGS, env);
}

/**
 * Override config with environment variables. The result is validated,
 * so an out-of-range override throws rather than reaching the loop.
 */
export function applyEnvOverrides(
  config: OptimizerConfig,
  env: NodeJS.ProcessEnv = process.env
): OptimizerConfig {
  const overridden = mergeTree(config, getEnvConfig(env));
  validateConfig(overridden);
  return overridden;
}
