// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { BootstrapConfig } from '../types';
import { ConfigError, ConfigNotFoundError, OperationCancelledError } from '../errors';
import type { ResourceStore } from '../store/types';
import { toStringMap } from '../store/fields';
import { resourceCondition, waitUntilReady } from '../provisioning/readiness-poller';
import type { Clock, PollOptions } from '../provisioning/types';
import { ConfigLoader, ConfigMapLocation, ConfigValidationResult, FLAT_CONFIG_KEYS } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

export const DEFAULT_CONFIG_PATHS = ['./bootstrap.yml', './bootstrap.yaml', './bootstrap.json'];

export const DEFAULT_CONFIG_MAP: ConfigMapLocation = { namespace: 'platform', name: 'platform-config' };

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class BootstrapConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   */
  async load(path: string): Promise<BootstrapConfig> {
    if (!existsSync(path)) {
      throw new ConfigNotFoundError(path);
    }

    try {
      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new ConfigError('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      return validateAndNormalizeConfig(this.resolveEnvironmentVariables(rawConfig ?? {}));
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(
        `Failed to load configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'CONFIG_ERROR',
        { cause: error }
      );
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load configuration from the first of several candidate locations that exists
   */
  async loadFromPaths(searchPaths: string[]): Promise<BootstrapConfig> {
    const found = searchPaths.find(path => existsSync(path));
    if (!found) {
      throw new ConfigNotFoundError(searchPaths.join(', '));
    }
    return this.load(found);
  }

  /**
   * Build configuration from flat key-value pairs, as stored in the
   * platform ConfigMap. Empty values count as unset.
   */
  loadFlat(data: Record<string, string | undefined>, base: Record<string, unknown> = {}): BootstrapConfig {
    const flat: Record<string, string> = {};
    for (const [field, key] of Object.entries(FLAT_CONFIG_KEYS)) {
      const value = data[key]?.trim();
      if (value) {
        flat[field] = value;
      }
    }
    return validateAndNormalizeConfig({ ...base, ...flat });
  }

  /** Flat keys read from the process environment. */
  loadFromEnvironment(base: Record<string, unknown> = {}): BootstrapConfig {
    return this.loadFlat(this.env, base);
  }

  /**
   * Read the flat configuration ConfigMap through the resource store,
   * waiting for it to appear within the polling deadline.
   */
  async loadFromConfigMap(
    store: ResourceStore,
    location: ConfigMapLocation = DEFAULT_CONFIG_MAP,
    options: PollOptions & { clock?: Clock } = {}
  ): Promise<BootstrapConfig> {
    const ref = { apiVersion: 'v1', kind: 'ConfigMap', namespace: location.namespace, name: location.name };
    const outcome = await waitUntilReady(
      [resourceCondition(store, ref, `configmap ${location.namespace}/${location.name}`, () => true)],
      { timeoutMs: 50_000, ...options },
      options.clock
    );
    if (outcome.status === 'cancelled') {
      throw new OperationCancelledError('Loading configuration');
    }
    if (outcome.status === 'timed-out') {
      throw new ConfigError(
        `ConfigMap ${location.namespace}/${location.name} not found`,
        'CONFIG_NOT_FOUND',
        { suggestion: 'Create the platform ConfigMap before starting provisioning' }
      );
    }

    const configMap = await store.get(ref);
    if (!configMap) {
      throw new ConfigError(`ConfigMap ${location.namespace}/${location.name} disappeared while loading`, 'CONFIG_NOT_FOUND');
    }
    return this.loadFlat(toStringMap(configMap.data));
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute environment variables in a string.
   * Unset variables without a default keep their placeholder.
   */
  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      return match;
    });
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env?: NodeJS.ProcessEnv): BootstrapConfigLoader {
  return new BootstrapConfigLoader(env);
}

/**
 * Load configuration from standard locations
 * Searches for bootstrap.yml, bootstrap.yaml, bootstrap.json in current directory
 */
export async function loadDefaultConfig(): Promise<BootstrapConfig> {
  return createConfigLoader().loadFromPaths(DEFAULT_CONFIG_PATHS);
}
