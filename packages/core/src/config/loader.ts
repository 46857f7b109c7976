/**
 * Loads .relgate/config.yml from a repository root.
 *
 * Missing file means defaults. An API key that resolves to a non-empty
 * value switches AI enrichment on even when `ai.enabled` is left false.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import { relgateConfigSchema, type RelgateConfig } from './schema.js';

const CONFIG_DIR = '.relgate';
const CONFIG_FILENAME = 'config.yml';

/**
 * Resolve the config file path from a root directory.
 */
export function resolveConfigPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Interpolate environment variables in strings.
 * Supports ${VAR_NAME} syntax; unset variables become empty strings.
 */
function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{(\w+)\}/g, (_, varName: string) => env[varName] ?? '');
}

/**
 * Deep-interpolate environment variables in a parsed YAML value.
 */
function interpolateConfig(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return interpolateEnvVars(value, env);
  }
  if (Array.isArray(value)) {
    return value.map(item => interpolateConfig(item, env));
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateConfig(entry, env);
    }
    return result;
  }
  return value;
}

/**
 * Drop an empty API key (an unset ${VAR}) and turn AI on when a key is present.
 */
function finalize(config: RelgateConfig): RelgateConfig {
  const apiKey = config.ai.apiKey ? config.ai.apiKey : undefined;
  return {
    ...config,
    ai: {
      ...config.ai,
      apiKey,
      enabled: config.ai.enabled || apiKey !== undefined,
    },
  };
}

/**
 * Parse a config object (already read from YAML or built in code).
 *
 * @throws ConfigError when validation fails
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source = '<inline>',
): RelgateConfig {
  if (!raw || typeof raw !== 'object') {
    return finalize(relgateConfigSchema.parse({}));
  }

  const result = relgateConfigSchema.safeParse(interpolateConfig(raw, env));
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${source}:\n${issues}`, { source });
  }

  return finalize(result.data);
}

/**
 * Load and validate .relgate/config.yml.
 * Returns defaults when no config file exists.
 *
 * @throws ConfigError when the file cannot be parsed or fails validation
 */
export function loadConfig(rootDir: string, env: NodeJS.ProcessEnv = process.env): RelgateConfig {
  const configPath = resolveConfigPath(rootDir);

  if (!fs.existsSync(configPath)) {
    return parseConfig({}, env, configPath);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${getErrorMessage(error)}`, {
      source: configPath,
    });
  }

  return parseConfig(parsed, env, configPath);
}
