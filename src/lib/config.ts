// Configuration management for sourcefetch

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { SourcefetchConfig } from '../types';
import { SOURCEFETCH_DIR, CONFIG_FILE } from '../constants';
import { initializeSettings, settingsRegistry } from '../settings';
import { ConfigTree, isConfigTree } from './settings-registry';
import { ConfigError, errorMessage } from './errors';

export interface ConfigLocations {
  home?: string;
  cwd?: string;
}

// Global config file path (~/.sourcefetch/config.json)
export function getGlobalConfigPath(home: string = os.homedir()): string {
  return path.join(home, SOURCEFETCH_DIR, CONFIG_FILE);
}

// Local config file path (./.sourcefetch/config.json)
export function getConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, SOURCEFETCH_DIR, CONFIG_FILE);
}

// Deep merge for config trees; arrays and scalars in source replace target
export function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const output: ConfigTree = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = output[key];
    if (isConfigTree(value) && isConfigTree(existing)) {
      output[key] = deepMerge(existing, value);
    } else {
      output[key] = value;
    }
  }
  return output;
}

// Missing files count as empty; anything unreadable or malformed is fatal
export function readConfigFile(configPath: string): ConfigTree {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(configPath, errorMessage(error));
  }

  if (!isConfigTree(parsed)) {
    throw new ConfigError(configPath, 'expected a JSON object');
  }
  return parsed;
}

function lookupPath(tree: ConfigTree, key: string): unknown {
  let current: unknown = tree;
  for (const segment of key.split('.')) {
    if (!isConfigTree(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function readSetting<T>(tree: ConfigTree, key: string, source: string, guard: (value: unknown) => value is T): T {
  const value = lookupPath(tree, key);
  const problem = settingsRegistry.check(key, value);
  if (problem !== undefined || !guard(value)) {
    throw new ConfigError(source, problem ?? `${key} has an invalid value`);
  }
  return value;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

// Turn a merged config tree into a typed config, validating every setting
export function resolveConfig(tree: ConfigTree, source: string = 'defaults'): SourcefetchConfig {
  initializeSettings();
  return {
    logging: {
      suppressedLoggers: readSetting(tree, 'logging.suppressedLoggers', source, isStringArray)
    },
    output: {
      color: readSetting(tree, 'output.color', source, isBoolean)
    }
  };
}

// Load merged configuration (defaults -> global -> local override)
export function loadConfig(locations: ConfigLocations = {}): SourcefetchConfig {
  initializeSettings();

  const globalPath = getGlobalConfigPath(locations.home);
  const localPath = getConfigPath(locations.cwd);

  let config = settingsRegistry.getDefaultConfig();
  config = deepMerge(config, readConfigFile(globalPath));
  config = deepMerge(config, readConfigFile(localPath));

  return Object.freeze(resolveConfig(config, `${globalPath} or ${localPath}`));
}
