/**
 * Store connection settings
 *
 * Each setting is resolved on its own, highest priority first:
 * 1. CLI flag (--server, --token, --namespace, --field-manager)
 * 2. Environment variable (MANIFEST_SERVER, MANIFEST_TOKEN, MANIFEST_NAMESPACE,
 *    MANIFEST_FIELD_MANAGER)
 * 3. Config file (.manifest/config.yaml, searched upwards from the working
 *    directory)
 * 4. Built-in default
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { DEFAULT_FIELD_MANAGER } from '../reconcilers/manifest/apply.js';

/** Config file location relative to a project directory */
export const CONFIG_FILE = '.manifest/config.yaml';

export const DEFAULT_SERVER = 'http://localhost:8080';
export const DEFAULT_NAMESPACE = 'default';

const ENV_SERVER = 'MANIFEST_SERVER';
const ENV_TOKEN = 'MANIFEST_TOKEN';
const ENV_NAMESPACE = 'MANIFEST_NAMESPACE';
const ENV_FIELD_MANAGER = 'MANIFEST_FIELD_MANAGER';

export type ConfigSource = 'cli' | 'env' | 'config_file' | 'default';

export interface StoreSettings {
  server: string;
  token?: string;
  namespace: string;
  fieldManager: string;
}

/**
 * Settings as they may appear in the config file
 */
export type StoreConfigFile = Partial<StoreSettings>;

export interface StoreConfigOptions {
  server?: string;
  token?: string;
  namespace?: string;
  fieldManager?: string;
  /** Working directory for the config file search */
  cwd?: string;
  /** Explicit config file; skips the search */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface StoreConfigResolution {
  settings: StoreSettings;
  /** Where each setting came from; absent when a setting is unset */
  sources: Partial<Record<keyof StoreSettings, ConfigSource>>;
  /** Config file that was read, if any */
  configPath: string | null;
}

/**
 * Resolve store settings from flags, environment and config file
 */
export function resolveStoreConfig(options: StoreConfigOptions = {}): StoreConfigResolution {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigPath(options.cwd ?? process.cwd());
  const file = configPath ? loadConfigFile(configPath) : {};
  const sources: StoreConfigResolution['sources'] = {};

  const pick = (
    key: keyof StoreSettings,
    cli: string | undefined,
    envName: string
  ): string | undefined => {
    const candidates: [ConfigSource, string | undefined][] = [
      ['cli', cli],
      ['env', env[envName]],
      ['config_file', file[key]],
    ];
    for (const [source, value] of candidates) {
      if (value) {
        sources[key] = source;
        return value;
      }
    }
    return undefined;
  };

  const withDefault = (key: keyof StoreSettings, value: string | undefined, fallback: string): string => {
    if (value !== undefined) return value;
    sources[key] = 'default';
    return fallback;
  };

  const settings: StoreSettings = {
    server: withDefault('server', pick('server', options.server, ENV_SERVER), DEFAULT_SERVER),
    token: pick('token', options.token, ENV_TOKEN),
    namespace: withDefault(
      'namespace',
      pick('namespace', options.namespace, ENV_NAMESPACE),
      DEFAULT_NAMESPACE
    ),
    fieldManager: withDefault(
      'fieldManager',
      pick('fieldManager', options.fieldManager, ENV_FIELD_MANAGER),
      DEFAULT_FIELD_MANAGER
    ),
  };

  return { settings, sources, configPath };
}

/**
 * Find the config file by walking up the directory tree
 */
export function findConfigPath(startDir: string): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    const candidate = resolve(currentDir, CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Read and validate a config file
 */
export function loadConfigFile(configPath: string): StoreConfigFile {
  let parsed: unknown;
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(configPath, errorMessage(error), { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(configPath, 'expected a mapping at the top level');
  }

  const entries: [string, unknown][] = Object.entries(parsed);
  const config: StoreConfigFile = {};
  for (const [key, value] of entries) {
    if (typeof value !== 'string') {
      throw new ConfigError(configPath, `"${key}" must be a string`);
    }
    switch (key) {
      case 'server':
      case 'token':
      case 'namespace':
      case 'fieldManager':
        config[key] = value;
        break;
      default:
        throw new ConfigError(configPath, `unknown setting "${key}"`);
    }
  }
  return config;
}
