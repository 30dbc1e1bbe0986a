/**
 * Shared CLI types
 */

import type { ConfigSource, StoreSettings } from './config/store.js';
import type { Diagnostic } from './reconcilers/manifest/types.js';

/**
 * Global CLI options (available on all commands)
 *
 * A type alias so it satisfies commander's `OptionValues` constraint.
 */
export type GlobalOptions = {
  /** API server URL */
  server?: string;
  /** Bearer token */
  token?: string;
  /** Namespace for namespaced resources that do not set one */
  namespace?: string;
  /** Field manager for server-side apply */
  fieldManager?: string;
  /** YAML schema file with resource types */
  schema?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose output */
  verbose: boolean;
};

export type OutputFormat = 'human' | 'json';

/**
 * Everything a command needs besides its own options
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved store settings */
  settings: StoreSettings;
  /** Where each setting came from */
  sources: Partial<Record<keyof StoreSettings, ConfigSource>>;
  /** Fires when the user interrupts the command */
  signal?: AbortSignal;
}

/**
 * Result of a command
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  diagnostics?: Diagnostic[];
}
