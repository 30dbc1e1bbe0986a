/**
 * Local state file
 *
 * Persists the last applied state of one manifest resource as YAML so the
 * CLI can tell a create from an update and knows what to delete.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, errorMessage } from '../errors.js';
import { fromUntyped, toUntyped } from '../morph/payload.js';
import { MANIFEST_RESOURCE_TYPE, MANIFEST_STATE_TYPE } from '../reconcilers/manifest/state.js';
import { fromJson, toJson } from '../values/untyped.js';
import { nullValue, type Value } from '../values/value.js';

export const DEFAULT_STATE_FILE = '.manifest/state.yaml';

const STATE_HEADER = `# Managed by manifest-reconciler
# DO NOT EDIT MANUALLY

`;

/**
 * Serialize a resource state to YAML
 */
export function serializeState(state: Value, appliedAt: Date = new Date()): string {
  const content = {
    resource_type: MANIFEST_RESOURCE_TYPE,
    applied_at: appliedAt.toISOString(),
    state: toJson(toUntyped(state)),
  };
  return STATE_HEADER + yaml.stringify(content, { indent: 2 });
}

/**
 * Parse a resource state from YAML. Empty content is the Null state.
 */
export function parseState(content: string, source = 'state'): Value {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ValidationError(`${source}: invalid YAML: ${errorMessage(error)}`, 'VALIDATION', undefined, {
      cause: error,
    });
  }

  if (parsed === null || parsed === undefined) {
    return nullValue(MANIFEST_STATE_TYPE);
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed) || !('state' in parsed)) {
    throw new ValidationError(`${source}: expected a mapping with a "state" key`);
  }
  if ('resource_type' in parsed && parsed.resource_type !== MANIFEST_RESOURCE_TYPE) {
    throw new ValidationError(
      `${source}: unsupported resource type ${JSON.stringify(parsed.resource_type)}`
    );
  }

  return fromUntyped(fromJson(parsed.state), MANIFEST_STATE_TYPE);
}

/**
 * Read the state file; a missing file is the Null state
 */
export function readStateFile(path: string): Value {
  if (!existsSync(path)) {
    return nullValue(MANIFEST_STATE_TYPE);
  }
  return parseState(readFileSync(path, 'utf-8'), path);
}

export function writeStateFile(path: string, state: Value): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serializeState(state), 'utf-8');
}

export function removeStateFile(path: string): void {
  rmSync(path, { force: true });
}
