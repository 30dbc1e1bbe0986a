/**
 * show command - Print the state recorded in the state file
 */

import { toUntyped } from '../morph/payload.js';
import { stateAttribute } from '../reconcilers/manifest/state.js';
import { DEFAULT_STATE_FILE, readStateFile } from '../state/file.js';
import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printStatus } from '../utils/output.js';
import { toJson, type JsonValue } from '../values/untyped.js';
import { getString } from '../values/value.js';

export interface ShowCommandOptions {
  /** State file (default: .manifest/state.yaml) */
  state?: string;
}

export interface ShowCommandData {
  apiVersion?: string;
  kind?: string;
  namespace?: string;
  name?: string;
  object: JsonValue;
}

/**
 * Execute the show command
 */
export async function showCommand(
  ctx: CommandContext,
  options: ShowCommandOptions = {}
): Promise<CommandResult<ShowCommandData>> {
  const { outputFormat } = ctx;
  const statePath = options.state ?? DEFAULT_STATE_FILE;

  const state = readStateFile(statePath);
  if (state.state === 'null') {
    if (outputFormat === 'human') {
      info(`No resource recorded in ${statePath}`);
    }
    return { success: true, message: 'No resource recorded' };
  }

  const object = stateAttribute(state, 'object');
  const data: ShowCommandData = {
    apiVersion: getString(object, 'apiVersion'),
    kind: getString(object, 'kind'),
    namespace: getString(object, 'metadata', 'namespace'),
    name: getString(object, 'metadata', 'name'),
    object: toJson(toUntyped(object)),
  };

  if (outputFormat === 'human') {
    header('Resource State');
    printStatus({ ...data }, outputFormat);
  }

  return { success: true, message: `State of ${data.name ?? '(unnamed)'}`, data };
}
