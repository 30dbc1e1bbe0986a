/**
 * destroy command - Delete the resource recorded in the state file
 */

import { applyResourceChange } from '../reconcilers/manifest/apply.js';
import { hasErrors } from '../reconcilers/manifest/diagnostics.js';
import { planDestroy } from '../reconcilers/manifest/plan.js';
import { MANIFEST_RESOURCE_TYPE, stateAttribute } from '../reconcilers/manifest/state.js';
import { DEFAULT_STATE_FILE, readStateFile, removeStateFile } from '../state/file.js';
import type { CommandContext, CommandResult } from '../types.js';
import { info, printDiagnostics, success, verbose } from '../utils/output.js';
import { getString } from '../values/value.js';
import { createRuntime, type CommandRuntime } from './runtime.js';

export interface DestroyCommandOptions {
  /** State file (default: .manifest/state.yaml) */
  state?: string;
}

export interface DestroyCommandData {
  resource?: string;
  deleted: boolean;
}

/**
 * Execute the destroy command
 */
export async function destroyCommand(
  ctx: CommandContext,
  options: DestroyCommandOptions = {},
  runtime?: CommandRuntime
): Promise<CommandResult<DestroyCommandData>> {
  const { options: globalOpts, outputFormat } = ctx;
  const statePath = options.state ?? DEFAULT_STATE_FILE;

  verbose(`State file: ${statePath}`, globalOpts.verbose);

  const priorState = readStateFile(statePath);
  if (priorState.state === 'null') {
    if (outputFormat === 'human') {
      info('Nothing to destroy');
    }
    return { success: true, message: 'Nothing to destroy', data: { deleted: false } };
  }

  const object = stateAttribute(priorState, 'object');
  const name = getString(object, 'metadata', 'name') ?? '(unnamed)';
  const namespace = getString(object, 'metadata', 'namespace');
  const resource = namespace ? `${namespace}/${name}` : name;

  if (outputFormat === 'human') {
    info(`Deleting ${resource}...`);
  }

  const response = await applyResourceChange(
    {
      typeName: MANIFEST_RESOURCE_TYPE,
      priorState,
      plannedState: planDestroy(),
      signal: ctx.signal,
    },
    runtime ?? createRuntime(ctx)
  );

  if (hasErrors(response.diagnostics)) {
    if (outputFormat === 'human') {
      printDiagnostics(response.diagnostics);
    }
    return {
      success: false,
      message: `Destroy of ${resource} failed`,
      diagnostics: response.diagnostics,
    };
  }

  removeStateFile(statePath);

  if (outputFormat === 'human') {
    success(`${resource} deleted`);
  }

  return {
    success: true,
    message: `${resource} deleted`,
    data: { resource, deleted: true },
    diagnostics: response.diagnostics,
  };
}
