/**
 * apply command - Create or update the resource declared in a manifest file
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'yaml';
import { ValidationError, errorMessage } from '../errors.js';
import { fromUntyped } from '../morph/payload.js';
import { applyResourceChange } from '../reconcilers/manifest/apply.js';
import { hasErrors } from '../reconcilers/manifest/diagnostics.js';
import { gvkFromUntyped, identityFromUntyped, namespacedName } from '../reconcilers/manifest/identity.js';
import { planResourceState } from '../reconcilers/manifest/plan.js';
import { MANIFEST_RESOURCE_TYPE } from '../reconcilers/manifest/state.js';
import { DEFAULT_STATE_FILE, readStateFile, writeStateFile } from '../state/file.js';
import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printDiagnostics, success, verbose } from '../utils/output.js';
import { Types } from '../values/types.js';
import { fromJson, type Untyped } from '../values/untyped.js';
import { createRuntime, type CommandRuntime } from './runtime.js';

export interface ApplyCommandOptions {
  /** Manifest file (YAML or JSON) */
  file: string;
  /** State file (default: .manifest/state.yaml) */
  state?: string;
  /** Field paths the store may compute */
  computedFields?: string[];
}

export interface ApplyCommandData {
  resource: string;
  action: 'created' | 'updated';
}

/**
 * Read a manifest file into an untyped object
 */
export function readManifestFile(path: string): Untyped {
  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Cannot read manifest ${path}: ${errorMessage(error)}`, 'VALIDATION', undefined, {
      cause: error,
    });
  }
  const manifest = fromJson(parsed);
  if (manifest.kind !== 'map') {
    throw new ValidationError(`Manifest ${path} must contain a single object`);
  }
  return manifest;
}

/**
 * Execute the apply command
 */
export async function applyCommand(
  ctx: CommandContext,
  options: ApplyCommandOptions,
  runtime: CommandRuntime = createRuntime(ctx)
): Promise<CommandResult<ApplyCommandData>> {
  const { options: globalOpts, outputFormat, settings } = ctx;
  const statePath = options.state ?? DEFAULT_STATE_FILE;

  const data = readManifestFile(options.file);
  const resource = namespacedName(identityFromUntyped(data));

  verbose(`Manifest: ${options.file}`, globalOpts.verbose);
  verbose(`State file: ${statePath}`, globalOpts.verbose);
  verbose(`Server: ${settings.server}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header(`Apply ${resource}`);
  }

  const gvk = gvkFromUntyped(data);
  const objectType = await runtime.schema.typeForKind(gvk, true, { signal: ctx.signal });
  const plan = planResourceState({
    manifest: fromUntyped(data, Types.dynamic),
    objectType,
    computedFields: options.computedFields,
  });
  if (!plan.plannedState) {
    return fail(`Cannot plan ${resource}`, plan.diagnostics, outputFormat);
  }

  const priorState = readStateFile(statePath);
  const action = priorState.state === 'null' ? 'created' : 'updated';
  if (outputFormat === 'human') {
    info(`${action === 'created' ? 'Creating' : 'Updating'} ${resource}...`);
  }

  const response = await applyResourceChange(
    {
      typeName: MANIFEST_RESOURCE_TYPE,
      priorState,
      plannedState: plan.plannedState,
      signal: ctx.signal,
    },
    runtime,
    { fieldManager: settings.fieldManager }
  );

  if (hasErrors(response.diagnostics) || !response.newState) {
    return fail(`Apply of ${resource} failed`, response.diagnostics, outputFormat);
  }

  writeStateFile(statePath, response.newState);

  if (outputFormat === 'human') {
    success(`${resource} ${action}`);
    printDiagnostics(response.diagnostics);
  }

  return {
    success: true,
    message: `${resource} ${action}`,
    data: { resource, action },
    diagnostics: response.diagnostics,
  };
}

function fail<T>(
  message: string,
  diagnostics: CommandResult['diagnostics'],
  outputFormat: CommandContext['outputFormat']
): CommandResult<T> {
  if (outputFormat === 'human' && diagnostics) {
    printDiagnostics(diagnostics);
  }
  return { success: false, message, diagnostics };
}
