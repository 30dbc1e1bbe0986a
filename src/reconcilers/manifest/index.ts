/**
 * Manifest reconciler module
 *
 * Provides:
 * - applyResourceChange: create/update/delete of one manifest resource
 * - planning helpers that build the planned state apply expects
 * - computed-field resolution and backfill
 */

export { applyResourceChange, classifyChange, DEFAULT_FIELD_MANAGER } from './apply.js';

export { planResourceState, planDestroy, waitForValue } from './plan.js';
export type { PlanInput, PlanResult } from './plan.js';

export {
  resolveComputedFields,
  backfillComputedFields,
  markComputedUnknown,
  DEFAULT_COMPUTED_FIELDS,
} from './computed.js';
export type { ComputedFieldSet, ComputedFieldIssue, ResolvedComputedFields } from './computed.js';

export {
  statusToDiagnostics,
  writeErrorToDiagnostics,
  errorDiagnostic,
  hasErrors,
} from './diagnostics.js';

export {
  gvkFromValue,
  gvkFromUntyped,
  identityFromUntyped,
  formatGvk,
  namespacedName,
} from './identity.js';
export type { ResourceIdentity } from './identity.js';

export {
  removeServerSideFields,
  SERVER_SIDE_ROOT_FIELDS,
  SERVER_SIDE_METADATA_FIELDS,
} from './server-fields.js';

export {
  MANIFEST_RESOURCE_TYPE,
  MANIFEST_STATE_TYPE,
  WAIT_FOR_TYPE,
  getResourceType,
  stateAttribute,
  withStateAttribute,
  readComputedFieldConfig,
  manifestState,
} from './state.js';

export type {
  ApplyDependencies,
  ApplyOptions,
  ApplyRequest,
  ApplyResponse,
  ChangeAction,
  CompletionWaiter,
  Diagnostic,
  DiagnosticSeverity,
  ResolvedScope,
  SchemaProvider,
  ScopeResolver,
  TypeCache,
  WaitRequest,
} from './types.js';
