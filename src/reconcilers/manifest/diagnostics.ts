/**
 * Diagnostics construction
 */

import { StoreApiError } from '../../api/errors.js';
import type { StoreStatus } from '../../api/types.js';
import { errorMessage } from '../../errors.js';
import type { Diagnostic } from './types.js';

export function errorDiagnostic(summary: string, detail?: string): Diagnostic {
  return detail === undefined ? { severity: 'error', summary } : { severity: 'error', summary, detail };
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * One diagnostic per status cause. A status without causes yields a single
 * diagnostic built from the status itself.
 *
 * @param subject - used in summaries when a cause names no field
 */
export function statusToDiagnostics(status: StoreStatus, subject: string): Diagnostic[] {
  const causes = status.details?.causes ?? [];

  if (causes.length === 0) {
    return [
      errorDiagnostic(
        `API response status: ${status.status ?? 'Failure'}`,
        status.message ?? status.reason
      ),
    ];
  }

  return causes.map((cause) =>
    errorDiagnostic(
      `${cause.reason ?? status.reason ?? 'Invalid'}: ${cause.field ?? subject}`,
      cause.message ?? status.message
    )
  );
}

/**
 * Diagnostics for a failed write: the structured status when the store sent
 * one, otherwise a single diagnostic with `fallbackSummary`
 */
export function writeErrorToDiagnostics(
  error: unknown,
  subject: string,
  fallbackSummary: string
): Diagnostic[] {
  if (error instanceof StoreApiError && error.body) {
    return statusToDiagnostics(error.body, subject);
  }
  return [errorDiagnostic(fallbackSummary, errorMessage(error))];
}
