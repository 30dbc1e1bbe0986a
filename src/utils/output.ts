/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { Diagnostic } from '../reconcilers/manifest/types.js';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.diagnostics && result.diagnostics.length > 0) {
    printDiagnostics(result.diagnostics);
  }
}

/**
 * Print diagnostics, errors in red and warnings in yellow
 */
export function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    console.log(formatDiagnostic(diagnostic));
  }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const color = diagnostic.severity === 'error' ? chalk.red : chalk.yellow;
  const label = diagnostic.severity === 'error' ? 'Error' : 'Warning';
  const lines = [color(`  • ${label}: ${diagnostic.summary}`)];
  if (diagnostic.detail) {
    lines.push(chalk.gray(`      ${diagnostic.detail}`));
  }
  return lines.join('\n');
}

/**
 * Print a key/value table
 */
export function printStatus(status: Record<string, unknown>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  for (const [key, value] of Object.entries(status)) {
    console.log(`  ${chalk.gray(formatLabel(key) + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

// Helper functions

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 50 ? value.slice(0, 50) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatLabel(key: string): string {
  // camelCase to Title Case
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
