#!/usr/bin/env node
/**
 * manifest-reconciler CLI - Reconcile one declared resource with the store
 *
 * Commands:
 * - apply: create or update the resource declared in a manifest file
 * - destroy: delete the resource recorded in the state file
 * - show: print the recorded state
 */

import { Command, Option } from 'commander';
import { resolveStoreConfig } from './config/index.js';
import { ReconcileError } from './errors.js';
import { applyCommand, destroyCommand, showCommand } from './commands/index.js';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { error, printResult, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

const interrupt = new AbortController();
process.once('SIGINT', () => interrupt.abort(new Error('interrupted')));

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const resolution = resolveStoreConfig({
    server: options.server,
    token: options.token,
    namespace: options.namespace,
    fieldManager: options.fieldManager,
  });

  if (options.verbose) {
    verboseLog(`Config file: ${resolution.configPath ?? '(none)'}`, true);
    for (const [key, source] of Object.entries(resolution.sources)) {
      verboseLog(`${key} resolved from ${source}`, true);
    }
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings: resolution.settings,
    sources: resolution.sources,
    signal: interrupt.signal,
  };
}

/**
 * Run a command and exit with its status
 */
async function run<T>(
  label: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();

  try {
    const ctx = createContext(globalOpts);
    const result = await execute(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    if (err instanceof ReconcileError) {
      error(`${label} failed`);
      console.error(err.toUserMessage());
    } else {
      error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('manifest-reconciler')
  .description('Reconcile declared resource manifests with a Kubernetes-style API server')
  .version(VERSION)
  // Store settings fall back to MANIFEST_* variables and the config file in resolveStoreConfig
  .addOption(new Option('--server <url>', 'API server URL'))
  .addOption(new Option('--token <token>', 'Bearer token'))
  .addOption(new Option('--namespace <name>', 'Namespace for resources that do not set one'))
  .addOption(new Option('--field-manager <name>', 'Field manager for server-side apply'))
  .addOption(new Option('--schema <file>', 'YAML file with resource type schemas'))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

/**
 * apply command - Create or update a resource
 */
program
  .command('apply')
  .description('Create or update the resource declared in a manifest file')
  .requiredOption('-f, --file <path>', 'Manifest file (YAML or JSON)')
  .option('--state <path>', 'State file')
  .option('--computed-field <path...>', 'Field path the store may compute (repeatable)')
  .action(async (cmdOpts: { file: string; state?: string; computedField?: string[] }) => {
    await run('Apply', (ctx) =>
      applyCommand(ctx, {
        file: cmdOpts.file,
        state: cmdOpts.state,
        computedFields: cmdOpts.computedField,
      })
    );
  });

/**
 * destroy command - Delete the recorded resource
 */
program
  .command('destroy')
  .description('Delete the resource recorded in the state file')
  .option('--state <path>', 'State file')
  .action(async (cmdOpts: { state?: string }) => {
    await run('Destroy', (ctx) => destroyCommand(ctx, { state: cmdOpts.state }));
  });

/**
 * show command - Print recorded state
 */
program
  .command('show')
  .description('Print the state recorded in the state file')
  .option('--state <path>', 'State file')
  .action(async (cmdOpts: { state?: string }) => {
    await run('Show', (ctx) => showCommand(ctx, { state: cmdOpts.state }));
  });

await program.parseAsync(process.argv);
