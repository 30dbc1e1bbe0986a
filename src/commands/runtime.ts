/**
 * Wiring of the store client, discovery and schema registry for commands
 */

import { createStoreClient } from '../api/client.js';
import { DiscoveryCache, DiscoveryScopeResolver } from '../api/discovery.js';
import { createLogger, logger } from '../api/logger.js';
import type { ApplyDependencies } from '../reconcilers/manifest/types.js';
import { SchemaRegistry, loadSchemaFile } from '../schema/registry.js';
import type { CommandContext } from '../types.js';

/**
 * Collaborators a command runs against
 */
export type CommandRuntime = ApplyDependencies;

export function createRuntime(ctx: CommandContext): CommandRuntime {
  const { settings, options } = ctx;

  const client = createStoreClient({
    server: settings.server,
    token: settings.token,
    debug: options.verbose,
  });
  const cache = new DiscoveryCache((groupVersion) => client.discover(groupVersion));

  return {
    schema: options.schema ? loadSchemaFile(options.schema) : new SchemaRegistry(),
    scope: new DiscoveryScopeResolver(client, cache, settings.namespace),
    typeCache: cache,
    logger: options.verbose ? createLogger({ level: 'debug', json: options.json }) : logger,
  };
}
