/**
 * Command exports
 */

export {
  applyCommand,
  readManifestFile,
  type ApplyCommandOptions,
  type ApplyCommandData,
} from './apply.js';
export { destroyCommand, type DestroyCommandOptions, type DestroyCommandData } from './destroy.js';
export { showCommand, type ShowCommandOptions, type ShowCommandData } from './show.js';
export { createRuntime, type CommandRuntime } from './runtime.js';
