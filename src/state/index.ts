/**
 * State module exports
 */

export {
  DEFAULT_STATE_FILE,
  serializeState,
  parseState,
  readStateFile,
  writeStateFile,
  removeStateFile,
} from './file.js';
