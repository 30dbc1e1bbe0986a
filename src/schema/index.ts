/**
 * Schema module exports
 */

export { SchemaRegistry, parseTypeSpec, loadSchemaFile } from './registry.js';
