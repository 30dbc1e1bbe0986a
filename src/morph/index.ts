/**
 * Conversions between value models
 */

export { toUntyped, fromUntyped, inferType } from './payload.js';
export { coerceValue, coerceScalar } from './coerce.js';
export { collapseUnknownToNull, expandToUnknown } from './normalize.js';
