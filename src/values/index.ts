/**
 * Value model exports
 */

export { AttributePath, parseFieldPath, type PathStep } from './path.js';

export {
  Types,
  objectType,
  objectTypeFromEntries,
  mapType,
  listType,
  tupleType,
  isPrimitiveType,
  typeEquals,
  typeToString,
  type Type,
  type PrimitiveType,
  type DynamicType,
  type ObjectType,
  type MapType,
  type ListType,
  type TupleType,
} from './types.js';

export {
  nullValue,
  unknownValue,
  stringValue,
  numberValue,
  boolValue,
  objectValue,
  mapValue,
  listValue,
  tupleValue,
  isKnownScalar,
  isKnownList,
  isKnownRecord,
  getString,
  walkPath,
  transformValue,
  valueEquals,
  type Scalar,
  type Value,
  type NullValue,
  type UnknownValue,
  type KnownValue,
  type KnownScalar,
  type KnownList,
  type KnownRecord,
  type WalkResult,
  type TransformFn,
} from './value.js';

export {
  UNTYPED_NULL,
  untypedMap,
  untypedList,
  fromJson,
  isExactNumber,
  toJson,
  parseUntyped,
  serializeUntyped,
  getField,
  getStringField,
  removeNulls,
  omitFields,
  type Untyped,
  type UntypedList,
  type UntypedMap,
  type JsonValue,
} from './untyped.js';
