/**
 * Static schema registry
 *
 * Resource types registered by kind, usually loaded from a YAML schema file:
 *
 *   - apiVersion: apps/v1
 *     kind: Deployment
 *     type:
 *       object:
 *         apiVersion: string
 *         kind: string
 *         metadata: { object: { name: string, labels: { map: string } } }
 *         spec: dynamic
 *     writeType: ...   # optional, defaults to `type`
 *
 * Kinds that are not registered are typed `dynamic`, which makes every
 * value take the shape of its own data.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { ValidationError, errorMessage } from '../errors.js';
import { formatGvk } from '../reconcilers/manifest/identity.js';
import type { GroupVersionKind, SchemaProvider } from '../reconcilers/manifest/types.js';
import { parseGroupVersion } from '../api/client.js';
import {
  Types,
  listType,
  mapType,
  objectTypeFromEntries,
  tupleType,
  type Type,
} from '../values/types.js';

interface RegisteredType {
  base: Type;
  write: Type;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a type declaration: one of the names `string`, `number`, `bool`,
 * `dynamic`, or a single-key mapping `object`, `map`, `list` or `tuple`
 */
export function parseTypeSpec(spec: unknown, where = 'type'): Type {
  if (typeof spec === 'string') {
    switch (spec) {
      case 'string':
        return Types.string;
      case 'number':
        return Types.number;
      case 'bool':
        return Types.bool;
      case 'dynamic':
        return Types.dynamic;
      default:
        throw new ValidationError(`${where}: unknown type name "${spec}"`);
    }
  }

  if (!isRecord(spec)) {
    throw new ValidationError(`${where}: expected a type name or a single-key mapping`);
  }
  const keys = Object.keys(spec);
  if (keys.length !== 1) {
    throw new ValidationError(`${where}: expected exactly one of object, map, list or tuple`);
  }

  const inner = spec[keys[0]];
  switch (keys[0]) {
    case 'object': {
      if (!isRecord(inner)) {
        throw new ValidationError(`${where}.object: expected a mapping of attribute types`);
      }
      return objectTypeFromEntries(
        Object.entries(inner).map(
          ([name, attr]) => [name, parseTypeSpec(attr, `${where}.${name}`)] as const
        )
      );
    }
    case 'map':
      return mapType(parseTypeSpec(inner, `${where}.map`));
    case 'list':
      return listType(parseTypeSpec(inner, `${where}.list`));
    case 'tuple': {
      if (!Array.isArray(inner)) {
        throw new ValidationError(`${where}.tuple: expected a list of element types`);
      }
      const elements: unknown[] = inner;
      return tupleType(elements.map((el, i) => parseTypeSpec(el, `${where}.tuple[${i}]`)));
    }
    default:
      throw new ValidationError(`${where}: unknown type constructor "${keys[0]}"`);
  }
}

export class SchemaRegistry implements SchemaProvider {
  private readonly types = new Map<string, RegisteredType>();

  register(gvk: GroupVersionKind, base: Type, write: Type = base): this {
    this.types.set(formatGvk(gvk), { base, write });
    return this;
  }

  has(gvk: GroupVersionKind): boolean {
    return this.types.has(formatGvk(gvk));
  }

  get size(): number {
    return this.types.size;
  }

  async typeForKind(gvk: GroupVersionKind, forWrite: boolean): Promise<Type> {
    const registered = this.types.get(formatGvk(gvk));
    if (!registered) return Types.dynamic;
    return forWrite ? registered.write : registered.base;
  }

  /**
   * Register every entry of a parsed schema document
   */
  load(document: unknown, source = 'schema'): this {
    if (!Array.isArray(document)) {
      throw new ValidationError(`${source}: expected a list of schema entries`);
    }
    const entries: unknown[] = document;
    entries.forEach((entry, i) => {
      const where = `${source}[${i}]`;
      if (
        !isRecord(entry) ||
        typeof entry.apiVersion !== 'string' ||
        typeof entry.kind !== 'string'
      ) {
        throw new ValidationError(`${where}: entries need string apiVersion and kind`);
      }
      const gvk = { ...parseGroupVersion(entry.apiVersion), kind: entry.kind };
      const base = parseTypeSpec(entry.type, `${where}.type`);
      const write =
        entry.writeType === undefined ? base : parseTypeSpec(entry.writeType, `${where}.writeType`);
      this.register(gvk, base, write);
    });
    return this;
  }
}

/**
 * Build a registry from a YAML schema file
 */
export function loadSchemaFile(path: string): SchemaRegistry {
  let document: unknown;
  try {
    document = parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Cannot read schema file ${path}: ${errorMessage(error)}`, 'VALIDATION', undefined, {
      cause: error,
    });
  }
  return new SchemaRegistry().load(document, path);
}
