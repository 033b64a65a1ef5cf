/**
 * Map a schema node to a TypeScript type expression
 *
 * Object members are never expanded inline: an `object` maps to `any`, and
 * recursion only follows array `items` (and `$ref` when a registry is given).
 */

import { UNTYPED } from './constants.js';
import type { ComponentRegistry } from './component-registry.js';
import type { SchemaNode } from './types/openapi.js';

export function resolveSchemaType(
  schema: SchemaNode | undefined,
  registry?: ComponentRegistry,
  visited: ReadonlySet<string> = new Set()
): string {
  if (!schema) return UNTYPED;

  if (schema.$ref !== undefined) {
    if (!registry || visited.has(schema.$ref)) return UNTYPED;
    const target = registry.resolveSchema(schema);
    return resolveSchemaType(target, registry, new Set([...visited, schema.$ref]));
  }

  switch (schema.type) {
    case 'string':
      if (schema.enum && schema.enum.length > 0) {
        return schema.enum.map(value => JSON.stringify(String(value))).join(' | ');
      }
      return 'string';
    case 'integer':
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'array': {
      const itemType = resolveSchemaType(schema.items, registry, visited);
      return itemType.includes(' | ') ? `(${itemType})[]` : `${itemType}[]`;
    }
    case 'object':
      return UNTYPED;
    default:
      return UNTYPED;
  }
}
