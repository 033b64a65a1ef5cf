/**
 * Render TypeScript interfaces for component schemas
 *
 * Only schemas whose top-level type is `object` produce output; everything
 * else (enums, arrays, aliases) is skipped rather than emitted as a type alias.
 */

import type { ComponentRegistry } from './component-registry.js';
import { resolveSchemaType } from './schema-type-resolver.js';
import type { SchemaNode } from './types/openapi.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * All interface blocks, separated by a blank line
 *
 * `reserved` holds names the surrounding file already declares. An interface
 * whose name is reserved, or taken by an earlier schema, gets a `_2`, `_3`, …
 * suffix.
 */
export function generateInterfaces(registry: ComponentRegistry, reserved: Iterable<string> = []): string {
  const taken = new Set(reserved);
  const blocks: string[] = [];

  for (const [name, schema] of registry.schemaEntries()) {
    if (schema.type !== 'object') continue;
    const typeName = uniqueName(toTypeName(name), taken);
    const block = generateInterface(name, schema, registry, typeName);
    if (block !== undefined) blocks.push(block);
  }

  return blocks.join('\n\n');
}

export function generateInterface(
  name: string,
  schema: SchemaNode,
  registry?: ComponentRegistry,
  typeName = toTypeName(name)
): string | undefined {
  if (schema.type !== 'object') return undefined;

  const required = new Set(schema.required ?? []);
  const lines = [`interface ${typeName} {`];

  for (const [propName, propSchema] of Object.entries(schema.properties ?? {})) {
    const optional = required.has(propName) ? '' : '?';
    if (propSchema.description) {
      lines.push(`  /** ${docText(propSchema.description)} */`);
    }
    lines.push(`  ${propertyKey(propName)}${optional}: ${resolveSchemaType(propSchema, registry)};`);
  }

  lines.push('}');
  return lines.join('\n');
}

/**
 * Schema names such as `Pet.Status` or `pet-status` become `PetStatus`
 */
export function toTypeName(name: string): string {
  if (IDENTIFIER.test(name)) return name;

  const pascal = name
    .split(/[^A-Za-z0-9_$]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');

  if (!pascal) return '_';
  return /^[0-9]/.test(pascal) ? `_${pascal}` : pascal;
}

function uniqueName(base: string, taken: Set<string>): string {
  let candidate = base;
  let suffix = 2;
  while (taken.has(candidate)) {
    candidate = `${base}_${suffix++}`;
  }
  taken.add(candidate);
  return candidate;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

// Single-line doc comment text
function docText(description: string): string {
  return description.replace(/\s*\r?\n\s*/g, ' ').replace(/\*\//g, '*\\/').trim();
}
