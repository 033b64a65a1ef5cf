/**
 * Lookup table for `#/components/...` references
 *
 * Why a flat table: references are followed one hop at a time, so a name →
 * node map is all that is needed. Callers that follow chains keep their own
 * visited set.
 */

import { COMPONENT_PARAMETER_REF, COMPONENT_SCHEMA_REF } from './constants.js';
import type { ApiDocument, ParameterNode, ReferenceNode, SchemaNode } from './types/openapi.js';

export class ComponentRegistry {
  private schemas: Map<string, SchemaNode>;
  private parameters: Map<string, ParameterNode>;

  constructor(components: Pick<ApiDocument['components'], 'schemas' | 'parameters'>) {
    this.schemas = new Map(Object.entries(components.schemas));
    this.parameters = new Map(Object.entries(components.parameters));
  }

  static fromDocument(document: ApiDocument): ComponentRegistry {
    return new ComponentRegistry(document.components);
  }

  /**
   * Schema entries in declaration order
   */
  schemaEntries(): Array<[string, SchemaNode]> {
    return Array.from(this.schemas.entries());
  }

  /**
   * Follow a schema `$ref` one hop. Nodes without `$ref` are returned as-is.
   */
  resolveSchema(node: SchemaNode): SchemaNode | undefined {
    if (node.$ref === undefined) return node;

    const name = refName(node.$ref, COMPONENT_SCHEMA_REF);
    return name === undefined ? undefined : this.schemas.get(name);
  }

  /**
   * Follow a parameter `$ref` one hop into `components.parameters`
   */
  resolveParameter(param: ParameterNode | ReferenceNode): ParameterNode | undefined {
    if (!isReference(param)) return param;

    const name = refName(param.$ref, COMPONENT_PARAMETER_REF);
    return name === undefined ? undefined : this.parameters.get(name);
  }
}

export function isReference(node: ParameterNode | ReferenceNode): node is ReferenceNode {
  return '$ref' in node;
}

/**
 * Extract the component name from a local reference
 *
 * Example: '#/components/schemas/Pet' => 'Pet'
 */
export function refName(ref: string, prefix: string): string | undefined {
  if (!ref.startsWith(prefix)) return undefined;
  const name = ref.slice(prefix.length);
  return name.length > 0 ? name : undefined;
}
