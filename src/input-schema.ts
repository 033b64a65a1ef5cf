/**
 * Tool input schema synthesis
 *
 * Why one flat object: MCP tools take a single JSON object of arguments, so
 * path parameters, query parameters and JSON body fields are merged into one
 * schema. Merge order is path → query → body; a later field with the same
 * name replaces the earlier one.
 */

import { DEFAULTS, JSON_CONTENT_TYPE } from './constants.js';
import type { ComponentRegistry } from './component-registry.js';
import type { OperationNode, ParameterLocation, ParameterNode, SchemaNode } from './types/openapi.js';
import type { InputProperty, InputSchema } from './types/tool.js';

export interface InputSchemaOptions {
  /**
   * Drop repeated names from `required`, keeping first occurrence order.
   * Off by default: the merged list is kept exactly as accumulated.
   */
  dedupeRequired?: boolean;
}

export function buildInputSchema(
  operation: OperationNode,
  registry: ComponentRegistry,
  options: InputSchemaOptions = {}
): InputSchema {
  const properties: Record<string, InputProperty> = {};
  const required: string[] = [];

  const parameters = resolveParameters(operation, registry);

  for (const location of ['path', 'query'] as const) {
    for (const param of parametersIn(parameters, location)) {
      properties[param.name] = parameterProperty(param);
      if (param.required) {
        required.push(param.name);
      }
    }
  }

  const bodySchema = jsonBodySchema(operation, registry);
  if (bodySchema?.type === 'object') {
    for (const [name, propSchema] of Object.entries(bodySchema.properties ?? {})) {
      properties[name] = bodyProperty(propSchema);
    }
    required.push(...(bodySchema.required ?? []));
  }

  return {
    type: 'object',
    properties,
    required: options.dedupeRequired ? Array.from(new Set(required)) : required,
  };
}

/**
 * Resolve parameter `$ref`s; unresolvable ones are dropped
 */
export function resolveParameters(operation: OperationNode, registry: ComponentRegistry): ParameterNode[] {
  return operation.parameters
    .map(param => registry.resolveParameter(param))
    .filter((param): param is ParameterNode => param !== undefined);
}

export function parametersIn(parameters: ParameterNode[], location: ParameterLocation): ParameterNode[] {
  return parameters.filter(param => param.in === location);
}

/**
 * The `application/json` body schema, resolved one hop
 *
 * Other media types are ignored. An unresolved `$ref` yields an empty schema,
 * which contributes no properties.
 */
export function jsonBodySchema(operation: OperationNode, registry: ComponentRegistry): SchemaNode | undefined {
  if (!operation.requestBody) return undefined;

  const schema = operation.requestBody.content[JSON_CONTENT_TYPE]?.schema;
  if (!schema) return {};

  return registry.resolveSchema(schema) ?? {};
}

// Parameters always carry a description, empty when the document has none
function parameterProperty(param: ParameterNode): InputProperty {
  return {
    type: param.schema?.type ?? DEFAULTS.PARAMETER_TYPE,
    description: param.description ?? '',
  };
}

function bodyProperty(schema: SchemaNode): InputProperty {
  const property: InputProperty = {
    type: schema.type ?? DEFAULTS.PARAMETER_TYPE,
  };
  if (schema.description !== undefined) property.description = schema.description;
  if (schema.enum !== undefined) property.enum = schema.enum;
  if (schema.minimum !== undefined) property.minimum = schema.minimum;
  if (schema.maximum !== undefined) property.maximum = schema.maximum;
  return property;
}
