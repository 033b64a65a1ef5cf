/**
 * Tool descriptor builder
 *
 * Why: Turns every path/method pair of the document into one self-contained
 * ToolDescriptor. Everything downstream (validation, rendering) works from
 * descriptors only.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ComponentRegistry } from './component-registry.js';
import { buildInputSchema, parametersIn, resolveParameters, type InputSchemaOptions } from './input-schema.js';
import { synthesizeOperationId } from './operation-id.js';
import type { ApiDocument, OperationNode } from './types/openapi.js';
import type { ToolDescriptor } from './types/tool.js';

export class ToolDescriptorBuilder {
  private registry: ComponentRegistry;

  constructor(
    private document: ApiDocument,
    private options: InputSchemaOptions = {}
  ) {
    this.registry = ComponentRegistry.fromDocument(document);
  }

  /**
   * Build descriptors for every operation, in document order
   *
   * Paths keep their declaration order and methods keep the order of the
   * path item's keys.
   */
  buildAll(): ToolDescriptor[] {
    const tools: ToolDescriptor[] = [];

    for (const [path, pathItem] of Object.entries(this.document.paths)) {
      for (const [method, operation] of Object.entries(pathItem)) {
        if (!operation) continue;
        tools.push(this.buildTool(path, method, operation));
      }
    }

    return tools;
  }

  buildTool(path: string, method: string, operation: OperationNode): ToolDescriptor {
    const name = operation.operationId || synthesizeOperationId(path, method);
    const summary = operation.summary ?? '';
    const parameters = resolveParameters(operation, this.registry);

    return {
      name,
      httpMethod: method.toUpperCase(),
      pathTemplate: path,
      summary,
      description: operation.description ?? summary,
      inputSchema: buildInputSchema(operation, this.registry, this.options),
      hasRequestBody: operation.requestBody !== undefined,
      responses: operation.responses ?? {},
      pathParameters: parametersIn(parameters, 'path').map(param => param.name),
      queryParameters: parametersIn(parameters, 'query').map(param => param.name),
    };
  }
}

/**
 * MCP tool listing entry for a descriptor
 */
export function toMcpTool(descriptor: ToolDescriptor): Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: { ...descriptor.inputSchema },
  };
}
