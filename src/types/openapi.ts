/**
 * OpenAPI document model
 *
 * Why simplified: The generator only reads the subset of OpenAPI it turns into
 * tools and interfaces (paths, schemas, parameters, servers, security schemes).
 * Everything else in the source document is dropped at load time.
 */

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

export interface ReferenceNode {
  $ref: string;
}

export interface SchemaNode {
  type?: string;
  enum?: unknown[];
  items?: SchemaNode;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  description?: string;
  minimum?: number;
  maximum?: number;
  $ref?: string;
}

export interface ParameterNode {
  name: string;
  in: ParameterLocation;
  required?: boolean;
  schema?: SchemaNode;
  description?: string;
}

export interface MediaTypeNode {
  schema?: SchemaNode;
}

export interface RequestBodyNode {
  required?: boolean;
  content: Record<string, MediaTypeNode>;
}

export interface OperationNode {
  operationId?: string;
  summary?: string;
  description?: string;
  parameters: Array<ParameterNode | ReferenceNode>;
  requestBody?: RequestBodyNode;
  responses?: Record<string, unknown>;
}

/**
 * Operations of one path, keyed by lower-case method in document order.
 * Non-tool keys (`parameters`, `head`, vendor extensions) are dropped at load.
 */
export type PathItemNode = Partial<Record<ToolMethod, OperationNode>>;

export interface SecuritySchemeNode {
  type: string;
  name?: string;
  in?: string;
  scheme?: string;
  description?: string;
}

export interface ServerNode {
  url: string;
  description?: string;
}

export interface ApiDocument {
  info: {
    title?: string;
    version?: string;
  };
  servers: ServerNode[];
  paths: Record<string, PathItemNode>;
  components: {
    schemas: Record<string, SchemaNode>;
    parameters: Record<string, ParameterNode>;
    securitySchemes: Record<string, SecuritySchemeNode>;
  };
  security: Array<Record<string, string[]>>;
}

export type ToolMethod = 'get' | 'post' | 'put' | 'delete' | 'patch';
