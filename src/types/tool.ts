/**
 * Tool descriptor types
 *
 * A descriptor is the normalized description of one callable operation. The
 * renderer works from descriptors only; it never looks at the source document
 * operations again.
 */

export type InputProperty = {
  type: string;
  description?: string;
  enum?: unknown[];
  minimum?: number;
  maximum?: number;
};

// Type alias rather than interface: MCP's Tool['inputSchema'] carries an index signature
export type InputSchema = {
  type: 'object';
  properties: Record<string, InputProperty>;
  required: string[];
};

export interface ToolDescriptor {
  readonly name: string;
  readonly httpMethod: string;
  readonly pathTemplate: string;
  readonly summary: string;
  readonly description: string;
  readonly inputSchema: InputSchema;
  readonly hasRequestBody: boolean;
  readonly responses: Record<string, unknown>;
  readonly pathParameters: readonly string[];
  readonly queryParameters: readonly string[];
}

export interface AuthConfig {
  headerName: string;
}

export type NameCollisionPolicy = 'warn' | 'error';
