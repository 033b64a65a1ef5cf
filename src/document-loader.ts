/**
 * OpenAPI document loader
 *
 * Why validate at load: Every later stage assumes the document model's shape.
 * A document that does not fit it fails here with one DocumentParseError
 * listing the zod issue paths.
 */

import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { TOOL_METHODS } from './constants.js';
import { DocumentParseError } from './errors.js';
import type { ApiDocument, OperationNode, PathItemNode, SchemaNode } from './types/openapi.js';

export type DocumentFormat = 'json' | 'yaml';

// OpenAPI 3.1 allows `type: ['string', 'null']`; the model keeps the first non-null entry
const schemaTypeSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(type => (Array.isArray(type) ? type.find(entry => entry !== 'null') : type));

// YAML reads `version: 1.5` as a number; info scalars are kept as text
const infoScalarSchema = z.union([z.string(), z.number()]).transform(String);

const schemaNodeSchema: z.ZodType<SchemaNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    type: schemaTypeSchema.optional(),
    enum: z.array(z.unknown()).optional(),
    items: schemaNodeSchema.optional(),
    properties: z.record(schemaNodeSchema).optional(),
    required: z.array(z.string()).optional(),
    description: z.string().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    $ref: z.string().optional(),
  })
);

const parameterSchema = z.object({
  name: z.string(),
  in: z.enum(['path', 'query', 'header', 'cookie']),
  required: z.boolean().optional(),
  schema: schemaNodeSchema.optional(),
  description: z.string().optional(),
});

const referenceSchema = z.object({ $ref: z.string() });

const operationSchema = z.object({
  operationId: z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  parameters: z.array(z.union([referenceSchema, parameterSchema])).default([]),
  requestBody: z
    .object({
      required: z.boolean().optional(),
      content: z.record(z.object({ schema: schemaNodeSchema.optional() })).default({}),
    })
    .optional(),
  responses: z.record(z.unknown()).optional(),
});

const securitySchemeSchema = z.object({
  type: z.string(),
  name: z.string().optional(),
  in: z.string().optional(),
  scheme: z.string().optional(),
  description: z.string().optional(),
});

const documentSchema = z.object({
  info: z
    .object({
      title: infoScalarSchema.optional(),
      version: infoScalarSchema.optional(),
    })
    .default({}),
  servers: z.array(z.object({ url: z.string(), description: z.string().optional() })).default([]),
  paths: z.record(z.record(z.unknown())).default({}),
  components: z
    .object({
      schemas: z.record(schemaNodeSchema).default({}),
      parameters: z.record(z.union([referenceSchema, parameterSchema])).default({}),
      securitySchemes: z.record(z.union([referenceSchema, securitySchemeSchema])).default({}),
    })
    .default({}),
  security: z.array(z.record(z.array(z.string()))).default([]),
});

export class DocumentLoader {
  /**
   * Read a document from disk; `.yaml`/`.yml` are parsed as YAML, anything else as JSON
   */
  async load(specPath: string): Promise<ApiDocument> {
    const content = await fs.readFile(specPath, 'utf-8');
    const format: DocumentFormat = specPath.endsWith('.yaml') || specPath.endsWith('.yml') ? 'yaml' : 'json';
    return this.parse(content, format, specPath);
  }

  parse(content: string, format: DocumentFormat, source = '<inline>'): ApiDocument {
    let raw: unknown;
    try {
      raw = format === 'yaml' ? parseYaml(content) : JSON.parse(content);
    } catch (error) {
      throw new DocumentParseError(`Cannot parse ${format.toUpperCase()} document ${source}`, {
        source,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    return this.fromObject(raw, source);
  }

  /**
   * Validate an already-parsed value and normalize it into the document model
   */
  fromObject(raw: unknown, source = '<inline>'): ApiDocument {
    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DocumentParseError(`Invalid OpenAPI document ${source}`, {
        source,
        issues: formatIssues(parsed.error),
      });
    }

    const data = parsed.data;
    const paths: Record<string, PathItemNode> = {};
    for (const [path, pathItem] of Object.entries(data.paths)) {
      paths[path] = this.extractOperations(path, pathItem, source);
    }

    const parameters: ApiDocument['components']['parameters'] = {};
    for (const [name, param] of Object.entries(data.components.parameters)) {
      if (!('$ref' in param)) parameters[name] = param;
    }

    const securitySchemes: ApiDocument['components']['securitySchemes'] = {};
    for (const [name, scheme] of Object.entries(data.components.securitySchemes)) {
      if (!('$ref' in scheme)) securitySchemes[name] = scheme;
    }

    return {
      info: data.info,
      servers: data.servers,
      paths,
      components: {
        schemas: data.components.schemas,
        parameters,
        securitySchemes,
      },
      security: data.security,
    };
  }

  /**
   * Keep get/post/put/delete/patch (any case) in key order and drop the rest
   */
  private extractOperations(path: string, pathItem: Record<string, unknown>, source: string): PathItemNode {
    const operations: PathItemNode = {};

    for (const [key, value] of Object.entries(pathItem)) {
      const method = TOOL_METHODS.find(candidate => candidate === key.toLowerCase());
      if (!method) continue;

      const parsed = operationSchema.safeParse(value);
      if (!parsed.success) {
        throw new DocumentParseError(`Invalid operation ${key.toUpperCase()} ${path} in ${source}`, {
          source,
          path,
          method: key,
          issues: formatIssues(parsed.error),
        });
      }

      operations[method] = parsed.data satisfies OperationNode;
    }

    return operations;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
