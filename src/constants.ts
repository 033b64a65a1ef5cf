/**
 * Application constants
 *
 * Defaults and literals shared by the generator and the emitted server.
 */

import type { ToolMethod } from './types/openapi.js';

/**
 * HTTP methods that become tools, in the order they are checked
 */
export const TOOL_METHODS: readonly ToolMethod[] = ['get', 'post', 'put', 'delete', 'patch'];

/**
 * Methods whose generated request may carry a body
 */
export const BODY_METHODS: readonly string[] = ['POST', 'PUT', 'PATCH'];

export const JSON_CONTENT_TYPE = 'application/json';

export const COMPONENT_SCHEMA_REF = '#/components/schemas/';
export const COMPONENT_PARAMETER_REF = '#/components/parameters/';

export const DEFAULTS = {
  TITLE: 'API',
  VERSION: '1.0.0',
  API_KEY_HEADER: 'X-API-Key',
  CREDENTIAL_ENV_VAR: 'API_KEY',
  OUTPUT_PATH: 'src/index.ts',
  PARAMETER_TYPE: 'string',
} as const;

/**
 * Placeholder type for anything the resolver does not map
 */
export const UNTYPED = 'any';
