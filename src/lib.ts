/**
 * Library exports for programmatic usage
 */
export { ArtifactRenderer } from './artifact-renderer.js';
export type { RenderOptions, RenderResult } from './artifact-renderer.js';
export { ToolDescriptorBuilder, toMcpTool } from './tool-descriptor.js';
export { buildInputSchema } from './input-schema.js';
export { synthesizeOperationId } from './operation-id.js';
export { resolveSchemaType } from './schema-type-resolver.js';
export { generateInterfaces, generateInterface } from './interface-generator.js';
export { ComponentRegistry } from './component-registry.js';
export { DescriptorValidator } from './descriptor-validator.js';
export type { ValidationIssue } from './descriptor-validator.js';
export { extractAuthConfig } from './auth-config.js';
export { DocumentLoader } from './document-loader.js';
export { loadConfig } from './config.js';
export type { GeneratorConfig } from './config.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
export type * from './types/openapi.js';
export type * from './types/tool.js';
