/**
 * MCP server source renderer
 *
 * Why: Top-level composer of the generator. Builds descriptors, validates
 * them, renders interfaces, and stitches everything into one TypeScript file
 * that runs an MCP stdio server forwarding tool calls to the API with axios.
 *
 * Output is deterministic: same document and options, same text.
 */

import { extractAuthConfig } from './auth-config.js';
import { ComponentRegistry } from './component-registry.js';
import { BODY_METHODS, DEFAULTS } from './constants.js';
import { DescriptorValidator, reportIssues, type ValidationIssue } from './descriptor-validator.js';
import type { InputSchemaOptions } from './input-schema.js';
import { generateInterfaces } from './interface-generator.js';
import { ConsoleLogger, type Logger } from './logger.js';
import {
  indent,
  objectKey,
  stringLiteral,
  templateText,
  toIdentifier,
  toPascalCase,
  toServiceName,
} from './source-text.js';
import { ToolDescriptorBuilder, toMcpTool } from './tool-descriptor.js';
import type { ApiDocument } from './types/openapi.js';
import type { AuthConfig, NameCollisionPolicy, ToolDescriptor } from './types/tool.js';

export interface RenderOptions extends InputSchemaOptions {
  /** Environment variable the generated server reads its API key from */
  credentialEnvVar?: string;
  nameCollisions?: NameCollisionPolicy;
  logger?: Logger;
}

export interface RenderResult {
  source: string;
  tools: ToolDescriptor[];
  issues: ValidationIssue[];
}

interface ServerIdentity {
  title: string;
  className: string;
  serviceName: string;
  version: string;
}

const PATH_PLACEHOLDER = /\{([^}]+)\}/g;

/**
 * Top-level names the rendered file declares or imports; interfaces must not reuse them
 */
const DECLARED_NAMES = [
  'Server',
  'StdioServerTransport',
  'CallToolRequestSchema',
  'ErrorCode',
  'ListToolsRequestSchema',
  'McpError',
  'axios',
  'AxiosError',
  'AxiosInstance',
  'BASE_URL',
  'ConfigurationError',
  'resolveApiKey',
  'ToolArguments',
  'toolResult',
  'describeApiError',
  'server',
] as const;

export class ArtifactRenderer {
  private logger: Logger;
  private credentialEnvVar: string;
  private nameCollisions: NameCollisionPolicy;

  constructor(
    private document: ApiDocument,
    private options: RenderOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.credentialEnvVar = options.credentialEnvVar ?? DEFAULTS.CREDENTIAL_ENV_VAR;
    this.nameCollisions = options.nameCollisions ?? 'warn';
  }

  render(): RenderResult {
    const tools = new ToolDescriptorBuilder(this.document, {
      dedupeRequired: this.options.dedupeRequired,
    }).buildAll();

    const issues = new DescriptorValidator().validate(tools);
    reportIssues(issues, this.nameCollisions, this.logger);

    const identity = this.serverIdentity();
    const interfaces = generateInterfaces(ComponentRegistry.fromDocument(this.document), [
      ...DECLARED_NAMES,
      identity.className,
    ]);
    const methodNames = assignMethodNames(tools);

    const source = [
      this.renderPreamble(),
      `// Generated interfaces from OpenAPI spec\n${interfaces}`,
      this.renderConfiguration(),
      renderHelpers(),
      this.renderServerClass(identity, tools, methodNames),
      renderStartup(identity),
    ].join('\n\n') + '\n';

    this.logger.debug('Rendered MCP server source', {
      tools: tools.length,
      issues: issues.length,
      bytes: source.length,
    });

    return { source, tools, issues };
  }

  getBaseUrl(): string {
    return this.document.servers[0]?.url ?? '';
  }

  getAuthConfig(): AuthConfig | undefined {
    return extractAuthConfig(this.document);
  }

  private serverIdentity(): ServerIdentity {
    const title = this.document.info.title || DEFAULTS.TITLE;
    return {
      title,
      className: `${toPascalCase(title) || toPascalCase(DEFAULTS.TITLE)}Server`,
      serviceName: `${toServiceName(title)}-server`,
      version: this.document.info.version || DEFAULTS.VERSION,
    };
  }

  private renderPreamble(): string {
    return [
      '#!/usr/bin/env node',
      "import { Server } from '@modelcontextprotocol/sdk/server/index.js';",
      "import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';",
      'import {',
      '  CallToolRequestSchema,',
      '  ErrorCode,',
      '  ListToolsRequestSchema,',
      '  McpError,',
      "} from '@modelcontextprotocol/sdk/types.js';",
      "import axios, { type AxiosError, type AxiosInstance } from 'axios';",
    ].join('\n');
  }

  private renderConfiguration(): string {
    const variable = this.credentialEnvVar;
    return [
      '// Configuration',
      `const BASE_URL = ${stringLiteral(this.getBaseUrl())};`,
      '',
      'class ConfigurationError extends Error {',
      '  constructor(message: string) {',
      '    super(message);',
      "    this.name = 'ConfigurationError';",
      '  }',
      '}',
      '',
      'function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string {',
      `  const value = env[${stringLiteral(variable)}];`,
      '  if (!value) {',
      `    throw new ConfigurationError(${stringLiteral(`${variable} environment variable is required`)});`,
      '  }',
      '  return value;',
      '}',
    ].join('\n');
  }

  private renderServerClass(
    identity: ServerIdentity,
    tools: ToolDescriptor[],
    methodNames: Map<ToolDescriptor, string>
  ): string {
    const toolMethods = tools.map(tool => renderToolMethod(tool, methodNames.get(tool) ?? toIdentifier(tool.name)));

    return [
      `class ${identity.className} {`,
      '  private server: Server;',
      '  private axiosInstance: AxiosInstance;',
      '',
      '  constructor(apiKey: string) {',
      '    this.server = new Server(',
      '      {',
      `        name: ${stringLiteral(identity.serviceName)},`,
      `        version: ${stringLiteral(identity.version)},`,
      '      },',
      '      {',
      '        capabilities: {',
      '          tools: {},',
      '        },',
      '      }',
      '    );',
      '',
      '    this.axiosInstance = axios.create({',
      '      baseURL: BASE_URL,',
      '      headers: {',
      "        'Content-Type': 'application/json',",
      ...this.renderAuthHeader(),
      '      },',
      '    });',
      '',
      '    this.setupToolHandlers();',
      '',
      "    this.server.onerror = (error) => console.error('[MCP Error]', error);",
      "    process.on('SIGINT', async () => {",
      '      await this.server.close();',
      '      process.exit(0);',
      '    });',
      '  }',
      '',
      '  private setupToolHandlers(): void {',
      '    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({',
      '      tools: [',
      ...tools.map(tool => indent(renderToolListEntry(tool), 8)),
      '      ],',
      '    }));',
      '',
      '    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {',
      '      const args: ToolArguments = request.params.arguments ?? {};',
      '      switch (request.params.name) {',
      ...tools.map(tool => renderDispatchCase(tool, methodNames.get(tool) ?? toIdentifier(tool.name))),
      '        default:',
      '          throw new McpError(',
      '            ErrorCode.MethodNotFound,',
      '            `Unknown tool: ${request.params.name}`',
      '          );',
      '      }',
      '    });',
      '  }',
      ...toolMethods.map(method => `\n${method}`),
      '',
      '  async run(): Promise<void> {',
      '    const transport = new StdioServerTransport();',
      '    await this.server.connect(transport);',
      `    console.error(${stringLiteral(`${identity.title} MCP server running on stdio`)});`,
      '  }',
      '}',
    ].join('\n');
  }

  /**
   * Header line binding the API key; empty when the document has no apiKey scheme
   */
  private renderAuthHeader(): string[] {
    const auth = this.getAuthConfig();
    return auth ? [`        ${stringLiteral(auth.headerName)}: apiKey,`] : [];
  }
}

function renderHelpers(): string {
  return [
    'type ToolArguments = Record<string, unknown>;',
    '',
    'function toolResult(text: string, isError = false) {',
    '  return {',
    "    content: [{ type: 'text' as const, text }],",
    '    ...(isError ? { isError: true } : {}),',
    '  };',
    '}',
    '',
    'function describeApiError(error: AxiosError): string {',
    '  const data: unknown = error.response?.data;',
    "  if (data && typeof data === 'object') {",
    '    const body = data as { error?: unknown; message?: unknown };',
    '    if (body.error) return String(body.error);',
    '    if (body.message) return String(body.message);',
    '  }',
    '  return error.message;',
    '}',
  ].join('\n');
}

function renderStartup(identity: ServerIdentity): string {
  return [
    `const server = new ${identity.className}(resolveApiKey());`,
    'server.run().catch(console.error);',
  ].join('\n');
}

function renderToolListEntry(tool: ToolDescriptor): string {
  const listed = toMcpTool(tool);
  const schema = JSON.stringify(listed.inputSchema, null, 2).replace(/\n/g, '\n  ');
  return [
    '{',
    `  name: ${stringLiteral(listed.name)},`,
    `  description: ${stringLiteral(listed.description ?? '')},`,
    `  inputSchema: ${schema},`,
    '},',
  ].join('\n');
}

function renderDispatchCase(tool: ToolDescriptor, methodName: string): string {
  return [
    `        case ${stringLiteral(tool.name)}:`,
    `          return await this.${methodName}(args);`,
  ].join('\n');
}

/**
 * One request method per tool
 *
 * GET and DELETE never send a body; POST/PUT/PATCH send the arguments
 * unchanged when the operation declares a request body.
 */
export function renderToolMethod(tool: ToolDescriptor, methodName: string): string {
  const config = [
    `method: ${stringLiteral(tool.httpMethod.toLowerCase())},`,
    `url: ${renderUrl(tool.pathTemplate)},`,
  ];

  if (tool.queryParameters.length > 0) {
    config.push(
      'params: {',
      ...tool.queryParameters.map(name => `  ${objectKey(name)}: ${argument(name)},`),
      '},'
    );
  }

  if (sendsBody(tool)) {
    config.push('data: args,');
  }

  return [
    `  private async ${methodName}(args: ToolArguments) {`,
    '    try {',
    '      const response = await this.axiosInstance.request({',
    indent(config.join('\n'), 8),
    '      });',
    '',
    '      return toolResult(JSON.stringify(response.data, null, 2));',
    '    } catch (error) {',
    '      if (axios.isAxiosError(error)) {',
    '        return toolResult(`API error: ${describeApiError(error)}`, true);',
    '      }',
    '      throw error;',
    '    }',
    '  }',
  ].join('\n');
}

export function sendsBody(tool: ToolDescriptor): boolean {
  return tool.hasRequestBody && BODY_METHODS.includes(tool.httpMethod);
}

/**
 * URL expression with path placeholders filled from the arguments
 *
 * Example: '/users/{id}' => `/users/${encodeURIComponent(String(args['id'] ?? ''))}`
 */
export function renderUrl(pathTemplate: string): string {
  const placeholders = Array.from(pathTemplate.matchAll(PATH_PLACEHOLDER));
  if (placeholders.length === 0) return stringLiteral(pathTemplate);

  let text = '';
  let last = 0;
  for (const match of placeholders) {
    const start = match.index ?? 0;
    text += templateText(pathTemplate.slice(last, start));
    text += `\${encodeURIComponent(String(${argument(match[1])} ?? ''))}`;
    last = start + match[0].length;
  }
  text += templateText(pathTemplate.slice(last));

  return `\`${text}\``;
}

function argument(name: string): string {
  return `args[${stringLiteral(name)}]`;
}

/**
 * Unique method identifier per descriptor
 *
 * Sanitizing can map different names to the same identifier
 * ('list-pets' and 'list_pets'); later ones get a numeric suffix.
 */
export function assignMethodNames(tools: readonly ToolDescriptor[]): Map<ToolDescriptor, string> {
  const reserved = new Set(['constructor', 'setupToolHandlers', 'run', 'server', 'axiosInstance']);
  const names = new Map<ToolDescriptor, string>();

  for (const tool of tools) {
    const base = toIdentifier(tool.name);
    let candidate = base;
    let suffix = 2;
    while (reserved.has(candidate)) {
      candidate = `${base}_${suffix++}`;
    }
    reserved.add(candidate);
    names.set(tool, candidate);
  }

  return names;
}
