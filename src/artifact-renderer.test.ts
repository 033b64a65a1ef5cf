/**
 * Tests for MCP server source rendering
 */

import { describe, it, expect, vi } from 'vitest';
import ts from 'typescript';
import {
  ArtifactRenderer,
  assignMethodNames,
  type RenderOptions,
  renderToolMethod,
  renderUrl,
  sendsBody,
} from './artifact-renderer.js';
import { NameCollisionError } from './errors.js';
import type { Logger } from './logger.js';
import { ToolDescriptorBuilder } from './tool-descriptor.js';
import type { ToolDescriptor } from './types/tool.js';
import { bookStoreDocument, emptyDocument, operation } from './testing/fixtures.js';

function mockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function render(document = bookStoreDocument(), options: RenderOptions = {}) {
  return new ArtifactRenderer(document, { logger: mockLogger(), ...options }).render();
}

function lines(source: string): string[] {
  return source.split('\n');
}

function descriptor(overrides: Partial<ToolDescriptor>): ToolDescriptor {
  return {
    name: 'tool',
    httpMethod: 'GET',
    pathTemplate: '/',
    summary: '',
    description: '',
    inputSchema: { type: 'object', properties: {}, required: [] },
    hasRequestBody: false,
    responses: {},
    pathParameters: [],
    queryParameters: [],
    ...overrides,
  };
}

// Duplicate identifier, import conflict, block-scoped redeclaration, class merge
const CONFLICT_CODES = [2300, 2440, 2451, 2813, 2814];

function declarationConflicts(source: string): string[] {
  const fileName = 'generated-server.ts';
  const options: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ESNext,
    noEmit: true,
    types: [],
  };
  const host = ts.createCompilerHost(options);
  const readSourceFile = host.getSourceFile.bind(host);
  const fileExists = host.fileExists.bind(host);
  host.fileExists = name => name.endsWith(fileName) || fileExists(name);
  host.getSourceFile = (name, languageVersion, onError, shouldCreate) =>
    name.endsWith(fileName)
      ? ts.createSourceFile(name, source, languageVersion)
      : readSourceFile(name, languageVersion, onError, shouldCreate);

  const program = ts.createProgram([fileName], options, host);
  return ts
    .getPreEmitDiagnostics(program)
    .filter(diagnostic => diagnostic.file?.fileName.endsWith(fileName) && CONFLICT_CODES.includes(diagnostic.code))
    .map(diagnostic => ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n'));
}

const pingDocument = emptyDocument({
  info: { title: 'Ping' },
  paths: {
    '/ping': { get: operation({ operationId: 'ping', summary: 'Health check' }) },
  },
});

describe('ArtifactRenderer', () => {
  it('renders an interface for a minimal object schema', () => {
    const { source } = render(emptyDocument({
      components: {
        schemas: { Item: { type: 'object', properties: { id: { type: 'integer' } }, required: ['id'] } },
        parameters: {},
        securitySchemes: {},
      },
    }));

    expect(source).toContain('// Generated interfaces from OpenAPI spec\ninterface Item {\n  id: number;\n}');
  });

  it('uses the first server as base URL', () => {
    expect(lines(render().source)).toContain("const BASE_URL = 'https://api.bookstore.test/v1';");
  });

  it('renders an empty base URL when no servers are declared', () => {
    expect(lines(render(pingDocument).source)).toContain("const BASE_URL = '';");
  });

  it('binds the apiKey header to the runtime credential', () => {
    expect(lines(render().source)).toContain("        'X-Api-Key': apiKey,");
  });

  it('renders no auth header without an apiKey scheme', () => {
    const { source } = render(pingDocument);

    expect(source).not.toContain(': apiKey,');
    expect(source).toContain("        'Content-Type': 'application/json',\n      },");
  });

  it('requires the credential at startup and passes it to the server', () => {
    const source = render().source;

    expect(lines(source)).toContain("  const value = env['API_KEY'];");
    expect(lines(source)).toContain("    throw new ConfigurationError('API_KEY environment variable is required');");
    expect(source.trimEnd().endsWith(
      'const server = new BookStoreApiServer(resolveApiKey());\nserver.run().catch(console.error);'
    )).toBe(true);
  });

  it('reads the credential from a configured variable', () => {
    const source = render(pingDocument, { credentialEnvVar: 'PING_TOKEN' }).source;

    expect(lines(source)).toContain("  const value = env['PING_TOKEN'];");
    expect(lines(source)).toContain("    throw new ConfigurationError('PING_TOKEN environment variable is required');");
  });

  it('derives class name, service name and version from info', () => {
    const source = lines(render().source);

    expect(source).toContain('class BookStoreApiServer {');
    expect(source).toContain("        name: 'book-store-api-server',");
    expect(source).toContain("        version: '2.1.0',");
    expect(source).toContain("    console.error('Book Store API MCP server running on stdio');");
  });

  it('falls back to API and 1.0.0 without title and version', () => {
    const source = lines(render(emptyDocument()).source);

    expect(source).toContain('class ApiServer {');
    expect(source).toContain("        name: 'api-server',");
    expect(source).toContain("        version: '1.0.0',");
  });

  it('lists each tool with its input schema as literal data', () => {
    const source = render(pingDocument).source;

    expect(source).toContain([
      '        {',
      "          name: 'ping',",
      "          description: 'Health check',",
      '          inputSchema: {',
      '            "type": "object",',
      '            "properties": {},',
      '            "required": []',
      '          },',
      '        },',
    ].join('\n'));
  });

  it('dispatches by exact name and rejects unknown tools', () => {
    const source = render().source;

    expect(source).toContain("        case 'listBooks':\n          return await this.listBooks(args);");
    expect(source).toContain("        case 'createAuthorsCreate':\n          return await this.createAuthorsCreate(args);");
    expect(source).toContain('            ErrorCode.MethodNotFound,\n            `Unknown tool: ${request.params.name}`');
  });

  it('renders one request method per tool', () => {
    const { source, tools } = render();

    expect(tools).toHaveLength(6);
    for (const tool of tools) {
      expect(source).toContain(`  private async ${tool.name}(args: ToolArguments) {`);
    }
  });

  it('escapes quotes in descriptions', () => {
    const document = emptyDocument({
      paths: { '/panic': { get: operation({ summary: "Don't panic" }) } },
    });

    expect(lines(render(document).source)).toContain("          description: 'Don\\'t panic',");
  });

  it('is deterministic', () => {
    expect(render().source).toBe(render().source);
  });

  it('produces syntactically valid TypeScript', () => {
    const result = ts.transpileModule(render().source, {
      reportDiagnostics: true,
      compilerOptions: {
        module: ts.ModuleKind.ESNext,
        target: ts.ScriptTarget.ES2022,
      },
    });

    expect(result.diagnostics ?? []).toEqual([]);
  });

  it('prefixes a class name that would start with a digit', () => {
    const source = render(emptyDocument({ info: { title: '1Password Connect' } })).source;
    const result = ts.transpileModule(source, {
      reportDiagnostics: true,
      compilerOptions: { module: ts.ModuleKind.ESNext, target: ts.ScriptTarget.ES2022 },
    });

    expect(lines(source)).toContain('class _1passwordConnectServer {');
    expect(lines(source)).toContain("        name: '1password-connect-server',");
    expect(source).toContain('const server = new _1passwordConnectServer(resolveApiKey());');
    expect(result.diagnostics ?? []).toEqual([]);
  });

  it('renames interfaces that clash with generated declarations', () => {
    const item = { type: 'object', properties: { id: { type: 'integer' } } };
    const source = render(emptyDocument({
      info: { title: 'Pets' },
      components: {
        schemas: { Server: item, ToolArguments: item, PetsServer: item },
        parameters: {},
        securitySchemes: {},
      },
    })).source;

    expect(lines(source)).toEqual(expect.arrayContaining([
      'interface Server_2 {',
      'interface ToolArguments_2 {',
      'interface PetsServer_2 {',
    ]));
    expect(lines(source)).toContain('type ToolArguments = Record<string, unknown>;');
    expect(declarationConflicts(source)).toEqual([]);
  });

  it('returns descriptors and validation issues', () => {
    const document = emptyDocument({
      paths: {
        '/users': { get: operation() },
        '/users/{id}': { get: operation({ parameters: [{ name: 'id', in: 'path', required: true }] }) },
      },
    });
    const logger = mockLogger();
    const result = new ArtifactRenderer(document, { logger }).render();

    expect(result.tools.map(tool => tool.name)).toEqual(['getUsers', 'getUsers']);
    expect(result.issues).toEqual([
      { kind: 'name-collision', name: 'getUsers', operations: ['GET /users', 'GET /users/{id}'] },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(result.source).toContain('  private async getUsers_2(args: ToolArguments) {');
  });

  it('fails on name collisions under the error policy', () => {
    const document = emptyDocument({
      paths: {
        '/users': { get: operation() },
        '/users/{id}': { get: operation() },
      },
    });

    expect(() => render(document, { nameCollisions: 'error' })).toThrow(NameCollisionError);
  });

  it('passes the required-dedupe option to the descriptor builder', () => {
    const document = emptyDocument({
      paths: {
        '/books/{bookId}': {
          put: operation({
            parameters: [{ name: 'bookId', in: 'path', required: true }],
            requestBody: {
              content: {
                'application/json': { schema: { type: 'object', properties: {}, required: ['bookId'] } },
              },
            },
          }),
        },
      },
    });

    expect(render(document).tools[0].inputSchema.required).toEqual(['bookId', 'bookId']);
    expect(render(document, { dedupeRequired: true }).tools[0].inputSchema.required).toEqual(['bookId']);
  });

  it('exposes base URL and auth config', () => {
    const renderer = new ArtifactRenderer(bookStoreDocument(), { logger: mockLogger() });

    expect(renderer.getBaseUrl()).toBe('https://api.bookstore.test/v1');
    expect(renderer.getAuthConfig()).toEqual({ headerName: 'X-Api-Key' });
  });
});

describe('renderToolMethod', () => {
  it('renders a request without body or query for a bare GET', () => {
    const [ping] = new ToolDescriptorBuilder(pingDocument).buildAll();

    expect(renderToolMethod(ping, 'ping')).toBe([
      '  private async ping(args: ToolArguments) {',
      '    try {',
      '      const response = await this.axiosInstance.request({',
      "        method: 'get',",
      "        url: '/ping',",
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
    ].join('\n'));
  });

  it('never attaches a body to GET or DELETE', () => {
    const tools = new ToolDescriptorBuilder(bookStoreDocument()).buildAll();
    const remove = tools.find(tool => tool.httpMethod === 'DELETE');

    if (!remove) throw new Error('fixture has no DELETE operation');

    expect(remove.hasRequestBody).toBe(true);
    expect(renderToolMethod(remove, 'deleteBooks')).not.toContain('data:');
    expect(renderToolMethod(descriptor({ httpMethod: 'GET', hasRequestBody: true }), 'get')).not.toContain('data:');
  });

  it('attaches the arguments unchanged as body for POST, PUT and PATCH', () => {
    for (const httpMethod of ['POST', 'PUT', 'PATCH']) {
      const text = renderToolMethod(descriptor({ httpMethod, hasRequestBody: true }), 'call');
      expect(lines(text)).toContain('        data: args,');
    }
  });

  it('sends no body when the operation declares none', () => {
    expect(renderToolMethod(descriptor({ httpMethod: 'POST' }), 'call')).not.toContain('data:');
  });

  it('fills path parameters and passes query parameters', () => {
    const text = renderToolMethod(descriptor({
      httpMethod: 'GET',
      pathTemplate: '/books/{bookId}',
      pathParameters: ['bookId'],
      queryParameters: ['limit', 'sort-by'],
    }), 'getBooks');

    expect(text).toContain([
      "        method: 'get',",
      "        url: `/books/${encodeURIComponent(String(args['bookId'] ?? ''))}`,",
      '        params: {',
      "          limit: args['limit'],",
      "          'sort-by': args['sort-by'],",
      '        },',
    ].join('\n'));
  });
});

describe('sendsBody', () => {
  it('requires both a declared body and a body method', () => {
    expect(sendsBody(descriptor({ httpMethod: 'PUT', hasRequestBody: true }))).toBe(true);
    expect(sendsBody(descriptor({ httpMethod: 'PUT', hasRequestBody: false }))).toBe(false);
    expect(sendsBody(descriptor({ httpMethod: 'DELETE', hasRequestBody: true }))).toBe(false);
  });
});

describe('renderUrl', () => {
  it('keeps static paths as string literals', () => {
    expect(renderUrl('/books')).toBe("'/books'");
  });

  it('substitutes every placeholder', () => {
    expect(renderUrl('/shelves/{shelf}/books/{bookId}.json')).toBe(
      "`/shelves/${encodeURIComponent(String(args['shelf'] ?? ''))}/books/${encodeURIComponent(String(args['bookId'] ?? ''))}.json`"
    );
  });

  it('escapes template syntax in static text', () => {
    expect(renderUrl('/a`b\\c/{id}')).toBe(
      "`/a\\`b\\\\c/${encodeURIComponent(String(args['id'] ?? ''))}`"
    );
  });
});

describe('assignMethodNames', () => {
  it('sanitizes names and resolves clashes with a suffix', () => {
    const tools = [
      descriptor({ name: 'list-pets' }),
      descriptor({ name: 'list_pets' }),
      descriptor({ name: 'run' }),
      descriptor({ name: '2fa' }),
    ];

    expect(Array.from(assignMethodNames(tools).values())).toEqual([
      'list_pets',
      'list_pets_2',
      'run_2',
      '_2fa',
    ]);
  });
});
