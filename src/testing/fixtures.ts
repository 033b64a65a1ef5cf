/**
 * Document fixtures for generator tests
 *
 * A small book store API covering path/query parameters, `$ref` and inline
 * request bodies, a DELETE that declares a body, and an apiKey scheme.
 */

import type { ApiDocument, OperationNode } from '../types/openapi.js';

export function emptyDocument(overrides: Partial<ApiDocument> = {}): ApiDocument {
  return {
    info: {},
    servers: [],
    paths: {},
    components: {
      schemas: {},
      parameters: {},
      securitySchemes: {},
    },
    security: [],
    ...overrides,
  };
}

export function operation(overrides: Partial<OperationNode> = {}): OperationNode {
  return {
    parameters: [],
    ...overrides,
  };
}

export const bookIdParam = {
  name: 'bookId',
  in: 'path',
  required: true,
  schema: { type: 'string' },
  description: 'Book identifier',
} as const;

export function bookStoreDocument(): ApiDocument {
  return {
    info: { title: 'Book Store API', version: '2.1.0' },
    servers: [
      { url: 'https://api.bookstore.test/v1' },
      { url: 'https://staging.bookstore.test/v1' },
    ],
    paths: {
      '/books': {
        get: operation({
          operationId: 'listBooks',
          summary: 'List books',
          parameters: [
            { name: 'limit', in: 'query', schema: { type: 'integer' }, description: 'Page size' },
            { name: 'X-Trace', in: 'header', schema: { type: 'string' } },
          ],
          responses: { '200': { description: 'Books' } },
        }),
        post: operation({
          summary: 'Add a book',
          requestBody: {
            required: true,
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/NewBook' } },
            },
          },
        }),
      },
      '/books/{bookId}': {
        get: operation({
          summary: 'Get a book',
          description: 'Fetch a single book by id',
          parameters: [bookIdParam],
        }),
        put: operation({
          summary: 'Replace a book',
          parameters: [bookIdParam],
          requestBody: {
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: { title: { type: 'string' } },
                  required: ['title'],
                },
              },
            },
          },
        }),
        delete: operation({
          summary: 'Remove a book',
          parameters: [bookIdParam],
          requestBody: {
            content: {
              'application/json': {
                schema: { type: 'object', properties: { reason: { type: 'string' } } },
              },
            },
          },
        }),
      },
      '/authors/create': {
        post: operation({
          summary: 'Register an author',
          requestBody: {
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: { name: { type: 'string', description: 'Full name' } },
                  required: ['name'],
                },
              },
            },
          },
        }),
      },
    },
    components: {
      schemas: {
        Book: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            title: { type: 'string', description: 'Book title' },
            genre: { type: 'string', enum: ['fiction', 'poetry'] },
            tags: { type: 'array', items: { type: 'string' } },
            author: { type: 'object', properties: { name: { type: 'string' } } },
          },
          required: ['id', 'title'],
        },
        NewBook: {
          type: 'object',
          properties: {
            title: { type: 'string', description: 'Book title' },
            pages: { type: 'integer', minimum: 1, maximum: 5000 },
            format: { type: 'string', enum: ['hardcover', 'paperback'] },
          },
          required: ['title'],
        },
        Genre: { type: 'string', enum: ['fiction', 'poetry'] },
      },
      parameters: {},
      securitySchemes: {
        ApiKeyAuth: { type: 'apiKey', in: 'header', name: 'X-Api-Key' },
      },
    },
    security: [{ ApiKeyAuth: [] }],
  };
}
