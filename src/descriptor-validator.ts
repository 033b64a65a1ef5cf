/**
 * Descriptor validation
 *
 * Why: Synthesized names depend only on (path, method), so `GET /users` and
 * `GET /users/{id}` both become `getUsers`, and a declared operationId may
 * collide with a synthesized one. Input schemas are copied from the document
 * as-is and can carry types JSON Schema does not know (`file`).
 */

import Ajv from 'ajv';
import { NameCollisionError } from './errors.js';
import type { Logger } from './logger.js';
import type { InputSchema, NameCollisionPolicy, ToolDescriptor } from './types/tool.js';

export type ValidationIssue =
  | { kind: 'name-collision'; name: string; operations: string[] }
  | { kind: 'invalid-input-schema'; name: string; message: string };

export class DescriptorValidator {
  private ajv = new Ajv.default({ strict: false, allErrors: true });

  validate(descriptors: readonly ToolDescriptor[]): ValidationIssue[] {
    return [
      ...this.findNameCollisions(descriptors),
      ...this.findInvalidInputSchemas(descriptors),
    ];
  }

  /**
   * One issue per duplicated name, listing every `METHOD path` that uses it
   */
  findNameCollisions(descriptors: readonly ToolDescriptor[]): ValidationIssue[] {
    const byName = new Map<string, string[]>();
    for (const descriptor of descriptors) {
      const operations = byName.get(descriptor.name) ?? [];
      operations.push(`${descriptor.httpMethod} ${descriptor.pathTemplate}`);
      byName.set(descriptor.name, operations);
    }

    const issues: ValidationIssue[] = [];
    for (const [name, operations] of byName) {
      if (operations.length > 1) {
        issues.push({ kind: 'name-collision', name, operations });
      }
    }
    return issues;
  }

  findInvalidInputSchemas(descriptors: readonly ToolDescriptor[]): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const descriptor of descriptors) {
      try {
        this.ajv.compile(withUniqueRequired(descriptor.inputSchema));
      } catch (error) {
        issues.push({
          kind: 'invalid-input-schema',
          name: descriptor.name,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return issues;
  }
}

/**
 * Repeated `required` names are kept in the emitted schema; draft-07 rejects
 * them, so the compiled copy lists each name once
 */
function withUniqueRequired(schema: InputSchema): InputSchema {
  return { ...schema, required: Array.from(new Set(schema.required)) };
}

/**
 * Apply the collision policy and log everything else
 *
 * Throws NameCollisionError when the policy is `error` and any name repeats.
 */
export function reportIssues(
  issues: readonly ValidationIssue[],
  policy: NameCollisionPolicy,
  logger: Logger
): void {
  const collisions: Record<string, string[]> = {};

  for (const issue of issues) {
    switch (issue.kind) {
      case 'name-collision':
        collisions[issue.name] = issue.operations;
        if (policy === 'warn') {
          logger.warn(`Tool name '${issue.name}' is used by ${issue.operations.length} operations`, {
            operations: issue.operations,
          });
        }
        break;
      case 'invalid-input-schema':
        logger.warn(`Tool '${issue.name}' has an invalid input schema`, { reason: issue.message });
        break;
    }
  }

  if (policy === 'error' && Object.keys(collisions).length > 0) {
    throw new NameCollisionError(collisions);
  }
}
