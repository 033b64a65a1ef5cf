/**
 * Structured error types for the generator
 *
 * Provides type-safe error handling with machine-readable error codes
 * and structured error details for the CLI to report.
 */

export class GeneratorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GeneratorError';
  }
}

export class DocumentParseError extends GeneratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DOCUMENT_PARSE_ERROR', details);
    this.name = 'DocumentParseError';
  }
}

export class ConfigurationError extends GeneratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends GeneratorError {
  constructor(message: string, details?: Record<string, unknown>, code = 'VALIDATION_ERROR') {
    super(message, code, details);
    this.name = 'ValidationError';
  }
}

export class NameCollisionError extends ValidationError {
  constructor(collisions: Record<string, string[]>) {
    const names = Object.keys(collisions);
    super(
      `Duplicate tool names: ${names.join(', ')}`,
      { collisions },
      'NAME_COLLISION'
    );
    this.name = 'NameCollisionError';
  }
}

/**
 * Helper function to check if an error is a GeneratorError
 */
export function isGeneratorError(error: unknown): error is GeneratorError {
  return error instanceof GeneratorError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isGeneratorError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
