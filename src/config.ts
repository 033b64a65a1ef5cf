/**
 * Generator configuration
 *
 * Options come from the environment (and `.env` via dotenv). Positional CLI
 * arguments take precedence for the two paths.
 */

import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import { ConfigurationError } from './errors.js';
import { parseLogLevel, type LogFormat, type LogLevel } from './logger.js';
import type { NameCollisionPolicy } from './types/tool.js';

export interface GeneratorConfig {
  specPath: string;
  outputPath: string;
  credentialEnvVar: string;
  nameCollisions: NameCollisionPolicy;
  dedupeRequired: boolean;
  logFormat: LogFormat;
  logLevel: LogLevel;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const configSchema = z.object({
  specPath: z.string({ required_error: 'OpenAPI document path is required (argument or OPENAPI_SPEC_PATH)' }).min(1),
  outputPath: z.string().min(1).default(DEFAULTS.OUTPUT_PATH),
  credentialEnvVar: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name')
    .default(DEFAULTS.CREDENTIAL_ENV_VAR),
  nameCollisions: z.enum(['warn', 'error']).default('warn'),
  dedupeRequired: booleanFlag.default('false'),
  logFormat: z.enum(['console', 'json']).default('console'),
});

/**
 * Build configuration from environment and positional arguments
 *
 * argv is `process.argv.slice(2)`: `[specPath?, outputPath?]`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = []
): GeneratorConfig {
  const parsed = configSchema.safeParse({
    specPath: argv[0] ?? env.OPENAPI_SPEC_PATH,
    outputPath: argv[1] ?? env.OUTPUT_PATH,
    credentialEnvVar: env.AUTH_ENV_VAR,
    nameCollisions: env.MCP_TOOLNAME_COLLISIONS?.toLowerCase(),
    dedupeRequired: env.MCP_REQUIRED_DEDUPE?.toLowerCase(),
    logFormat: env.LOG_FORMAT?.toLowerCase(),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return {
    ...parsed.data,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
