#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Reads config, loads the document, renders the server and writes it.
 * The output file is written only after rendering has succeeded.
 */

import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import { ArtifactRenderer } from './artifact-renderer.js';
import { loadConfig } from './config.js';
import { DocumentLoader } from './document-loader.js';
import { getErrorDetails } from './errors.js';
import { ConsoleLogger, createLogger, type Logger } from './logger.js';

async function main(): Promise<void> {
  let logger: Logger = new ConsoleLogger();

  try {
    const config = loadConfig(process.env, process.argv.slice(2));
    logger = createLogger(config.logFormat, config.logLevel);

    const document = await new DocumentLoader().load(config.specPath);
    const renderer = new ArtifactRenderer(document, {
      credentialEnvVar: config.credentialEnvVar,
      nameCollisions: config.nameCollisions,
      dedupeRequired: config.dedupeRequired,
      logger,
    });
    const result = renderer.render();

    await fs.mkdir(path.dirname(path.resolve(config.outputPath)), { recursive: true });
    await fs.writeFile(config.outputPath, result.source, 'utf-8');

    logger.info(`Generated MCP server code in ${config.outputPath}`, {
      title: document.info.title,
      version: document.info.version,
      baseUrl: renderer.getBaseUrl(),
      tools: result.tools.length,
      issues: result.issues.length,
    });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Generation failed', err, { details: getErrorDetails(error).details });
    process.exit(1);
  }
}

void main();
