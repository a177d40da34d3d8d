#!/usr/bin/env node

/**
 * Memory Sync MCP Server
 *
 * Stores agent memories as markdown files and keeps them in a git repository
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { loadConfig, validateConfig } from './types/index.js';
import { MemoryService } from './services/memoryService.js';
import { SyncManager } from './services/syncManager.js';
import { MemorySyncServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';
import { LoggingTelemetry } from './utils/telemetry.js';

// Get the directory of this file for relative paths
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

async function main(): Promise<void> {
  // .env next to package.json, both from src/ (tsx) and dist/src/ (built)
  dotenv.config({ path: path.join(__dirname, '..', '.env') });
  dotenv.config({ path: path.join(__dirname, '..', '..', '.env') });

  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info('Main', 'Starting Memory Sync MCP Server');

  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const error of errors) {
      logger.error('Main', error);
    }
    process.exit(1);
  }

  logger.info('Main', `Memory directory: ${config.repoDir}`);
  logger.info('Main', config.remoteUrl ? `Git remote: ${config.remoteUrl}` : 'No git remote configured');

  const syncManager = await SyncManager.create(config, {
    telemetry: config.logLevel === 'debug' ? new LoggingTelemetry() : undefined,
  });
  const memoryService = new MemoryService(config, syncManager);
  const memorySyncServer = new MemorySyncServer(memoryService, syncManager);

  const transport = new StdioServerTransport();
  await memorySyncServer.getServer().connect(transport);

  logger.info('Main', 'Memory Sync MCP Server running on stdio');

  // Let queued and background syncs finish before exiting
  const shutdown = (signal: string) => {
    logger.info('Main', `Received ${signal}, waiting for pending syncs...`);
    syncManager.whenIdle().then(
      () => process.exit(0),
      error => {
        logger.error('Main', 'Error while waiting for pending syncs', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  logger.error('Main', 'Fatal error', error);
  process.exit(1);
});
