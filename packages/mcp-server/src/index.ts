#!/usr/bin/env node
/**
 * Piston DOE MCP server - stdio entry point
 *
 * Configuration comes from DOE_* environment variables (see loadDoeConfig).
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createEventLog, loadDoeConfig } from '@piston-doe/core';
import { SERVER_VERSION, createDoeServer } from './server.js';

// ============================================================================
// Configuration
// ============================================================================

const log = createEventLog();
const { config, warnings } = loadDoeConfig();

for (const warning of warnings) {
  log.emit({ component: 'config', level: 'warn', message: warning });
}

const server = createDoeServer({ getConfig: () => config, log });

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  log.emit({ component: 'server', level: 'info', message: `Starting piston-doe MCP server ${SERVER_VERSION}` });
  log.emit({
    component: 'server',
    level: 'info',
    message: `Base folder: ${config.baseFolder}, rescale mode: ${config.rescaleMode}`,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.emit({ component: 'server', level: 'info', message: 'MCP server connected' });
}

main().catch((error: unknown) => {
  log.emit({
    component: 'server',
    level: 'error',
    message: `Fatal: ${error instanceof Error ? error.message : String(error)}`,
  });
  process.exit(1);
});
