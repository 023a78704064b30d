/**
 * Piston DOE MCP server
 *
 * 9 tools across 5 groups
 * - setup: verify_base_folder, stage_zscalar_input
 * - parameters: extract_geometry, parse_scale_factors, preview_variants
 * - synthesis: synthesize_variants
 * - batch: copy_piston_pr, run_batch
 * - log: server_log
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext } from './tools/common.js';
import { registerSetupTools } from './tools/setup.js';
import { registerParameterTools } from './tools/parameters.js';
import { registerSynthesisTools } from './tools/synthesis.js';
import { registerBatchTools } from './tools/batch.js';
import { registerLogTools } from './tools/log.js';

export type { ToolContext } from './tools/common.js';

export const SERVER_NAME = 'piston-doe';
export const SERVER_VERSION = '0.1.0';

export function createDoeServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerSetupTools(server, context);
  registerParameterTools(server, context);
  registerSynthesisTools(server, context);
  registerBatchTools(server, context);
  registerLogTools(server, context);

  return server;
}
