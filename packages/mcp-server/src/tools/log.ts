/**
 * server_log - query the in-memory event buffer
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { jsonResult, type ToolContext } from './common.js';

export function registerLogTools(server: McpServer, context: ToolContext): void {
  server.tool(
    'server_log',
    'Recent pipeline events (startup, synthesis, batch progress, warnings). Newest entries last.',
    {
      since: z.number().optional().describe('Only events after this epoch-ms timestamp'),
      component: z.string().optional().describe('Filter by component, e.g. synthesis, batch, rescale'),
      level: z.enum(['info', 'warn', 'error']).optional().describe('Filter by level'),
      limit: z.number().int().positive().default(50).describe('Maximum entries to return'),
    },
    async ({ since, component, level, limit }) => {
      const { entries, uptime_ms } = context.log.query({ since, component, level, limit });
      return jsonResult({ count: entries.length, server_uptime_ms: uptime_ms, entries });
    }
  );
}
