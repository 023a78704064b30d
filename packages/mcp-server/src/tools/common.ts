import path from 'path';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage, type DoeConfig, type EventLog } from '@piston-doe/core';

/** What every tool group needs from the running server */
export interface ToolContext {
  getConfig: () => DoeConfig;
  log: EventLog;
}

export function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function failureResult(error: unknown): CallToolResult {
  return jsonResult({ success: false, message: errorMessage(error) });
}

/** Base folder from the tool argument, else the configured one */
export function resolveBaseFolder(context: ToolContext, baseFolder?: string): string {
  return path.resolve(baseFolder ?? context.getConfig().baseFolder);
}

/** Resolve a user-supplied path against the base folder */
export function resolveInBase(base: string, target: string | undefined, fallback: string): string {
  return target ? path.resolve(base, target) : fallback;
}
