/**
 * Base folder tools - layout check and Zscalar staging
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { stageZscalarInput, timeOperation, verifyBaseFolder } from '@piston-doe/core';
import { failureResult, jsonResult, resolveBaseFolder, type ToolContext } from './common.js';

const BaseFolderArg = z.string().optional().describe('Base folder (default: DOE_BASE_FOLDER or the working directory)');

export function registerSetupTools(server: McpServer, context: ToolContext): void {
  // ========================================
  // Tool: verify_base_folder
  // ========================================
  server.tool(
    'verify_base_folder',
    'Check that the base folder holds INP/, simulation/, influgen/, Zscalar/, geometry.txt and INP/piston_pr.inp, and list the template sub-cases',
    {
      base_folder: BaseFolderArg,
    },
    async ({ base_folder }) => {
      try {
        const base = resolveBaseFolder(context, base_folder);
        const status = await timeOperation(
          context.log,
          'setup',
          'verify_base_folder',
          () => verifyBaseFolder(base, context.log),
          (s) => ({ success: s.critical })
        );
        return jsonResult({
          success: status.critical,
          base_folder: base,
          items: status.items,
          sub_cases: status.subCases,
        });
      } catch (error) {
        return failureResult(error);
      }
    }
  );

  // ========================================
  // Tool: stage_zscalar_input
  // ========================================
  server.tool(
    'stage_zscalar_input',
    'Copy INP/piston_pr.inp into Zscalar/ so the scalar-config template can reference it. An existing copy is kept unless overwrite is true.',
    {
      base_folder: BaseFolderArg,
      overwrite: z.boolean().default(false).describe('Replace an existing Zscalar/piston_pr.inp'),
    },
    async ({ base_folder, overwrite }) => {
      try {
        const base = resolveBaseFolder(context, base_folder);
        const result = await stageZscalarInput(base, { overwrite, sink: context.log });
        return jsonResult({ success: result.status !== 'failed', ...result });
      } catch (error) {
        return failureResult(error);
      }
    }
  );
}
