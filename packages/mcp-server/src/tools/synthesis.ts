/**
 * Variant synthesis tool
 */

import path from 'path';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  GEOMETRY_PARAMETERS,
  baseFolderPaths,
  readGeometryParameters,
  synthesizeVariants,
  timeOperation,
} from '@piston-doe/core';
import { failureResult, jsonResult, resolveBaseFolder, type ToolContext } from './common.js';
import { Lz0DirectionArg, ScaleSourceArgs, loadScales } from './parameters.js';

export function registerSynthesisTools(server: McpServer, context: ToolContext): void {
  // ========================================
  // Tool: synthesize_variants
  // ========================================
  server.tool(
    'synthesize_variants',
    'Create one IM_scaled_piston_<n> folder per scale factor: scalar.txt, the IM_piston working folder, and a replica of every T* sub-case with scaled geometry and the solver options pointed at the working folder. Re-running replaces earlier output.',
    {
      base_folder: z.string().optional().describe('Base folder (default: DOE_BASE_FOLDER or the working directory)'),
      ...ScaleSourceArgs,
      output_root: z.string().optional().describe('Where variant folders go, relative to the base folder (default: simulation/)'),
      tracked_parameter: z.enum(GEOMETRY_PARAMETERS).optional().describe('Parameter written to line 4 of scalar.txt (default: lK)'),
      lz0_direction: Lz0DirectionArg,
    },
    async ({ base_folder, scales, table_file, output_root, tracked_parameter, lz0_direction }) => {
      try {
        const base = resolveBaseFolder(context, base_folder);
        const paths = baseFolderPaths(base);
        const table = await loadScales(base, { scales, table_file });
        const baseParams = await readGeometryParameters(paths.geometryFile);

        const report = await timeOperation(
          context.log,
          'synthesis',
          'synthesize_variants',
          () => synthesizeVariants(
            {
              templateSimulationDir: paths.simulation,
              zscalarTemplateFile: paths.scalarTemplate,
              geometryFile: paths.geometryFile,
              scales: table.scales,
              baseParams,
              outputRoot: output_root ? path.resolve(base, output_root) : undefined,
            },
            {
              trackedParameter: tracked_parameter,
              lz0Direction: lz0_direction ?? context.getConfig().lz0Direction,
              sink: context.log,
            }
          ),
          (r) => ({ success: r.failed === 0, data: { created: r.created, failed: r.failed } })
        );

        return jsonResult({
          success: report.failed === 0,
          message: `Created ${report.created}/${report.total} variant(s)`,
          total: report.total,
          created: report.created,
          failed: report.failed,
          variants: report.variants.map(v => ({
            scale: v.scale,
            name: v.name,
            path: v.path,
            status: v.status,
            sub_cases: v.subCases,
            solver_options_updated: v.solverOptionsUpdated,
            ...(v.overwrites !== undefined ? { overwrites: v.overwrites } : {}),
            ...(v.error ? { error: v.error } : {}),
          })),
          warnings: table.warnings,
          duration_ms: report.durationMs,
        });
      } catch (error) {
        return failureResult(error);
      }
    }
  );
}
