/**
 * Parameter tools - base geometry, scale factors and the dry-run preview
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  GEOMETRY_FILE,
  ParseFailureError,
  baseFolderPaths,
  formatDerived,
  formatParameterTable,
  missingParameters,
  parseScaleTable,
  planVariants,
  readGeometryParameters,
  readScaleTable,
  requireCompleteParameters,
  type ScaleTable,
} from '@piston-doe/core';
import { failureResult, jsonResult, resolveBaseFolder, resolveInBase, type ToolContext } from './common.js';

export const ScaleSourceArgs = {
  scales: z.array(z.number()).optional().describe('Scale factors in mm, in sweep order'),
  table_file: z.string().optional().describe('Scale-factor table (header row, first column), relative to the base folder'),
};

export const Lz0DirectionArg = z.enum(['add', 'subtract']).optional()
  .describe('Whether the scale is added to or subtracted from lZ0 (default: DOE_LZ0_DIRECTION or add)');

/**
 * Scales from an inline list, else from a table file.
 *
 * @throws ParseFailureError when neither is given
 */
export async function loadScales(base: string, args: { scales?: number[]; table_file?: string }): Promise<ScaleTable> {
  if (args.scales) {
    return { scales: args.scales, warnings: [] };
  }
  if (args.table_file) {
    return await readScaleTable(resolveInBase(base, args.table_file, base));
  }
  throw new ParseFailureError('scales', 'Provide scales or table_file');
}

export function registerParameterTools(server: McpServer, context: ToolContext): void {
  // ========================================
  // Tool: extract_geometry
  // ========================================
  server.tool(
    'extract_geometry',
    'Read the tracked parameters (lK, lZ0, lKG, lSK) from the base geometry file',
    {
      base_folder: z.string().optional().describe('Base folder (default: DOE_BASE_FOLDER or the working directory)'),
      geometry_file: z.string().optional().describe(`Geometry file relative to the base folder (default: ${GEOMETRY_FILE})`),
    },
    async ({ base_folder, geometry_file }) => {
      try {
        const base = resolveBaseFolder(context, base_folder);
        const file = resolveInBase(base, geometry_file, baseFolderPaths(base).geometryFile);
        const parameters = await readGeometryParameters(file);
        const missing = missingParameters(parameters);

        context.log.emit({
          component: 'geometry',
          level: missing.length === 0 ? 'info' : 'warn',
          message: `Base parameters from ${file}:\n${formatParameterTable(parameters)}`,
        });

        return jsonResult({
          success: missing.length === 0,
          geometry_file: file,
          parameters,
          missing,
          table: formatParameterTable(parameters),
        });
      } catch (error) {
        return failureResult(error);
      }
    }
  );

  // ========================================
  // Tool: parse_scale_factors
  // ========================================
  server.tool(
    'parse_scale_factors',
    'Parse a scale-factor table: the first row is a header, the first column of every other row is a scale in mm. Rows that do not convert are reported and skipped.',
    {
      base_folder: z.string().optional().describe('Base folder for a relative table_file'),
      table_file: z.string().optional().describe('Table file relative to the base folder'),
      text: z.string().optional().describe('Table content given inline instead of a file'),
    },
    async ({ base_folder, table_file, text }) => {
      try {
        let table: ScaleTable;
        let source: string;
        if (text !== undefined) {
          table = parseScaleTable(text);
          source = 'inline';
        } else if (table_file) {
          source = resolveInBase(resolveBaseFolder(context, base_folder), table_file, table_file);
          table = await readScaleTable(source);
        } else {
          return jsonResult({ success: false, message: 'Provide table_file or text' });
        }

        for (const warning of table.warnings) {
          context.log.emit({ component: 'scales', level: 'warn', message: `Row ${warning.row}: ${warning.reason}` });
        }

        return jsonResult({
          success: true,
          source,
          count: table.scales.length,
          scales: table.scales,
          warnings: table.warnings,
        });
      } catch (error) {
        return failureResult(error);
      }
    }
  );

  // ========================================
  // Tool: preview_variants
  // ========================================
  server.tool(
    'preview_variants',
    'Dry run: list the variant folders and derived parameters a sweep would produce, without touching the disk. Flags scales that truncate to the same folder name.',
    {
      base_folder: z.string().optional().describe('Base folder (default: DOE_BASE_FOLDER or the working directory)'),
      ...ScaleSourceArgs,
      lz0_direction: Lz0DirectionArg,
    },
    async ({ base_folder, scales, table_file, lz0_direction }) => {
      try {
        const base = resolveBaseFolder(context, base_folder);
        const geometry = requireCompleteParameters(await readGeometryParameters(baseFolderPaths(base).geometryFile));
        const table = await loadScales(base, { scales, table_file });
        const plans = planVariants(geometry, table.scales, {
          lz0Direction: lz0_direction ?? context.getConfig().lz0Direction,
        });

        return jsonResult({
          success: true,
          base: geometry,
          variants: plans.map(plan => ({
            scale: plan.scale,
            name: plan.name,
            scaled: plan.parameters.scaled,
            display: formatDerived(plan.parameters),
            ...(plan.overwrites !== undefined ? { overwrites: plan.overwrites } : {}),
          })),
          warnings: table.warnings,
        });
      } catch (error) {
        return failureResult(error);
      }
    }
  );
}
