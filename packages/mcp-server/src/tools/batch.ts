/**
 * Batch tools - auxiliary-file fan-out and the parallel rescale run
 */

import path from 'path';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  RescaleModeSchema,
  baseFolderPaths,
  copyPistonPrFiles,
  runBatch,
  timeOperation,
} from '@piston-doe/core';
import { failureResult, jsonResult, resolveBaseFolder, resolveInBase, type ToolContext } from './common.js';

export function registerBatchTools(server: McpServer, context: ToolContext): void {
  // ========================================
  // Tool: copy_piston_pr
  // ========================================
  server.tool(
    'copy_piston_pr',
    'Copy INP/piston_pr.inp into the IM_piston working folder of every IM_scaled_piston_* variant, creating missing working folders',
    {
      base_folder: z.string().optional().describe('Base folder (default: DOE_BASE_FOLDER or the working directory)'),
      source_file: z.string().optional().describe('File to copy, relative to the base folder (default: INP/piston_pr.inp)'),
      simulation_root: z.string().optional().describe('Folder holding the variants, relative to the base folder (default: simulation/)'),
    },
    async ({ base_folder, source_file, simulation_root }) => {
      try {
        const base = resolveBaseFolder(context, base_folder);
        const paths = baseFolderPaths(base);
        const report = await copyPistonPrFiles(
          resolveInBase(base, simulation_root, paths.simulation),
          resolveInBase(base, source_file, paths.auxInputFile),
          { sink: context.log }
        );
        return jsonResult({ success: report.ok && report.failed === 0, ...report });
      } catch (error) {
        return failureResult(error);
      }
    }
  );

  // ========================================
  // Tool: run_batch
  // ========================================
  server.tool(
    'run_batch',
    'Rescale the mesh of every IM_scaled_piston_* variant in parallel. Variants without scalar.txt are skipped; failures and timeouts are reported per variant. Isolated mode runs the built piston-rescale worker (dist/cli/rescale.js, from npm run build) unless DOE_RESCALE_SCRIPT names another.',
    {
      base_folder: z.string().optional().describe('Base folder (default: DOE_BASE_FOLDER or the working directory)'),
      simulation_root: z.string().optional().describe('Folder holding the variants, relative to the base folder (default: simulation/)'),
      mode: RescaleModeSchema.optional().describe('in-process, or isolated (one worker process per variant with a timeout)'),
      max_workers: z.number().int().positive().optional().describe('Variants in flight at once (default: DOE_MAX_WORKERS or available parallelism)'),
      timeout_ms: z.number().int().positive().optional().describe('Isolated mode: per-variant timeout (default: DOE_RESCALE_TIMEOUT_MS)'),
    },
    async ({ base_folder, simulation_root, mode, max_workers, timeout_ms }) => {
      try {
        const config = context.getConfig();
        const base = resolveBaseFolder(context, base_folder);
        const root = resolveInBase(base, simulation_root, baseFolderPaths(base).simulation);

        const result = await timeOperation(
          context.log,
          'batch',
          'run_batch',
          () => runBatch(root, {
            mode: mode ?? config.rescaleMode,
            concurrency: max_workers ?? config.maxWorkers,
            timeoutMs: timeout_ms ?? config.rescaleTimeoutMs,
            scriptPath: config.rescaleScript,
            baseFolder: base,
            sink: context.log,
          }),
          (r) => ({ success: r.ok && r.successful === r.total, data: { total: r.total, successful: r.successful } })
        );

        return jsonResult({
          success: result.ok && result.failed === 0 && result.timedOut === 0,
          message: result.message,
          simulation_root: root,
          total: result.total,
          successful: result.successful,
          failed: result.failed,
          skipped: result.skipped,
          timed_out: result.timedOut,
          results: result.results.map(r => ({
            variant: r.variant,
            path: path.relative(base, r.path),
            status: r.outcome.status,
            ...(r.outcome.status !== 'success' ? { detail: r.outcome.detail } : {}),
            duration_ms: r.durationMs,
          })),
          duration_ms: result.durationMs,
        });
      } catch (error) {
        return failureResult(error);
      }
    }
  );
}
