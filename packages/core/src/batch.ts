/**
 * Batch coordination over synthesized variants
 *
 * Features:
 * - Discovery of variant folders in stable (lexicographic) order
 * - Worker pool: N variants in flight, a free worker takes the next one
 * - Progress reporting
 * - Error isolation (one bad variant doesn't break the batch)
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  SCALAR_CONFIG_FILE,
  VARIANT_PREFIX,
  WORKING_SUBFOLDER,
} from './constants.js';
import { errorMessage } from './errors.js';
import { silentSink, type EventSink } from './events.js';
import {
  createInProcessRunner,
  createIsolatedRunner,
  resolveRescaleScript,
  type RescaleMode,
  type RescaleRunner,
} from './runners.js';
import { isDirectory, isFile } from './textFile.js';
import type {
  BatchResult,
  BatchStatus,
  BatchVariantResult,
  CopyReport,
  CopyResult,
} from './types.js';

/** Yield interval - process this many variants then yield to event loop */
const YIELD_INTERVAL = 10;

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

export interface VariantFolder {
  name: string;
  path: string;
}

/**
 * Variant folders directly under the simulation root, sorted by name.
 */
export async function discoverVariants(
  simulationRoot: string,
  prefix: string = VARIANT_PREFIX
): Promise<VariantFolder[]> {
  const entries = await fs.readdir(simulationRoot, { withFileTypes: true });
  return entries
    .filter(entry => entry.isDirectory() && entry.name.startsWith(prefix))
    .map(entry => entry.name)
    .sort()
    .map(name => ({ name, path: path.join(simulationRoot, name) }));
}

type Preconditions =
  | { ok: true; variants: VariantFolder[] }
  | { ok: false; message: string };

async function checkPreconditions(simulationRoot: string, prefix: string): Promise<Preconditions> {
  if (!(await isDirectory(simulationRoot))) {
    return { ok: false, message: `Simulation folder not found: ${simulationRoot}` };
  }
  const variants = await discoverVariants(simulationRoot, prefix);
  if (variants.length === 0) {
    return { ok: false, message: `No ${prefix}* folders found in: ${simulationRoot}` };
  }
  return { ok: true, variants };
}

export interface BatchOptions {
  /** How rescale tasks run (default: 'in-process') */
  mode?: RescaleMode;
  /** Pre-built runner; overrides mode and the script options */
  runner?: RescaleRunner;
  /** Maximum variants in flight (default: available parallelism) */
  concurrency?: number;
  /** Isolated mode only */
  timeoutMs?: number;
  /** Isolated mode only: explicit rescale worker path */
  scriptPath?: string;
  /** Isolated mode only: searched for the rescale worker */
  baseFolder?: string;
  variantPrefix?: string;
  sink?: EventSink;
  onProgress?: (processed: number, total: number) => void;
}

function emptyResult(ok: boolean, message: string, startTime: number): BatchResult {
  return {
    ok,
    message,
    total: 0,
    successful: 0,
    failed: 0,
    skipped: 0,
    timedOut: 0,
    results: [],
    durationMs: Date.now() - startTime,
  };
}

async function buildRunner(options: BatchOptions, sink: EventSink): Promise<RescaleRunner> {
  if (options.runner) {
    return options.runner;
  }
  if (options.mode === 'isolated') {
    const scriptPath = await resolveRescaleScript({
      override: options.scriptPath,
      baseFolder: options.baseFolder,
    });
    sink.emit({ component: 'batch', level: 'info', message: `Using rescale worker at ${scriptPath}` });
    return createIsolatedRunner({ scriptPath, timeoutMs: options.timeoutMs, sink });
  }
  return createInProcessRunner(sink);
}

async function runVariant(
  variant: VariantFolder,
  runner: RescaleRunner,
  sink: EventSink
): Promise<BatchVariantResult> {
  const startTime = Date.now();
  const configFile = path.join(variant.path, SCALAR_CONFIG_FILE);

  let outcome: BatchStatus;
  if (!(await isFile(configFile))) {
    outcome = { status: 'skipped', detail: `no ${SCALAR_CONFIG_FILE}` };
    sink.emit({ component: 'batch', level: 'warn', message: `${variant.name}: ${SCALAR_CONFIG_FILE} not found, skipping` });
  } else {
    sink.emit({ component: 'batch', level: 'info', message: `Processing ${variant.name}` });
    outcome = await runner.run({ variant: variant.name, variantDir: variant.path, configFile });
  }

  return { variant: variant.name, path: variant.path, outcome, durationMs: Date.now() - startTime };
}

/**
 * Rescale the mesh of every variant under the simulation root.
 *
 * Only global preconditions (missing root, no variants, no worker script in
 * isolated mode) stop the run; per-variant problems are recorded.
 */
export async function runBatch(simulationRoot: string, options: BatchOptions = {}): Promise<BatchResult> {
  const sink = options.sink ?? silentSink;
  const prefix = options.variantPrefix ?? VARIANT_PREFIX;
  const concurrency = Math.max(1, options.concurrency ?? defaultConcurrency());
  const startTime = Date.now();

  const pre = await checkPreconditions(simulationRoot, prefix);
  if (!pre.ok) {
    sink.emit({ component: 'batch', level: 'error', message: pre.message });
    return emptyResult(false, pre.message, startTime);
  }

  let runner: RescaleRunner;
  try {
    runner = await buildRunner(options, sink);
  } catch (error) {
    const message = errorMessage(error);
    sink.emit({ component: 'batch', level: 'error', message });
    return emptyResult(false, message, startTime);
  }

  const variants = pre.variants;
  const total = variants.length;
  const results: BatchVariantResult[] = new Array<BatchVariantResult>(total);
  let nextIndex = 0;
  let processed = 0;

  sink.emit({
    component: 'batch',
    level: 'info',
    message: `Processing ${total} variant(s), ${runner.mode}, concurrency ${concurrency}`,
  });

  // Each worker pulls the next variant as soon as its previous one settles
  const worker = async (): Promise<void> => {
    while (nextIndex < total) {
      const index = nextIndex++;
      const variant = variants[index];
      try {
        results[index] = await runVariant(variant, runner, sink);
      } catch (error) {
        results[index] = {
          variant: variant.name,
          path: variant.path,
          outcome: { status: 'error', detail: errorMessage(error) },
          durationMs: 0,
        };
      }

      processed++;
      options.onProgress?.(processed, total);

      if (processed % YIELD_INTERVAL === 0 && processed < total) {
        await new Promise(resolve => setImmediate(resolve));
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));

  const count = (status: BatchStatus['status']) =>
    results.filter(r => r.outcome.status === status).length;
  const successful = count('success');
  const skipped = count('skipped');
  const timedOut = count('timeout');
  const failed = total - successful - skipped - timedOut;

  const message = `Processed ${total} variant(s): ${successful} succeeded, ${failed} failed, ${skipped} skipped, ${timedOut} timed out`;
  sink.emit({
    component: 'batch',
    level: successful === total ? 'info' : 'warn',
    message,
    data: { total, successful, failed, skipped, timedOut },
  });

  return {
    ok: true,
    message,
    total,
    successful,
    failed,
    skipped,
    timedOut,
    results,
    durationMs: Date.now() - startTime,
  };
}

export interface CopyOptions {
  variantPrefix?: string;
  workingSubfolder?: string;
  sink?: EventSink;
}

/**
 * Copy the auxiliary input file into every variant's working subfolder,
 * creating the subfolder where it is missing.
 */
export async function copyPistonPrFiles(
  simulationRoot: string,
  sourceFile: string,
  options: CopyOptions = {}
): Promise<CopyReport> {
  const sink = options.sink ?? silentSink;
  const prefix = options.variantPrefix ?? VARIANT_PREFIX;
  const workingSubfolder = options.workingSubfolder ?? WORKING_SUBFOLDER;

  const fail = (message: string): CopyReport => {
    sink.emit({ component: 'copy', level: 'error', message });
    return { ok: false, message, copied: 0, failed: 0, results: [] };
  };

  if (!(await isFile(sourceFile))) {
    return fail(`Auxiliary input file not found: ${sourceFile}`);
  }
  const pre = await checkPreconditions(simulationRoot, prefix);
  if (!pre.ok) {
    return fail(pre.message);
  }

  const fileName = path.basename(sourceFile);
  const results = await Promise.all(pre.variants.map(async (variant): Promise<CopyResult> => {
    const workingDir = path.join(variant.path, workingSubfolder);
    const destination = path.join(workingDir, fileName);
    let createdWorkingDir = false;
    try {
      if (!(await isDirectory(workingDir))) {
        sink.emit({ component: 'copy', level: 'warn', message: `${variant.name}: creating missing ${workingSubfolder}/` });
        await fs.mkdir(workingDir, { recursive: true });
        createdWorkingDir = true;
      }
      await fs.copyFile(sourceFile, destination);
      sink.emit({ component: 'copy', level: 'info', message: `Copied to ${variant.name}/${workingSubfolder}/` });
      return { variant: variant.name, destination, status: 'copied', createdWorkingDir };
    } catch (error) {
      const detail = errorMessage(error);
      sink.emit({ component: 'copy', level: 'error', message: `${variant.name}: copy failed: ${detail}` });
      return { variant: variant.name, destination, status: 'failed', createdWorkingDir, error: detail };
    }
  }));

  const copied = results.filter(r => r.status === 'copied').length;
  const message = `Copied ${fileName} to ${copied}/${results.length} variant(s)`;
  sink.emit({ component: 'copy', level: copied === results.length ? 'info' : 'warn', message });

  return { ok: true, message, copied, failed: results.length - copied, results };
}
