#!/usr/bin/env node
/**
 * piston-rescale <scalar-config-file>
 *
 * Runs one mesh rescale; exit code 0 on success, 1 on failure.
 * The isolated batch runner starts one of these per variant.
 */

import { runRescaleWorker } from '../worker.js';

runRescaleWorker(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[piston-doe] Rescale worker crashed: ${error}`);
    process.exitCode = 1;
  }
);
