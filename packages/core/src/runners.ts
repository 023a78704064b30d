/**
 * Rescale runners
 *
 * One interface, two ways to run the same rescale algorithm:
 * - in-process: call rescaleMesh directly
 * - isolated: run the rescale worker in a child Node process, killed after
 *   a timeout
 */

import { spawn } from 'child_process';
import path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_RESCALE_TIMEOUT_MS, RESCALE_SCRIPT_NAME } from './constants.js';
import { MissingInputError, errorMessage } from './errors.js';
import { silentSink, type EventSink } from './events.js';
import { rescaleMesh } from './meshRescaler.js';
import { isFile } from './textFile.js';
import type { BatchStatus } from './types.js';

export type RescaleMode = 'in-process' | 'isolated';

export interface RescaleTask {
  variant: string;
  variantDir: string;
  configFile: string;
}

export interface RescaleRunner {
  readonly mode: RescaleMode;
  run(task: RescaleTask): Promise<BatchStatus>;
}

/** Keep this many characters of a failed worker's stderr */
const STDERR_TAIL = 2000;

export function createInProcessRunner(sink: EventSink = silentSink): RescaleRunner {
  return {
    mode: 'in-process',
    async run(task) {
      try {
        const outcome = await rescaleMesh(task.configFile, { sink });
        return outcome.success
          ? { status: 'success' }
          : { status: 'failed', detail: outcome.error ?? 'rescale failed' };
      } catch (error) {
        return { status: 'error', detail: errorMessage(error) };
      }
    },
  };
}

export interface ScriptSearchOptions {
  /** Explicit script path; when set, nothing else is searched */
  override?: string;
  baseFolder?: string;
  cwd?: string;
}

/**
 * Candidate locations for the rescale worker, in priority order.
 *
 * Beside this module comes first. Loaded from src/, that is the TypeScript
 * entry, which plain node cannot run, so the package's dist/ build follows.
 */
export function rescaleScriptCandidates(options: ScriptSearchOptions = {}): string[] {
  if (options.override) {
    return [path.resolve(options.override)];
  }
  const candidates = [
    fileURLToPath(new URL(`./cli/${RESCALE_SCRIPT_NAME}`, import.meta.url)),
    fileURLToPath(new URL(`../dist/cli/${RESCALE_SCRIPT_NAME}`, import.meta.url)),
  ];
  if (options.baseFolder) {
    candidates.push(path.resolve(options.baseFolder, RESCALE_SCRIPT_NAME));
  }
  candidates.push(path.resolve(options.cwd ?? process.cwd(), RESCALE_SCRIPT_NAME));
  return [...new Set(candidates)];
}

/**
 * First existing rescale worker script.
 *
 * @throws MissingInputError listing every searched location
 */
export async function resolveRescaleScript(options: ScriptSearchOptions = {}): Promise<string> {
  const candidates = rescaleScriptCandidates(options);
  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  throw new MissingInputError(
    'Rescale script',
    candidates[0],
    `searched: ${candidates.join(', ')}`
  );
}

export interface IsolatedRunnerOptions {
  scriptPath: string;
  timeoutMs?: number;
  /** Executable that runs the script (default: this Node binary) */
  command?: string;
  sink?: EventSink;
}

export function createIsolatedRunner(options: IsolatedRunnerOptions): RescaleRunner {
  const {
    scriptPath,
    timeoutMs = DEFAULT_RESCALE_TIMEOUT_MS,
    command = process.execPath,
    sink = silentSink,
  } = options;

  return {
    mode: 'isolated',
    run(task) {
      return new Promise<BatchStatus>((resolve) => {
        let stderr = '';
        let timedOut = false;
        let settled = false;
        let killTimer: NodeJS.Timeout | undefined;

        const finish = (status: BatchStatus) => {
          if (settled) return;
          settled = true;
          clearTimeout(killTimer);
          resolve(status);
        };

        const child = spawn(command, [scriptPath, task.configFile], {
          cwd: task.variantDir,
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        killTimer = setTimeout(() => {
          timedOut = true;
          sink.emit({
            component: 'batch',
            level: 'warn',
            message: `${task.variant}: rescale exceeded ${timeoutMs}ms, terminating`,
          });
          child.kill('SIGKILL');
        }, timeoutMs);

        child.stdout.on('data', (chunk: Buffer) => {
          const text = chunk.toString('utf-8').trim();
          if (text) {
            sink.emit({ component: 'rescale', level: 'info', message: `${task.variant}: ${text}` });
          }
        });

        child.stderr.on('data', (chunk: Buffer) => {
          stderr = (stderr + chunk.toString('utf-8')).slice(-STDERR_TAIL);
        });

        child.on('error', (error) => {
          finish({ status: 'error', detail: `failed to start rescale worker: ${error.message}` });
        });

        child.on('close', (code, signal) => {
          if (timedOut) {
            finish({ status: 'timeout', detail: `exceeded ${timeoutMs}ms` });
          } else if (code === 0) {
            finish({ status: 'success' });
          } else {
            const reason = code === null ? `signal ${signal}` : `exit code ${code}`;
            const tail = stderr.trim();
            finish({ status: 'failed', detail: tail ? `${reason}: ${tail}` : reason });
          }
        });
      });
    },
  };
}
