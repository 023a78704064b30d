/**
 * Mesh Z-rescaling
 *
 * Rewrites a structured mesh/input file with the Z coordinate of every node
 * record remapped by a 3-segment piecewise-linear function. Only node-block
 * lines that parse as `id, x, y, z` change; every other byte is copied.
 */

import { createReadStream, createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';
import { errorMessage } from './errors.js';
import { silentSink, type EventSink } from './events.js';
import { readRescaleConfig } from './scalarConfig.js';
import { parseNumericCell } from './scaleTable.js';
import type { MeshNodeRecord, RescaleOutcome, ZBreakpoints } from './types.js';

/** Opens a node block: `*NODE` alone or followed by parameters */
const NODE_KEYWORD = /^\*node\s*(?:,|$)/i;

const ID_WIDTH = 10;
const COORD_WIDTH = 20;
const COORD_DIGITS = 13;

/**
 *   z <= z1        -> z
 *   z1 < z <= z2   -> z1new + (z - z1) * (z2new - z1new) / (z2 - z1)
 *   z > z2         -> z + (z2new - z2)
 */
export function rescaleZ(z: number, { z1, z1new, z2, z2new }: ZBreakpoints): number {
  if (z <= z1) {
    return z;
  }
  if (z <= z2) {
    if (z2 === z1) {
      return z1new;
    }
    return z1new + (z - z1) * (z2new - z1new) / (z2 - z1);
  }
  return z + (z2new - z2);
}

/**
 * Fixed-width exponential notation, like printf's `%20.13E`:
 * upper-case E and at least two exponent digits.
 */
export function formatExponential(value: number, width = COORD_WIDTH, digits = COORD_DIGITS): string {
  if (!Number.isFinite(value)) {
    const text = Number.isNaN(value) ? 'NAN' : value > 0 ? 'INF' : '-INF';
    return text.padStart(width);
  }
  const [mantissa, exponent] = Math.abs(value).toExponential(digits).split('e');
  const exp = Number(exponent);
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const expText = `${exp < 0 ? '-' : '+'}${String(Math.abs(exp)).padStart(2, '0')}`;
  return `${sign}${mantissa}E${expText}`.padStart(width);
}

export function parseNodeLine(line: string): MeshNodeRecord | null {
  const parts = line.trim().split(',').map(p => p.trim());
  if (parts.length !== 4) {
    return null;
  }
  const x = parseNumericCell(parts[1]);
  const y = parseNumericCell(parts[2]);
  const z = parseNumericCell(parts[3]);
  if (x === null || y === null || z === null) {
    return null;
  }
  return { id: parts[0], x, y, z };
}

export function formatNodeRecord(node: MeshNodeRecord): string {
  return [
    node.id.padEnd(ID_WIDTH),
    formatExponential(node.x),
    formatExponential(node.y),
    formatExponential(node.z),
  ].join(', ');
}

/**
 * Transform one node-block line (without terminator).
 * Returns null when the line is not a 4-field numeric record.
 */
export function transformNodeLine(line: string, breakpoints: ZBreakpoints): string | null {
  const node = parseNodeLine(line);
  if (!node) {
    return null;
  }
  return formatNodeRecord({ ...node, z: rescaleZ(node.z, breakpoints) });
}

/**
 * Yield lines with their terminators from a stream of string chunks.
 */
export async function* readLines(chunks: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  let pending = '';
  for await (const chunk of chunks) {
    pending += typeof chunk === 'string' ? chunk : chunk.toString('latin1');
    let start = 0;
    let nl = pending.indexOf('\n', start);
    while (nl !== -1) {
      yield pending.slice(start, nl + 1);
      start = nl + 1;
      nl = pending.indexOf('\n', start);
    }
    pending = pending.slice(start);
  }
  if (pending) {
    yield pending;
  }
}

interface TransformCounters {
  nodesTransformed: number;
  malformedLines: number;
}

/**
 * Line-level rescale of a whole mesh, as a streaming transform.
 */
export function createMeshTransform(breakpoints: ZBreakpoints, counters: TransformCounters) {
  return async function* (source: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
    let inNodeBlock = false;

    for await (const line of readLines(source)) {
      const eolLength = line.endsWith('\r\n') ? 2 : line.endsWith('\n') ? 1 : 0;
      const text = line.slice(0, line.length - eolLength);
      const stripped = text.trim();

      if (NODE_KEYWORD.test(stripped)) {
        inNodeBlock = true;
        yield line;
        continue;
      }
      if (inNodeBlock && stripped.startsWith('*')) {
        inNodeBlock = false;
      }

      if (inNodeBlock && stripped) {
        const rewritten = transformNodeLine(text, breakpoints);
        if (rewritten === null) {
          counters.malformedLines++;
          yield line;
        } else {
          counters.nodesTransformed++;
          yield rewritten + line.slice(line.length - eolLength);
        }
        continue;
      }

      yield line;
    }
  };
}

export interface RescaleOptions {
  sink?: EventSink;
}

/**
 * Rescale the mesh described by a scalar-config file.
 *
 * Never throws: every failure is logged and returned as success=false.
 */
export async function rescaleMesh(configFile: string, options: RescaleOptions = {}): Promise<RescaleOutcome> {
  const sink = options.sink ?? silentSink;
  const startTime = Date.now();
  const counters: TransformCounters = { nodesTransformed: 0, malformedLines: 0 };

  try {
    const config = await readRescaleConfig(configFile);
    if (path.resolve(config.source) === path.resolve(config.destination)) {
      throw new Error(`Source and destination are the same file: ${config.source}`);
    }

    await fs.mkdir(path.dirname(config.destination), { recursive: true });
    // latin1 maps every byte to one char, so untouched lines round-trip exactly
    await pipeline(
      createReadStream(config.source, { encoding: 'latin1' }),
      createMeshTransform(config, counters),
      createWriteStream(config.destination, { encoding: 'latin1' })
    );

    const outcome: RescaleOutcome = {
      success: true,
      configFile,
      destination: config.destination,
      ...counters,
      durationMs: Date.now() - startTime,
    };
    sink.emit({
      component: 'rescale',
      level: 'info',
      message: `Rescaled ${counters.nodesTransformed} node(s) into ${config.destination}`,
      data: { ...outcome },
    });
    return outcome;
  } catch (error) {
    const outcome: RescaleOutcome = {
      success: false,
      configFile,
      ...counters,
      durationMs: Date.now() - startTime,
      error: errorMessage(error),
    };
    sink.emit({
      component: 'rescale',
      level: 'error',
      message: `Rescale failed for ${configFile}: ${outcome.error}`,
      data: { ...outcome },
    });
    return outcome;
  }
}
