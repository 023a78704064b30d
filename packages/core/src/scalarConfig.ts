/**
 * Scalar-config files
 *
 * Four meaningful lines:
 *   1. source mesh path
 *   2. destination mesh path
 *   3. "z1 z1new"
 *   4. "z2 z2new"
 *
 * Synthesis writes line 4 from the tracked parameter; the mesh rescaler
 * reads all four.
 */

import path from 'path';
import { ParseFailureError } from './errors.js';
import { formatFullPrecision } from './geometry.js';
import { parseNumericCell } from './scaleTable.js';
import { detectLineEnding, joinLines, lineEndingChars, readInputFile, splitLines } from './textFile.js';
import type { RescaleConfig } from './types.js';

export const SCALAR_CONFIG_LINES = 4;

/** Zero-based index of the "base scaled" line */
const BREAKPOINT_LINE = 3;

/**
 * Replace line 4 of a scalar-config template with "{base} {scaled}".
 * Other lines and line terminators are kept.
 *
 * @throws ParseFailureError if the template has fewer than 4 lines
 */
export function rewriteScalarTemplate(template: string, base: number, scaled: number): string {
  const lines = splitLines(template);
  if (lines.length < SCALAR_CONFIG_LINES) {
    throw new ParseFailureError(
      'scalar-config',
      `Scalar-config template has ${lines.length} line(s), expected at least ${SCALAR_CONFIG_LINES}`
    );
  }

  const line = lines[BREAKPOINT_LINE];
  line.text = `${formatFullPrecision(base)} ${formatFullPrecision(scaled)}`;
  if (!line.eol) {
    line.eol = lineEndingChars(detectLineEnding(template));
  }
  return joinLines(lines);
}

function parsePair(line: string, lineNumber: number, configFile: string): [number, number] {
  const cells = line.trim().split(/\s+/);
  const first = parseNumericCell(cells[0] ?? '');
  const second = parseNumericCell(cells[1] ?? '');
  if (cells.length < 2 || first === null || second === null) {
    throw new ParseFailureError(
      'scalar-config',
      `${configFile}: line ${lineNumber} should hold two numbers, got '${line.trim()}'`
    );
  }
  return [first, second];
}

/**
 * Parse scalar-config content. Relative mesh paths resolve against baseDir.
 */
export function parseRescaleConfig(content: string, baseDir: string, configFile = 'scalar-config'): RescaleConfig {
  const lines = splitLines(content).map(l => l.text);
  if (lines.length < SCALAR_CONFIG_LINES) {
    throw new ParseFailureError(
      'scalar-config',
      `${configFile}: expected ${SCALAR_CONFIG_LINES} lines, found ${lines.length}`
    );
  }

  const source = lines[0].trim();
  const destination = lines[1].trim();
  if (!source || !destination) {
    throw new ParseFailureError('scalar-config', `${configFile}: source and destination paths are required`);
  }

  const [z1, z1new] = parsePair(lines[2], 3, configFile);
  const [z2, z2new] = parsePair(lines[3], 4, configFile);

  return {
    source: path.resolve(baseDir, source),
    destination: path.resolve(baseDir, destination),
    z1,
    z1new,
    z2,
    z2new,
  };
}

/**
 * @throws MissingInputError if the file does not exist
 * @throws ParseFailureError if the content is malformed
 */
export async function readRescaleConfig(configFile: string): Promise<RescaleConfig> {
  const content = await readInputFile(configFile, 'Scalar-config file');
  return parseRescaleConfig(content, path.dirname(path.resolve(configFile)), configFile);
}
