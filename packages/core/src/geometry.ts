/**
 * Geometry parameter extraction and substitution
 *
 * A tracked line looks like `<name><whitespace><number>...`, optionally
 * indented. Everything after the number is ignored on read and kept on write.
 */

import { GEOMETRY_PARAMETERS, NUMERIC_LITERAL } from './constants.js';
import { ParseFailureError } from './errors.js';
import { escapeRegex, readInputFile } from './textFile.js';
import type { CompleteGeometry, GeometryParameter, GeometryParameterSet } from './types.js';

function parameterPattern(name: string, flags: string): RegExp {
  return new RegExp(`^([ \\t]*${escapeRegex(name)}[ \\t]+)(${NUMERIC_LITERAL})`, flags);
}

/**
 * Extract named numeric parameters from file content.
 * The first matching line wins for each name.
 */
export function extractParameters<N extends string>(
  content: string,
  names: readonly N[]
): Partial<Record<N, number>> {
  const values: Partial<Record<N, number>> = {};
  for (const name of names) {
    const match = parameterPattern(name, 'm').exec(content);
    if (match) {
      values[name] = parseFloat(match[2]);
    }
  }
  return values;
}

/**
 * Read the four tracked parameters from a geometry file.
 *
 * @throws MissingInputError if the file does not exist
 */
export async function readGeometryParameters(geometryFile: string): Promise<GeometryParameterSet> {
  const content = await readInputFile(geometryFile, 'Geometry file');
  return extractParameters(content, GEOMETRY_PARAMETERS);
}

export function missingParameters(params: GeometryParameterSet): GeometryParameter[] {
  return GEOMETRY_PARAMETERS.filter(name => params[name] === undefined);
}

/**
 * Narrow a parameter set to one with every name resolved.
 *
 * @throws ParseFailureError naming every missing parameter
 */
export function requireCompleteParameters(params: GeometryParameterSet): CompleteGeometry {
  const { lK, lZ0, lKG, lSK } = params;
  if (lK === undefined || lZ0 === undefined || lKG === undefined || lSK === undefined) {
    const missing = missingParameters(params);
    throw new ParseFailureError(
      'geometry',
      `Missing geometry parameter(s): ${missing.join(', ')}`
    );
  }
  return { lK, lZ0, lKG, lSK };
}

/**
 * Render a value for a file another tool will read: shortest string that
 * parses back to the same double.
 */
export function formatFullPrecision(value: number): string {
  return String(value);
}

/**
 * Replace the numeric literal after each given name, on every line where
 * the name leads. Name, indentation and the rest of the line are kept.
 */
export function substituteParameters(
  content: string,
  values: Partial<Record<string, number>>
): string {
  let result = content;
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined) continue;
    result = result.replace(
      parameterPattern(name, 'gm'),
      (_match, lead: string) => `${lead}${formatFullPrecision(value)}`
    );
  }
  return result;
}

/**
 * Display table of extracted values, one line per parameter.
 */
export function formatParameterTable(
  params: Partial<Record<string, number>>,
  names: readonly string[] = GEOMETRY_PARAMETERS
): string {
  return names
    .map(name => [name, params[name]] as const)
    .map(([name, value]) => value === undefined
      ? `  ${name.padEnd(10)} = NOT FOUND`
      : `  ${name.padEnd(10)} = ${value.toFixed(6).padStart(12)} mm`)
    .join('\n');
}
