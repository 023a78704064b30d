/**
 * Scale-factor table parsing
 *
 * The table is tabular text: a header row, then one scale factor per row in
 * the first column. Rows that do not convert are skipped with a warning.
 */

import { readInputFile } from './textFile.js';
import type { ScaleTable, ScaleTableWarning } from './types.js';

const COLUMN_SEPARATOR = /[,;\t]|\s+/;

/** Plain decimal or exponential literal, nothing else */
const STRICT_NUMBER = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Parse a numeric cell. Returns null when the cell is not a finite number.
 */
export function parseNumericCell(cell: string): number | null {
  const trimmed = cell.trim().replace(/^(["'])(.*)\1$/, '$2').trim();
  if (!STRICT_NUMBER.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseScaleTable(text: string): ScaleTable {
  const scales: number[] = [];
  const warnings: ScaleTableWarning[] = [];
  let headerSeen = false;

  const rows = text.split(/\r?\n/);
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i].trim();
    if (!row) continue;

    if (!headerSeen) {
      headerSeen = true;
      continue;
    }

    const firstCell = row.split(COLUMN_SEPARATOR)[0];
    const value = parseNumericCell(firstCell);
    if (value === null) {
      warnings.push({
        row: i + 1,
        value: firstCell,
        reason: `could not convert '${firstCell}' to a number`,
      });
      continue;
    }
    scales.push(value);
  }

  return { scales, warnings };
}

/**
 * @throws MissingInputError if the file does not exist
 */
export async function readScaleTable(tableFile: string): Promise<ScaleTable> {
  return parseScaleTable(await readInputFile(tableFile, 'Scale-factor table'));
}
