/**
 * Base folder checks and one-off staging
 */

import fs from 'fs/promises';
import path from 'path';
import {
  AUX_INPUT_FILE,
  BASE_FOLDERS,
  GEOMETRY_FILE,
  SCALAR_CONFIG_FILE,
  SUBCASE_PREFIX,
} from './constants.js';
import { errorMessage } from './errors.js';
import { silentSink, type EventSink } from './events.js';
import { isDirectory, isFile } from './textFile.js';

export interface BaseFolderPaths {
  base: string;
  inp: string;
  simulation: string;
  influgen: string;
  zscalar: string;
  geometryFile: string;
  auxInputFile: string;
  scalarTemplate: string;
}

export function baseFolderPaths(baseFolder: string): BaseFolderPaths {
  const base = path.resolve(baseFolder);
  const inp = path.join(base, BASE_FOLDERS.INP);
  const zscalar = path.join(base, BASE_FOLDERS.Zscalar);
  return {
    base,
    inp,
    simulation: path.join(base, BASE_FOLDERS.simulation),
    influgen: path.join(base, BASE_FOLDERS.influgen),
    zscalar,
    geometryFile: path.join(base, GEOMETRY_FILE),
    auxInputFile: path.join(inp, AUX_INPUT_FILE),
    scalarTemplate: path.join(zscalar, SCALAR_CONFIG_FILE),
  };
}

export interface CheckItem {
  name: string;
  path: string;
  exists: boolean;
  critical: boolean;
}

export interface BaseFolderStatus {
  /** Every critical item exists */
  critical: boolean;
  items: CheckItem[];
  subCases: string[];
}

/**
 * Check the base folder layout. Folders and files that synthesis cannot do
 * without are critical; scalar.txt and the sub-cases are reported only.
 */
export async function verifyBaseFolder(baseFolder: string, sink: EventSink = silentSink): Promise<BaseFolderStatus> {
  const paths = baseFolderPaths(baseFolder);
  const items: CheckItem[] = [];

  const check = async (name: string, target: string, kind: 'dir' | 'file', critical: boolean) => {
    const exists = kind === 'dir' ? await isDirectory(target) : await isFile(target);
    items.push({ name, path: target, exists, critical });
    if (!exists) {
      sink.emit({
        component: 'setup',
        level: critical ? 'error' : 'warn',
        message: `${name} not found: ${target}`,
      });
    }
    return exists;
  };

  if (!(await check('base_folder', paths.base, 'dir', true))) {
    return { critical: false, items, subCases: [] };
  }

  await check('INP', paths.inp, 'dir', true);
  const hasSimulation = await check('simulation', paths.simulation, 'dir', false);
  await check('influgen', paths.influgen, 'dir', false);
  await check('Zscalar', paths.zscalar, 'dir', true);
  await check('geometry_txt', paths.geometryFile, 'file', true);
  await check('piston_pr_inp', paths.auxInputFile, 'file', true);
  await check('scalar_txt', paths.scalarTemplate, 'file', false);

  let subCases: string[] = [];
  if (hasSimulation) {
    const entries = await fs.readdir(paths.simulation, { withFileTypes: true });
    subCases = entries
      .filter(e => e.isDirectory() && e.name.startsWith(SUBCASE_PREFIX))
      .map(e => e.name)
      .sort();
    if (subCases.length === 0) {
      sink.emit({ component: 'setup', level: 'warn', message: `No ${SUBCASE_PREFIX}* sub-cases in ${paths.simulation}` });
    }
  }

  const critical = items.every(item => item.exists || !item.critical);
  sink.emit({
    component: 'setup',
    level: critical ? 'info' : 'error',
    message: critical
      ? 'All critical files and folders are present'
      : 'Some critical files or folders are missing',
  });

  return { critical, items, subCases };
}

export type StageStatus = 'copied' | 'exists' | 'failed';

export interface StageResult {
  status: StageStatus;
  source: string;
  destination: string;
  error?: string;
}

/**
 * Copy INP/piston_pr.inp into Zscalar/. An existing copy is kept unless
 * overwrite is set.
 */
export async function stageZscalarInput(
  baseFolder: string,
  options: { overwrite?: boolean; sink?: EventSink } = {}
): Promise<StageResult> {
  const sink = options.sink ?? silentSink;
  const paths = baseFolderPaths(baseFolder);
  const source = paths.auxInputFile;
  const destination = path.join(paths.zscalar, AUX_INPUT_FILE);

  if (!(await isFile(source))) {
    const error = `Source file not found: ${source}`;
    sink.emit({ component: 'setup', level: 'error', message: error });
    return { status: 'failed', source, destination, error };
  }

  if (!options.overwrite && (await isFile(destination))) {
    sink.emit({ component: 'setup', level: 'warn', message: `Destination already exists, kept: ${destination}` });
    return { status: 'exists', source, destination };
  }

  try {
    await fs.mkdir(paths.zscalar, { recursive: true });
    await fs.copyFile(source, destination);
    sink.emit({ component: 'setup', level: 'info', message: `Copied ${AUX_INPUT_FILE} to ${paths.zscalar}` });
    return { status: 'copied', source, destination };
  } catch (error) {
    const detail = errorMessage(error);
    sink.emit({ component: 'setup', level: 'error', message: `Copy failed: ${detail}` });
    return { status: 'failed', source, destination, error: detail };
  }
}
