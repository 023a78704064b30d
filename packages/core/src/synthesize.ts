/**
 * Variant synthesis
 *
 * For every scale factor, materialise one variant folder:
 *
 *   <outputRoot>/IM_scaled_piston_<n>/
 *     scalar.txt            template with line 4 = "<base> <scaled>"
 *     IM_piston/            working subfolder (its path goes into the solver options)
 *     T.../                 replica of each template sub-case
 *       input/geometry.txt  base geometry with the four scaled parameters
 *       options_piston.txt  path field set to the working subfolder
 *
 * Variants are processed one after another. A variant that fails is
 * reported and the next scale factor is still processed.
 */

import fs from 'fs/promises';
import path from 'path';
import {
  DEFAULT_TRACKED_PARAMETER,
  REPLICA_INPUT_FOLDER,
  SCALAR_CONFIG_FILE,
  SOLVER_OPTIONS_FILE,
  SOLVER_PATH_FIELD,
  SUBCASE_PREFIX,
  WORKING_SUBFOLDER,
} from './constants.js';
import { deriveVariant, variantDirectoryName, type DeriveOptions } from './derive.js';
import { MissingInputError, errorMessage, isNotFound } from './errors.js';
import { silentSink, type EventSink } from './events.js';
import { requireCompleteParameters, substituteParameters } from './geometry.js';
import { rewriteScalarTemplate } from './scalarConfig.js';
import { isFile, readInputFile, replaceFieldValue } from './textFile.js';
import type {
  CompleteGeometry,
  GeometryParameter,
  GeometryParameterSet,
  ScaleFactor,
  SynthesisReport,
  VariantParameterSet,
  VariantSynthesisResult,
} from './types.js';

export interface SynthesisInput {
  /** Folder holding the template sub-cases */
  templateSimulationDir: string;
  zscalarTemplateFile: string;
  /** Base geometry file copied (with substitutions) into every replica */
  geometryFile: string;
  scales: readonly ScaleFactor[];
  baseParams: GeometryParameterSet;
  /** Where variant folders are created (default: templateSimulationDir) */
  outputRoot?: string;
}

export interface SynthesisOptions extends DeriveOptions {
  /** Parameter written on line 4 of scalar.txt (default: lK) */
  trackedParameter?: GeometryParameter;
  subCasePrefix?: string;
  workingSubfolder?: string;
  solverOptionsFile?: string;
  solverPathField?: string;
  sink?: EventSink;
}

type ResolvedOptions = Required<Omit<SynthesisOptions, 'lz0Direction'>> & DeriveOptions;

/**
 * Template sub-case folder names, sorted.
 *
 * @throws MissingInputError if the folder is missing or has no sub-cases
 */
export async function listSubCases(templateSimulationDir: string, prefix: string = SUBCASE_PREFIX): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(templateSimulationDir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      throw new MissingInputError('Template simulation folder', templateSimulationDir);
    }
    throw error;
  }

  const subCases = entries
    .filter(entry => entry.isDirectory() && entry.name.startsWith(prefix))
    .map(entry => entry.name)
    .sort();

  if (subCases.length === 0) {
    throw new MissingInputError('Template sub-cases', templateSimulationDir, `no ${prefix}* folders`);
  }
  return subCases;
}

/**
 * Remove any stale replica, then copy the whole sub-case tree.
 */
async function replicateSubCase(source: string, destination: string): Promise<void> {
  await fs.rm(destination, { recursive: true, force: true });
  await fs.cp(source, destination, { recursive: true });
}

async function writeScaledGeometry(
  replicaDir: string,
  geometryFile: string,
  scaled: Readonly<CompleteGeometry>
): Promise<string> {
  const inputDir = path.join(replicaDir, REPLICA_INPUT_FOLDER);
  await fs.mkdir(inputDir, { recursive: true });

  // Substituted values are ASCII; every other byte goes back out unchanged
  const content = await readInputFile(geometryFile, 'Geometry file', 'latin1');
  const target = path.join(inputDir, path.basename(geometryFile));
  await fs.writeFile(target, substituteParameters(content, scaled), 'latin1');
  return target;
}

/**
 * Point the replica's solver options at the variant's working folder.
 * The file may sit in input/ or at the replica root; input/ wins.
 *
 * @returns the rewritten file, or null if there is none or it lacks the field
 */
async function updateSolverOptions(
  replicaDir: string,
  workingDir: string,
  options: ResolvedOptions
): Promise<string | null> {
  const candidates = [
    path.join(replicaDir, REPLICA_INPUT_FOLDER, options.solverOptionsFile),
    path.join(replicaDir, options.solverOptionsFile),
  ];

  for (const candidate of candidates) {
    if (!(await isFile(candidate))) continue;

    const original = await fs.readFile(candidate);
    const { content, replaced } = replaceFieldValue(original, options.solverPathField, workingDir);
    if (!replaced) {
      options.sink.emit({
        component: 'synthesis',
        level: 'warn',
        message: `${candidate}: field ${options.solverPathField} not found, left unchanged`,
      });
      return null;
    }
    await fs.writeFile(candidate, content);
    return candidate;
  }

  options.sink.emit({
    component: 'synthesis',
    level: 'warn',
    message: `${path.basename(replicaDir)}: no ${options.solverOptionsFile} found`,
  });
  return null;
}

async function synthesizeVariant(
  input: SynthesisInput,
  outputRoot: string,
  base: CompleteGeometry,
  scale: ScaleFactor,
  options: ResolvedOptions
): Promise<VariantSynthesisResult> {
  const name = variantDirectoryName(scale);
  const variantDir = path.resolve(outputRoot, name);
  const workingDir = path.join(variantDir, options.workingSubfolder);
  const result: VariantSynthesisResult = {
    scale,
    name,
    path: variantDir,
    workingDir,
    status: 'failed',
    subCases: [],
    solverOptionsUpdated: [],
  };

  try {
    const parameters: VariantParameterSet = deriveVariant(base, scale, options);
    result.parameters = parameters;

    // 1. Variant folder and working subfolder
    await fs.mkdir(workingDir, { recursive: true });

    // 2. scalar.txt from the template
    const tracked = options.trackedParameter;
    const template = await readInputFile(input.zscalarTemplateFile, 'Scalar-config template');
    await fs.writeFile(
      path.join(variantDir, SCALAR_CONFIG_FILE),
      rewriteScalarTemplate(template, parameters.base[tracked], parameters.scaled[tracked]),
      'utf-8'
    );

    // 3-5. Sub-case replicas
    const subCases = await listSubCases(input.templateSimulationDir, options.subCasePrefix);
    for (const subCase of subCases) {
      const replicaDir = path.join(variantDir, subCase);
      await replicateSubCase(path.join(input.templateSimulationDir, subCase), replicaDir);
      await writeScaledGeometry(replicaDir, input.geometryFile, parameters.scaled);

      const optionsFile = await updateSolverOptions(replicaDir, workingDir, options);
      if (optionsFile) {
        result.solverOptionsUpdated.push(subCase);
      }
      result.subCases.push(subCase);
    }

    result.status = 'created';
    options.sink.emit({
      component: 'synthesis',
      level: 'info',
      message: `Created ${name} (scale ${scale}) with ${subCases.length} sub-case(s)`,
      data: { scale, name, subCases },
    });
  } catch (error) {
    result.error = errorMessage(error);
    options.sink.emit({
      component: 'synthesis',
      level: 'error',
      message: `${name} (scale ${scale}) failed: ${result.error}`,
    });
  }

  return result;
}

/**
 * Create one variant folder per scale factor.
 *
 * @throws ParseFailureError if the base parameters are incomplete
 */
export async function synthesizeVariants(
  input: SynthesisInput,
  options: SynthesisOptions = {}
): Promise<SynthesisReport> {
  const startTime = Date.now();
  const resolved: ResolvedOptions = {
    trackedParameter: options.trackedParameter ?? DEFAULT_TRACKED_PARAMETER,
    subCasePrefix: options.subCasePrefix ?? SUBCASE_PREFIX,
    workingSubfolder: options.workingSubfolder ?? WORKING_SUBFOLDER,
    solverOptionsFile: options.solverOptionsFile ?? SOLVER_OPTIONS_FILE,
    solverPathField: options.solverPathField ?? SOLVER_PATH_FIELD,
    sink: options.sink ?? silentSink,
    lz0Direction: options.lz0Direction,
  };

  const base = requireCompleteParameters(input.baseParams);
  const outputRoot = input.outputRoot ?? input.templateSimulationDir;

  resolved.sink.emit({
    component: 'synthesis',
    level: 'info',
    message: `Synthesizing ${input.scales.length} variant(s) into ${outputRoot}`,
  });

  const variants: VariantSynthesisResult[] = [];
  const seen = new Map<string, ScaleFactor>();
  for (const scale of input.scales) {
    const result = await synthesizeVariant(input, outputRoot, base, scale, resolved);
    const previous = seen.get(result.name);
    if (previous !== undefined) {
      result.overwrites = previous;
      resolved.sink.emit({
        component: 'synthesis',
        level: 'warn',
        message: `${result.name}: scale ${scale} replaced the variant of scale ${previous}`,
        data: { scale, previous, name: result.name },
      });
    }
    seen.set(result.name, scale);
    variants.push(result);
  }

  const created = variants.filter(v => v.status === 'created').length;
  const report: SynthesisReport = {
    total: variants.length,
    created,
    failed: variants.length - created,
    variants,
    durationMs: Date.now() - startTime,
  };

  resolved.sink.emit({
    component: 'synthesis',
    level: report.failed === 0 ? 'info' : 'warn',
    message: `Synthesis finished: ${created}/${report.total} variant(s) created`,
    data: { total: report.total, created, failed: report.failed, duration_ms: report.durationMs },
  });

  return report;
}
