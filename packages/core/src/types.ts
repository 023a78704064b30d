/**
 * Types for the piston DOE pipeline
 */

import type { GEOMETRY_PARAMETERS } from './constants.js';

export type GeometryParameter = typeof GEOMETRY_PARAMETERS[number];

/** Values read from a geometry file; a name that was not found is absent */
export type GeometryParameterSet = Partial<Record<GeometryParameter, number>>;

/** Geometry parameters with every required name resolved */
export type CompleteGeometry = Record<GeometryParameter, number>;

export type ScaleFactor = number;

/**
 * Sign applied to the scale factor for lZ0.
 * 'add' is the default convention.
 */
export type Lz0Direction = 'add' | 'subtract';

export interface VariantParameterSet {
  readonly scale: ScaleFactor;
  readonly base: Readonly<CompleteGeometry>;
  readonly scaled: Readonly<CompleteGeometry>;
}

/** One skipped row of a scale-factor table */
export interface ScaleTableWarning {
  /** 1-based row number in the source text */
  row: number;
  value: string;
  reason: string;
}

export interface ScaleTable {
  scales: ScaleFactor[];
  warnings: ScaleTableWarning[];
}

/** Breakpoints of the piecewise-linear Z transform */
export interface ZBreakpoints {
  z1: number;
  z1new: number;
  z2: number;
  z2new: number;
}

export interface RescaleConfig extends ZBreakpoints {
  /** Absolute source mesh path */
  source: string;
  /** Absolute destination mesh path */
  destination: string;
}

export interface MeshNodeRecord {
  id: string;
  x: number;
  y: number;
  z: number;
}

export interface RescaleOutcome {
  success: boolean;
  configFile: string;
  destination?: string;
  /** Node lines rewritten with a new z */
  nodesTransformed: number;
  /** Node-block lines copied unchanged because they did not parse */
  malformedLines: number;
  durationMs: number;
  error?: string;
}

export type VariantStatus = 'created' | 'failed';

export interface VariantSynthesisResult {
  scale: ScaleFactor;
  name: string;
  path: string;
  workingDir: string;
  status: VariantStatus;
  parameters?: VariantParameterSet;
  subCases: string[];
  /** Replicas in which the solver-option file was found and rewritten */
  solverOptionsUpdated: string[];
  /** Earlier scale factor whose folder this variant replaced */
  overwrites?: ScaleFactor;
  error?: string;
}

export interface SynthesisReport {
  total: number;
  created: number;
  failed: number;
  variants: VariantSynthesisResult[];
  durationMs: number;
}

export type BatchStatus =
  | { status: 'success' }
  | { status: 'failed'; detail: string }
  | { status: 'skipped'; detail: string }
  | { status: 'timeout'; detail: string }
  | { status: 'error'; detail: string };

export interface BatchVariantResult {
  variant: string;
  path: string;
  outcome: BatchStatus;
  durationMs: number;
}

export interface BatchResult {
  /** False when a global precondition failed and nothing ran */
  ok: boolean;
  message: string;
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  timedOut: number;
  results: BatchVariantResult[];
  durationMs: number;
}

export type CopyStatus = 'copied' | 'failed';

export interface CopyResult {
  variant: string;
  destination: string;
  status: CopyStatus;
  createdWorkingDir: boolean;
  error?: string;
}

export interface CopyReport {
  ok: boolean;
  message: string;
  copied: number;
  failed: number;
  results: CopyResult[];
}
