/**
 * Shared constants for the piston DOE pipeline
 */

/** Geometry parameters every base case must define (millimetres) */
export const GEOMETRY_PARAMETERS = ['lK', 'lZ0', 'lKG', 'lSK'] as const;

/**
 * Numeric literal accepted after a parameter name:
 * integer, decimal or exponential, optional sign
 */
export const NUMERIC_LITERAL = '[-+]?\\d*\\.?\\d+(?:[eE][-+]?\\d+)?';

/** Template sub-case directories start with this letter */
export const SUBCASE_PREFIX = 'T';

/** Synthesized variant directories start with this prefix */
export const VARIANT_PREFIX = 'IM_scaled_piston_';

/** Working subfolder created inside every variant */
export const WORKING_SUBFOLDER = 'IM_piston';

export const SCALAR_CONFIG_FILE = 'scalar.txt';
export const GEOMETRY_FILE = 'geometry.txt';
export const AUX_INPUT_FILE = 'piston_pr.inp';

/** Subfolder of a replica that receives the rewritten geometry file */
export const REPLICA_INPUT_FOLDER = 'input';

export const SOLVER_OPTIONS_FILE = 'options_piston.txt';
export const SOLVER_PATH_FIELD = 'IM_piston_path';

/** Parameter whose base/scaled pair goes on line 4 of the scalar-config file */
export const DEFAULT_TRACKED_PARAMETER = 'lK';

/** Base folder layout */
export const BASE_FOLDERS = {
  INP: 'INP',
  simulation: 'simulation',
  influgen: 'influgen',
  Zscalar: 'Zscalar',
} as const;

/** Isolated rescale tasks are killed after this long */
export const DEFAULT_RESCALE_TIMEOUT_MS = 5 * 60 * 1000;

/** File name of the rescale worker, next to the compiled library */
export const RESCALE_SCRIPT_NAME = 'rescale.js';
