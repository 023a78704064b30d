/**
 * Per-variant geometry derivation
 *
 *   lK'  = lK  + s
 *   lZ0' = lZ0 + s   (lZ0 - s with lz0Direction 'subtract')
 *   lKG' = lKG + 0.86 s
 *   lSK' = lSK + 0.45 s
 */

import { VARIANT_PREFIX } from './constants.js';
import type { CompleteGeometry, Lz0Direction, ScaleFactor, VariantParameterSet } from './types.js';

export const LKG_FACTOR = 0.86;
export const LSK_FACTOR = 0.45;

export const DEFAULT_LZ0_DIRECTION: Lz0Direction = 'add';

export interface DeriveOptions {
  lz0Direction?: Lz0Direction;
}

export function deriveVariant(
  base: CompleteGeometry,
  scale: ScaleFactor,
  options: DeriveOptions = {}
): VariantParameterSet {
  const sign = (options.lz0Direction ?? DEFAULT_LZ0_DIRECTION) === 'subtract' ? -1 : 1;
  return Object.freeze({
    scale,
    base: Object.freeze({ ...base }),
    scaled: Object.freeze({
      lK: base.lK + scale,
      lZ0: base.lZ0 + sign * scale,
      lKG: base.lKG + LKG_FACTOR * scale,
      lSK: base.lSK + LSK_FACTOR * scale,
    }),
  });
}

/** Variant folder name: the scale factor truncated toward zero */
export function variantDirectoryName(scale: ScaleFactor): string {
  return `${VARIANT_PREFIX}${Math.trunc(scale)}`;
}

export interface VariantPlan {
  scale: ScaleFactor;
  name: string;
  parameters: VariantParameterSet;
  /** Earlier scale factor that maps to the same folder, if any */
  overwrites?: ScaleFactor;
}

/**
 * Dry run of a sweep: names and derived values, no filesystem access.
 */
export function planVariants(
  base: CompleteGeometry,
  scales: readonly ScaleFactor[],
  options: DeriveOptions = {}
): VariantPlan[] {
  const seen = new Map<string, ScaleFactor>();
  return scales.map((scale) => {
    const name = variantDirectoryName(scale);
    const plan: VariantPlan = { scale, name, parameters: deriveVariant(base, scale, options) };
    const previous = seen.get(name);
    if (previous !== undefined) {
      plan.overwrites = previous;
    }
    seen.set(name, scale);
    return plan;
  });
}

/** Derived values at display precision (6 decimals) */
export function formatDerived(parameters: VariantParameterSet): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(parameters.scaled)) {
    out[name] = value.toFixed(6);
  }
  return out;
}
