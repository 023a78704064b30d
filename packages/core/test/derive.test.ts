import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  deriveVariant,
  formatDerived,
  planVariants,
  variantDirectoryName,
} from '../src/derive.js';
import type { CompleteGeometry } from '../src/types.js';

const BASE: CompleteGeometry = { lK: 100, lZ0: 50, lKG: 30, lSK: 20 };

describe('deriveVariant', () => {
  it('should apply the scaling rules', () => {
    const result = deriveVariant(BASE, 5);
    expect(result.scale).toBe(5);
    expect(result.base).toEqual(BASE);
    expect(result.scaled.lK).toBe(105);
    expect(result.scaled.lZ0).toBe(55);
    expect(result.scaled.lKG).toBeCloseTo(34.3, 12);
    expect(result.scaled.lSK).toBe(22.25);
  });

  it('should subtract the scale from lZ0 when asked to', () => {
    expect(deriveVariant(BASE, 5, { lz0Direction: 'subtract' }).scaled.lZ0).toBe(45);
    expect(deriveVariant(BASE, 5, { lz0Direction: 'add' }).scaled.lZ0).toBe(55);
  });

  it('should leave the geometry unchanged for a zero scale', () => {
    expect(deriveVariant(BASE, 0).scaled).toEqual(BASE);
  });

  it('should handle negative scales', () => {
    const result = deriveVariant(BASE, -2.5);
    expect(result.scaled.lK).toBe(97.5);
    expect(result.scaled.lZ0).toBe(47.5);
  });

  it('should give bit-identical results for identical inputs', () => {
    fc.assert(
      fc.property(fc.double({ min: -1e4, max: 1e4, noNaN: true }), (s) => {
        const a = deriveVariant(BASE, s).scaled;
        const b = deriveVariant(BASE, s).scaled;
        expect(Object.is(a.lKG, b.lKG) && Object.is(a.lSK, b.lSK) && Object.is(a.lZ0, b.lZ0)).toBe(true);
      })
    );
  });

  it('should return immutable results', () => {
    const result = deriveVariant(BASE, 1);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.base)).toBe(true);
    expect(Object.isFrozen(result.scaled)).toBe(true);
  });

  it('should not share state with the input', () => {
    const base = { ...BASE };
    const result = deriveVariant(base, 1);
    base.lK = 0;
    expect(result.base.lK).toBe(100);
  });

  it('should grow every parameter with the scale', () => {
    fc.assert(
      fc.property(fc.integer({ min: -1000, max: 1000 }), fc.integer({ min: 1, max: 1000 }), (s, delta) => {
        const a = deriveVariant(BASE, s).scaled;
        const b = deriveVariant(BASE, s + delta).scaled;
        expect(b.lK - a.lK).toBe(delta);
        expect(b.lZ0).toBeGreaterThan(a.lZ0);
        expect(b.lKG).toBeGreaterThan(a.lKG);
        expect(b.lSK).toBeGreaterThan(a.lSK);
      })
    );
  });
});

describe('variantDirectoryName', () => {
  it('should truncate the scale toward zero', () => {
    expect(variantDirectoryName(5)).toBe('IM_scaled_piston_5');
    expect(variantDirectoryName(5.9)).toBe('IM_scaled_piston_5');
    expect(variantDirectoryName(-2.5)).toBe('IM_scaled_piston_-2');
    expect(variantDirectoryName(-0.5)).toBe('IM_scaled_piston_0');
    expect(variantDirectoryName(0)).toBe('IM_scaled_piston_0');
  });
});

describe('planVariants', () => {
  it('should plan one variant per scale in order', () => {
    const plans = planVariants(BASE, [0, 5, 10]);
    expect(plans.map(p => p.name)).toEqual(['IM_scaled_piston_0', 'IM_scaled_piston_5', 'IM_scaled_piston_10']);
    expect(plans[2].parameters.scaled.lK).toBe(110);
    expect(plans.every(p => p.overwrites === undefined)).toBe(true);
  });

  it('should flag scales that collide on a folder name', () => {
    const plans = planVariants(BASE, [5, 5.7, 6]);
    expect(plans[1].name).toBe('IM_scaled_piston_5');
    expect(plans[1].overwrites).toBe(5);
    expect(plans[2].overwrites).toBeUndefined();
  });

  it('should pass the lZ0 direction through', () => {
    expect(planVariants(BASE, [4], { lz0Direction: 'subtract' })[0].parameters.scaled.lZ0).toBe(46);
  });
});

describe('formatDerived', () => {
  it('should render six decimals', () => {
    expect(formatDerived(deriveVariant(BASE, 5))).toEqual({
      lK: '105.000000',
      lZ0: '55.000000',
      lKG: '34.300000',
      lSK: '22.250000',
    });
  });
});
