/**
 * Tests for geometry parameter extraction and substitution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import path from 'path';
import {
  extractParameters,
  formatParameterTable,
  missingParameters,
  readGeometryParameters,
  requireCompleteParameters,
  substituteParameters,
} from '../src/geometry.js';
import { GEOMETRY_PARAMETERS } from '../src/constants.js';
import { MissingInputError, ParseFailureError } from '../src/errors.js';
import { SAMPLE_GEOMETRY, cleanupTempDir, createTempDir, writeFixture } from './helpers/testUtils.js';

describe('extractParameters', () => {
  it('should read every tracked parameter', () => {
    expect(extractParameters(SAMPLE_GEOMETRY, GEOMETRY_PARAMETERS)).toEqual({
      lK: 100,
      lZ0: 50,
      lKG: 30,
      lSK: 20,
    });
  });

  it('should not confuse a name with a longer name sharing its prefix', () => {
    const values = extractParameters('lKG 30.0\nlK 12.5\n', ['lK', 'lKG']);
    expect(values.lK).toBe(12.5);
    expect(values.lKG).toBe(30);
  });

  it('should take the first matching line', () => {
    expect(extractParameters('lK 1\nlK 2\n', ['lK']).lK).toBe(1);
  });

  it('should accept signs and exponents', () => {
    const values = extractParameters('a -1.5e3\nb +.25\nc 7E-2\n', ['a', 'b', 'c']);
    expect(values).toEqual({ a: -1500, b: 0.25, c: 0.07 });
  });

  it('should leave missing names absent', () => {
    const values = extractParameters('lK 100\n', GEOMETRY_PARAMETERS);
    expect(values.lK).toBe(100);
    expect(values.lZ0).toBeUndefined();
    expect(missingParameters(values)).toEqual(['lZ0', 'lKG', 'lSK']);
  });

  it('should ignore names that are not at the start of a line', () => {
    expect(extractParameters('// lK 99\n', ['lK']).lK).toBeUndefined();
  });

  it('should ignore a name without a number after it', () => {
    expect(extractParameters('lK abc\n', ['lK']).lK).toBeUndefined();
  });

  it('should find values regardless of order and spacing', () => {
    const valueArb = fc.double({ min: -1e6, max: 1e6, noNaN: true }).filter(v => !Object.is(v, -0));
    const indentArb = fc.constantFrom('', ' ', '  ', '\t');
    const gapArb = fc.constantFrom(' ', '   ', '\t', ' \t ');

    fc.assert(
      fc.property(
        fc.tuple(valueArb, valueArb, valueArb, valueArb),
        fc.tuple(indentArb, gapArb),
        fc.shuffledSubarray([0, 1, 2, 3], { minLength: 4, maxLength: 4 }),
        (values, [indent, gap], order) => {
          const lines = order.map(i => `${indent}${GEOMETRY_PARAMETERS[i]}${gap}${String(values[i])} rest`);
          const content = ['header line', ...lines, 'footer'].join('\n');
          const extracted = extractParameters(content, GEOMETRY_PARAMETERS);
          GEOMETRY_PARAMETERS.forEach((name, i) => {
            expect(extracted[name]).toBe(values[i]);
          });
        }
      )
    );
  });
});

describe('readGeometryParameters', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tmpDir);
  });

  it('should read a geometry file', async () => {
    const file = await writeFixture(tmpDir, 'geometry.txt', SAMPLE_GEOMETRY);
    expect(await readGeometryParameters(file)).toEqual({ lK: 100, lZ0: 50, lKG: 30, lSK: 20 });
  });

  it('should report a missing file as MissingInputError', async () => {
    const file = path.join(tmpDir, 'nope.txt');
    await expect(readGeometryParameters(file)).rejects.toBeInstanceOf(MissingInputError);
    await expect(readGeometryParameters(file)).rejects.toMatchObject({ path: file, code: 'MISSING_INPUT' });
  });

  it('should return partial results when parameters are absent', async () => {
    const file = await writeFixture(tmpDir, 'geometry.txt', 'lK 1\nlSK 2\n');
    expect(await readGeometryParameters(file)).toEqual({ lK: 1, lSK: 2 });
  });
});

describe('requireCompleteParameters', () => {
  it('should pass a complete set through', () => {
    expect(requireCompleteParameters({ lK: 1, lZ0: 2, lKG: 3, lSK: 4 })).toEqual({ lK: 1, lZ0: 2, lKG: 3, lSK: 4 });
  });

  it('should name every missing parameter', () => {
    expect(() => requireCompleteParameters({ lK: 1, lKG: 3 })).toThrow(ParseFailureError);
    expect(() => requireCompleteParameters({ lK: 1, lKG: 3 })).toThrow('Missing geometry parameter(s): lZ0, lSK');
  });

  it('should accept zero values', () => {
    expect(requireCompleteParameters({ lK: 0, lZ0: 0, lKG: 0, lSK: 0 }).lK).toBe(0);
  });
});

describe('substituteParameters', () => {
  it('should replace only the numbers and keep the rest of each line', () => {
    const result = substituteParameters(SAMPLE_GEOMETRY, { lK: 105, lZ0: 55, lKG: 34.3, lSK: 22.25 });
    expect(result).toBe(`// piston geometry
lK      105   // piston length
  lZ0   55
lKG 34.3
lSK\t22.25 mm
dK 19.0
`);
  });

  it('should write full precision', () => {
    expect(substituteParameters('lKG 30\n', { lKG: 1 / 3 })).toBe('lKG 0.3333333333333333\n');
  });

  it('should replace every occurrence', () => {
    expect(substituteParameters('lK 1\nx\nlK 2\n', { lK: 9 })).toBe('lK 9\nx\nlK 9\n');
  });

  it('should keep CRLF line endings', () => {
    expect(substituteParameters('lK 1\r\nlSK 2\r\n', { lK: 3, lSK: 4 })).toBe('lK 3\r\nlSK 4\r\n');
  });

  it('should be stable when applied twice', () => {
    const values = { lK: 105, lZ0: 55, lKG: 34.3, lSK: 22.25 };
    const once = substituteParameters(SAMPLE_GEOMETRY, values);
    expect(substituteParameters(once, values)).toBe(once);
  });
});

describe('formatParameterTable', () => {
  it('should render six decimals and flag missing values', () => {
    expect(formatParameterTable({ lK: 100, lZ0: 50.5, lSK: 20 })).toBe([
      '  lK         =   100.000000 mm',
      '  lZ0        =    50.500000 mm',
      '  lKG        = NOT FOUND',
      '  lSK        =    20.000000 mm',
    ].join('\n'));
  });
});
