/**
 * MCP tool tests: the full sweep workflow through an in-process client
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { readFile } from 'fs/promises';
import path from 'path';
import {
  callTool,
  cleanupTempDir,
  createBaseFolder,
  createTempDir,
  createTestServer,
  type TestServerContext,
} from './helpers/createTestServer.js';

describe('tool registration', () => {
  let tmpDir: string;
  let context: TestServerContext;

  beforeAll(async () => {
    tmpDir = await createTempDir();
    context = await createTestServer(tmpDir);
  });

  afterAll(async () => {
    await context?.close();
    await cleanupTempDir(tmpDir);
  });

  it('should expose every pipeline step', async () => {
    const { tools } = await context.client.listTools();
    expect(tools.map(t => t.name).sort()).toEqual([
      'copy_piston_pr',
      'extract_geometry',
      'parse_scale_factors',
      'preview_variants',
      'run_batch',
      'server_log',
      'stage_zscalar_input',
      'synthesize_variants',
      'verify_base_folder',
    ]);
  });
});

describe('sweep workflow', () => {
  let base: string;
  let context: TestServerContext;

  beforeAll(async () => {
    base = await createTempDir();
    await createBaseFolder(base);
    context = await createTestServer(base);
  });

  afterAll(async () => {
    await context?.close();
    await cleanupTempDir(base);
  });

  it('should verify the base folder', async () => {
    const data = await callTool(context.client, 'verify_base_folder');
    expect(data).toMatchObject({ success: true, base_folder: base, sub_cases: ['T1'] });
  });

  it('should stage the Zscalar input once', async () => {
    expect(await callTool(context.client, 'stage_zscalar_input')).toMatchObject({
      success: true,
      status: 'copied',
      destination: path.join(base, 'Zscalar', 'piston_pr.inp'),
    });
    expect(await callTool(context.client, 'stage_zscalar_input')).toMatchObject({ success: true, status: 'exists' });
  });

  it('should extract the base geometry', async () => {
    expect(await callTool(context.client, 'extract_geometry')).toEqual({
      success: true,
      geometry_file: path.join(base, 'geometry.txt'),
      parameters: { lK: 100, lZ0: 50, lKG: 30, lSK: 20 },
      missing: [],
      table: [
        '  lK         =   100.000000 mm',
        '  lZ0        =    50.000000 mm',
        '  lKG        =    30.000000 mm',
        '  lSK        =    20.000000 mm',
      ].join('\n'),
    });
  });

  it('should parse the scale table and report bad rows', async () => {
    expect(await callTool(context.client, 'parse_scale_factors', { table_file: 'scales.csv' })).toEqual({
      success: true,
      source: path.join(base, 'scales.csv'),
      count: 2,
      scales: [0, 10],
      warnings: [{ row: 4, value: 'bad', reason: "could not convert 'bad' to a number" }],
    });
  });

  it('should parse an inline table', async () => {
    expect(await callTool(context.client, 'parse_scale_factors', { text: 'scale\n1.5\n' })).toMatchObject({
      success: true,
      source: 'inline',
      scales: [1.5],
    });
  });

  it('should preview variants without writing anything', async () => {
    const data = await callTool(context.client, 'preview_variants', { scales: [5, 5.5], lz0_direction: 'subtract' });
    expect(data).toMatchObject({
      success: true,
      base: { lK: 100, lZ0: 50, lKG: 30, lSK: 20 },
      variants: [
        { scale: 5, name: 'IM_scaled_piston_5', scaled: { lK: 105, lZ0: 45 }, display: { lK: '105.000000' } },
        { scale: 5.5, name: 'IM_scaled_piston_5', overwrites: 5 },
      ],
    });
    await expect(readFile(path.join(base, 'simulation', 'IM_scaled_piston_5', 'scalar.txt'))).rejects.toThrow();
  });

  it('should synthesize one variant per scale', async () => {
    const data = await callTool(context.client, 'synthesize_variants', { table_file: 'scales.csv' });
    expect(data).toMatchObject({
      success: true,
      message: 'Created 2/2 variant(s)',
      created: 2,
      failed: 0,
      variants: [
        { scale: 0, name: 'IM_scaled_piston_0', status: 'created', sub_cases: ['T1'], solver_options_updated: ['T1'] },
        { scale: 10, name: 'IM_scaled_piston_10', status: 'created', sub_cases: ['T1'], solver_options_updated: ['T1'] },
      ],
      warnings: [{ row: 4 }],
    });

    const variant = path.join(base, 'simulation', 'IM_scaled_piston_10');
    expect(await readFile(path.join(variant, 'scalar.txt'), 'utf-8')).toBe(
      'IM_piston/piston_pr.inp\nIM_piston/piston.inp\n0 0\n100 110\n'
    );
    expect(await readFile(path.join(variant, 'T1', 'input', 'options_piston.txt'), 'utf-8')).toBe(
      `IM_piston_path ${path.join(variant, 'IM_piston')}\n`
    );
  });

  it('should copy the auxiliary input into every variant', async () => {
    expect(await callTool(context.client, 'copy_piston_pr')).toMatchObject({
      success: true,
      copied: 2,
      failed: 0,
      message: 'Copied piston_pr.inp to 2/2 variant(s)',
    });
  });

  it('should rescale every variant mesh', async () => {
    const data = await callTool(context.client, 'run_batch');
    expect(data).toMatchObject({
      success: true,
      message: 'Processed 2 variant(s): 2 succeeded, 0 failed, 0 skipped, 0 timed out',
      total: 2,
      successful: 2,
      results: [
        { variant: 'IM_scaled_piston_0', path: path.join('simulation', 'IM_scaled_piston_0'), status: 'success' },
        { variant: 'IM_scaled_piston_10', path: path.join('simulation', 'IM_scaled_piston_10'), status: 'success' },
      ],
    });

    const mesh = await readFile(path.join(base, 'simulation', 'IM_scaled_piston_10', 'IM_piston', 'piston.inp'), 'utf-8');
    expect(mesh).toBe([
      '*NODE',
      '1         ,  0.0000000000000E+00,  0.0000000000000E+00,  5.5000000000000E+01',
      '2         ,  0.0000000000000E+00,  0.0000000000000E+00,  1.6000000000000E+02',
      '',
    ].join('\n'));
  });

  it('should keep the pipeline events in the server log', async () => {
    const data = await callTool(context.client, 'server_log', { component: 'batch', limit: 100 });
    expect(data).toMatchObject({
      entries: expect.arrayContaining([
        expect.objectContaining({
          level: 'info',
          message: 'Processed 2 variant(s): 2 succeeded, 0 failed, 0 skipped, 0 timed out',
        }),
      ]),
    });
  });
});

describe('tool failures', () => {
  let tmpDir: string;
  let context: TestServerContext;

  beforeAll(async () => {
    tmpDir = await createTempDir();
    context = await createTestServer(tmpDir);
  });

  afterAll(async () => {
    await context?.close();
    await cleanupTempDir(tmpDir);
  });

  it('should report missing critical items', async () => {
    const data = await callTool(context.client, 'verify_base_folder');
    expect(data).toMatchObject({ success: false, sub_cases: [] });
  });

  it('should report a missing geometry file', async () => {
    expect(await callTool(context.client, 'extract_geometry')).toEqual({
      success: false,
      message: `Geometry file not found: ${path.join(tmpDir, 'geometry.txt')}`,
    });
  });

  it('should require a scale source', async () => {
    expect(await callTool(context.client, 'parse_scale_factors')).toEqual({
      success: false,
      message: 'Provide table_file or text',
    });
  });

  it('should stop a batch without variants', async () => {
    const simulation = path.join(tmpDir, 'simulation');
    expect(await callTool(context.client, 'run_batch')).toMatchObject({
      success: false,
      message: `Simulation folder not found: ${simulation}`,
      total: 0,
    });
  });

  it('should stop the copy when the source is missing', async () => {
    expect(await callTool(context.client, 'copy_piston_pr')).toMatchObject({
      success: false,
      message: `Auxiliary input file not found: ${path.join(tmpDir, 'INP', 'piston_pr.inp')}`,
    });
  });

  it('should filter the server log by level', async () => {
    const data = await callTool(context.client, 'server_log', { level: 'error', limit: 100 });
    expect(data).toMatchObject({
      entries: expect.arrayContaining([
        expect.objectContaining({ component: 'batch', message: `Simulation folder not found: ${path.join(tmpDir, 'simulation')}` }),
      ]),
    });
  });
});
