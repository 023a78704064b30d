import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { runRescaleWorker, type WorkerIO } from '../src/worker.js';
import { cleanupTempDir, createTempDir, readFixture, writeFixture } from './helpers/testUtils.js';

interface RecordedLines {
  out: string[];
  err: string[];
}

function recordingIO(): WorkerIO & { lines: RecordedLines } {
  const lines: RecordedLines = { out: [], err: [] };
  return {
    lines,
    out: (line) => lines.out.push(line),
    err: (line) => lines.err.push(line),
  };
}

describe('runRescaleWorker', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tmpDir);
  });

  it('should print usage for a wrong argument count', async () => {
    const io = recordingIO();
    expect(await runRescaleWorker([], io)).toBe(1);
    expect(io.lines.err).toEqual(['Usage: piston-rescale <scalar-config-file>']);
  });

  it('should rescale and report the node count', async () => {
    await writeFixture(tmpDir, 'IM_piston/piston_pr.inp', '*NODE\n1, 0, 0, 5\n2, 0, 0, 20\n');
    const configFile = await writeFixture(tmpDir, 'scalar.txt', 'IM_piston/piston_pr.inp\nIM_piston/piston.inp\n0 0\n10 20\n');
    const io = recordingIO();

    expect(await runRescaleWorker([configFile], io)).toBe(0);
    expect(io.lines.out).toEqual([`Rescaled 2 node(s) into ${path.join(tmpDir, 'IM_piston', 'piston.inp')}`]);
    expect(io.lines.err).toEqual([]);
    expect(await readFixture(tmpDir, 'IM_piston/piston.inp')).toContain('3.0000000000000E+01');
  });

  it('should exit 1 and print the failure', async () => {
    const configFile = path.join(tmpDir, 'scalar.txt');
    const io = recordingIO();

    expect(await runRescaleWorker([configFile], io)).toBe(1);
    expect(io.lines.err).toEqual([
      `[piston-doe] ERROR [rescale] Rescale failed for ${configFile}: Scalar-config file not found: ${configFile}`,
    ]);
  });
});
