/**
 * Runtime configuration from environment variables
 *
 *   DOE_BASE_FOLDER         base folder (default: cwd)
 *   DOE_RESCALE_MODE        in-process | isolated (default: in-process)
 *   DOE_MAX_WORKERS         batch concurrency (default: available parallelism)
 *   DOE_RESCALE_TIMEOUT_MS  isolated task timeout (default: 300000)
 *   DOE_RESCALE_SCRIPT      explicit rescale worker path
 *   DOE_LZ0_DIRECTION       add | subtract (default: add)
 *
 * Invalid values fall back to the defaults and are reported as warnings.
 */

import { z } from 'zod';
import { DEFAULT_RESCALE_TIMEOUT_MS } from './constants.js';
import { DEFAULT_LZ0_DIRECTION } from './derive.js';
import type { RescaleMode } from './runners.js';
import type { Lz0Direction } from './types.js';

export interface DoeConfig {
  baseFolder: string;
  rescaleMode: RescaleMode;
  /** Undefined means available parallelism */
  maxWorkers?: number;
  rescaleTimeoutMs: number;
  rescaleScript?: string;
  lz0Direction: Lz0Direction;
}

export const RescaleModeSchema = z.enum(['in-process', 'isolated']);
export const Lz0DirectionSchema = z.enum(['add', 'subtract']);

const PositiveIntSchema = z.coerce.number().int().positive();

export interface LoadedConfig {
  config: DoeConfig;
  warnings: string[];
}

export function loadDoeConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): LoadedConfig {
  const warnings: string[] = [];

  function read<T>(name: string, schema: z.ZodType<T>): T | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }
    const parsed = schema.safeParse(raw.trim());
    if (!parsed.success) {
      warnings.push(`${name}=${raw} is invalid, using default`);
      return undefined;
    }
    return parsed.data;
  }

  const config: DoeConfig = {
    baseFolder: env.DOE_BASE_FOLDER?.trim() || cwd,
    rescaleMode: read('DOE_RESCALE_MODE', RescaleModeSchema) ?? 'in-process',
    maxWorkers: read('DOE_MAX_WORKERS', PositiveIntSchema),
    rescaleTimeoutMs: read('DOE_RESCALE_TIMEOUT_MS', PositiveIntSchema) ?? DEFAULT_RESCALE_TIMEOUT_MS,
    rescaleScript: env.DOE_RESCALE_SCRIPT?.trim() || undefined,
    lz0Direction: read('DOE_LZ0_DIRECTION', Lz0DirectionSchema) ?? DEFAULT_LZ0_DIRECTION,
  };

  return { config, warnings };
}
