import { execFile } from 'child_process';
import { promisify } from 'util';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { logger } from '../utils/logger';
import type { GpuMetrics, GpuSnapshot, GpuStatusProvider } from './gpuStatus';

const execFileAsync = promisify(execFile);

export const NVIDIA_SMI_QUERY = [
  'index',
  'name',
  'utilization.gpu',
  'memory.used',
  'memory.total',
  'temperature.gpu',
  'power.draw',
] as const;

const csvRowsSchema = z.array(z.array(z.string()));

/** `[N/A]`, `[Not Supported]` and blanks become null. */
function toNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = Number(raw.trim());
  return raw.trim() !== '' && Number.isFinite(value) ? value : null;
}

/**
 * Parse `nvidia-smi --query-gpu=<NVIDIA_SMI_QUERY> --format=csv,noheader,nounits`.
 * Rows with fewer columns than queried are skipped.
 */
export function parseNvidiaSmiCsv(text: string): GpuMetrics[] {
  const rows = csvRowsSchema.parse(
    parse(text, {
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  const gpus: GpuMetrics[] = [];
  rows.forEach((row, position) => {
    if (row.length < NVIDIA_SMI_QUERY.length) {
      logger.warn('Skipping malformed nvidia-smi row', { row: row.join(',') });
      return;
    }
    const [index, name, utilization, memUsed, memTotal, temperature, power] = row;
    gpus.push({
      index: toNumber(index) ?? position,
      name,
      utilizationPercent: toNumber(utilization),
      memoryUsedMiB: toNumber(memUsed),
      memoryTotalMiB: toNumber(memTotal),
      temperatureC: toNumber(temperature),
      powerDrawW: toNumber(power),
    });
  });
  return gpus;
}

export class NvidiaSmiProvider implements GpuStatusProvider {
  constructor(private readonly opts: { binary: string; timeoutMs: number }) {}

  async getSnapshot(): Promise<GpuSnapshot> {
    const collectedAt = new Date().toISOString();
    try {
      const { stdout } = await execFileAsync(
        this.opts.binary,
        [`--query-gpu=${NVIDIA_SMI_QUERY.join(',')}`, '--format=csv,noheader,nounits'],
        { timeout: this.opts.timeoutMs },
      );
      const gpus = parseNvidiaSmiCsv(stdout);
      return { available: gpus.length > 0, gpus, collectedAt };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.warn('GPU query failed', { binary: this.opts.binary, error });
      return { available: false, gpus: [], collectedAt, error };
    }
  }
}
