export interface GpuMetrics {
  index: number;
  name: string;
  utilizationPercent: number | null;
  memoryUsedMiB: number | null;
  memoryTotalMiB: number | null;
  temperatureC: number | null;
  powerDrawW: number | null;
}

export interface GpuSnapshot {
  available: boolean;
  gpus: GpuMetrics[];
  collectedAt: string;
  error?: string;
}

export interface GpuStatusProvider {
  getSnapshot(): Promise<GpuSnapshot>;
}

export type MetricLevel = 'ok' | 'warning' | 'critical';

export interface LevelThreshold {
  warning: number;
  critical: number;
}

export interface GpuThresholds {
  utilization: LevelThreshold;
  temperature: LevelThreshold;
  memory: LevelThreshold;
}

const LEVEL_RANK: Record<MetricLevel, number> = { ok: 0, warning: 1, critical: 2 };

/** Unknown readings never raise the level. */
export function levelFor(value: number | null, threshold: LevelThreshold): MetricLevel {
  if (value === null) return 'ok';
  if (value >= threshold.critical) return 'critical';
  if (value >= threshold.warning) return 'warning';
  return 'ok';
}

export function worstLevel(levels: MetricLevel[]): MetricLevel {
  return levels.reduce<MetricLevel>((worst, l) => (LEVEL_RANK[l] > LEVEL_RANK[worst] ? l : worst), 'ok');
}

export function memoryPercent(gpu: GpuMetrics): number | null {
  if (gpu.memoryUsedMiB === null || gpu.memoryTotalMiB === null || gpu.memoryTotalMiB <= 0) return null;
  return (gpu.memoryUsedMiB / gpu.memoryTotalMiB) * 100;
}

export function classifyGpu(gpu: GpuMetrics, thresholds: GpuThresholds): MetricLevel {
  return worstLevel([
    levelFor(gpu.utilizationPercent, thresholds.utilization),
    levelFor(gpu.temperatureC, thresholds.temperature),
    levelFor(memoryPercent(gpu), thresholds.memory),
  ]);
}

export function snapshotLevel(snapshot: GpuSnapshot, thresholds: GpuThresholds): MetricLevel | 'offline' {
  if (!snapshot.available) return 'offline';
  return worstLevel(snapshot.gpus.map((gpu) => classifyGpu(gpu, thresholds)));
}
