import { escapeHtml } from './layout';
import { renderStatusBadge } from './statusBadge';
import { renderWarningMessage } from './contentSection';
import {
  classifyGpu,
  levelFor,
  memoryPercent,
  type GpuMetrics,
  type GpuSnapshot,
  type GpuThresholds,
  type MetricLevel,
} from '../../gpu/gpuStatus';

const LEVEL_LABEL: Record<MetricLevel, string> = {
  ok: 'Healthy',
  warning: 'High load',
  critical: 'Critical',
};

function fmtGiB(mib: number): string {
  return (mib / 1024).toFixed(1);
}

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, Math.round(value)));
}

/** `percent` is the bar width; temperature is scaled against its critical threshold. */
function renderBarRow(label: string, display: string, percent: number | null, level: MetricLevel): string {
  const width = percent === null ? 0 : clampPercent(percent);
  const fillClass = level === 'ok' ? 'gpu-usage-fill' : `gpu-usage-fill level-${level}`;
  return `
      <div class="gpu-metric-row">
        <span class="gpu-metric-label">${label}</span>
        <div class="gpu-usage-bar"><div class="${fillClass}" style="width:${width}%"></div></div>
        <span class="gpu-metric-value">${escapeHtml(display)}</span>
      </div>`;
}

export function renderGpuMetricCard(gpu: GpuMetrics, thresholds: GpuThresholds): string {
  const level = classifyGpu(gpu, thresholds);
  const memPct = memoryPercent(gpu);

  const utilization = renderBarRow(
    'Utilization',
    gpu.utilizationPercent === null ? '—' : `${gpu.utilizationPercent}%`,
    gpu.utilizationPercent,
    levelFor(gpu.utilizationPercent, thresholds.utilization),
  );
  const memory = renderBarRow(
    'Memory',
    gpu.memoryUsedMiB === null || gpu.memoryTotalMiB === null
      ? '—'
      : `${fmtGiB(gpu.memoryUsedMiB)} / ${fmtGiB(gpu.memoryTotalMiB)} GiB`,
    memPct,
    levelFor(memPct, thresholds.memory),
  );
  const temperature = renderBarRow(
    'Temperature',
    gpu.temperatureC === null ? '—' : `${gpu.temperatureC}°C`,
    gpu.temperatureC === null ? null : (gpu.temperatureC / thresholds.temperature.critical) * 100,
    levelFor(gpu.temperatureC, thresholds.temperature),
  );

  return `
  <div class="gpu-metric-card gpu-${level}">
    <div class="gpu-metric-header">
      <div><span class="gpu-name">${escapeHtml(gpu.name)}</span><span class="gpu-index">#${gpu.index}</span></div>
      ${renderStatusBadge(level, LEVEL_LABEL[level])}
    </div>
    ${utilization}
    ${memory}
    ${temperature}
      <div class="gpu-metric-row">
        <span class="gpu-metric-label">Power</span>
        <span class="gpu-metric-value">${gpu.powerDrawW === null ? '—' : `${gpu.powerDrawW.toFixed(1)} W`}</span>
      </div>
  </div>`;
}

export function renderGpuGrid(snapshot: GpuSnapshot, thresholds: GpuThresholds): string {
  if (!snapshot.available) {
    const reason = snapshot.error ? `GPU metrics unavailable: ${snapshot.error}` : 'No GPUs detected.';
    return `${renderStatusBadge('offline')}${renderWarningMessage(reason)}`;
  }
  return `<div class="gpu-grid">${snapshot.gpus.map((gpu) => renderGpuMetricCard(gpu, thresholds)).join('')}</div>`;
}
