import { escapeHtml, renderLayout, renderPageHeader } from './layout';
import { renderContentSection } from './contentSection';
import { renderStatusBadge } from './statusBadge';
import { renderGpuGrid } from './gpuMetricCard';
import { renderModelCards, renderRoleTable } from './modelCards';
import { snapshotLevel, type GpuSnapshot, type GpuThresholds } from '../../gpu/gpuStatus';
import type { ModelOverview, ModelRole } from '../../models/ollamaClient';
import type { CategorySelection } from '../../errors/schema';
import type { ThemeName } from '../styles/tokens';

export interface DashboardData {
  theme: ThemeName;
  gpu: GpuSnapshot;
  thresholds: GpuThresholds;
  models: ModelOverview;
  roles: Record<ModelRole, string>;
  categories: CategorySelection;
  generatedAt?: Date;
}

function renderCatalogSummary(categories: CategorySelection): string {
  return `
    <div class="badge-row">
      ${renderStatusBadge('info', `${categories.build.length} build categories`)}
      ${renderStatusBadge('info', `${categories.checkstyle.length} checkstyle categories`)}
    </div>
    <div class="button-container"><a class="btn" href="/errors">Open error selector</a></div>`;
}

export function renderDashboardPage(data: DashboardData): string {
  const level = snapshotLevel(data.gpu, data.thresholds);
  const updated = (data.generatedAt ?? new Date()).toLocaleString('en-US', {
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });

  const gpuSection = renderContentSection({
    id: 'gpu',
    title: 'GPU Status',
    subtitle: data.gpu.available ? `${data.gpu.gpus.length} GPU(s) detected` : undefined,
    body: renderGpuGrid(data.gpu, data.thresholds),
  });

  const modelsSection = renderContentSection({
    id: 'models',
    title: 'Models',
    subtitle: data.models.connected ? data.models.message : `Cannot connect to Ollama: ${data.models.message}`,
    body: `${renderModelCards(data.models.models)}${renderRoleTable(data.roles, data.models.models)}`,
  });

  const catalogSection = renderContentSection({
    id: 'errors',
    title: 'Error Catalog',
    body: renderCatalogSummary(data.categories),
  });

  const body = `
  <div class="dash">
    <div class="dash-inner">
      ${renderPageHeader('Peer Review Dashboard', `Updated ${escapeHtml(updated)}`, renderStatusBadge(level, `GPU ${level}`))}
      ${gpuSection}
      ${modelsSection}
      ${catalogSection}
      <div class="dash-footer">Code review training dashboard</div>
    </div>
  </div>`;

  return renderLayout({ title: 'Peer Review Dashboard', body, theme: data.theme });
}
