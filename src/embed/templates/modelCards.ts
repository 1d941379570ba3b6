import { escapeHtml } from './layout';
import { renderInfoMessage, renderWarningMessage } from './contentSection';
import { MODEL_ROLES, type ModelInfo, type ModelRole } from '../../models/ollamaClient';

const ROLE_LABELS: Record<ModelRole, string> = {
  generative: 'Code Generation',
  review: 'Review Analysis',
  summary: 'Summary Generation',
  compare: 'Comparison',
};

function fmtSize(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
}

export function renderModelCard(model: ModelInfo): string {
  const statusClass = model.pulled ? 'available' : 'not-available';
  const statusText = model.pulled ? 'Available' : 'Not pulled';
  const size = model.sizeBytes !== undefined ? ` · ${fmtSize(model.sizeBytes)}` : '';

  return `
  <div class="model-card ${statusClass}">
    <div class="model-header">
      <div class="model-name">${escapeHtml(model.name)} <span class="model-id">(${escapeHtml(model.id)})</span></div>
      <div class="model-status status-${statusClass}">${statusText}</div>
    </div>
    <div class="model-description">${escapeHtml(model.description)}${escapeHtml(size)}</div>
  </div>`;
}

export function renderModelCards(models: readonly ModelInfo[]): string {
  if (models.length === 0) return renderInfoMessage('No models found. Pull a model to get started.');
  return models.map(renderModelCard).join('');
}

/** Which model serves each role; roles pointing at a model that is not pulled are flagged. */
export function renderRoleTable(roles: Record<ModelRole, string>, models: readonly ModelInfo[]): string {
  const pulled = new Set(models.filter((m) => m.pulled).map((m) => m.id));
  if (pulled.size === 0) {
    return renderWarningMessage('No models are available. Please pull at least one model.');
  }

  const rows = MODEL_ROLES.map((role) => {
    const modelId = roles[role];
    const badge = pulled.has(modelId)
      ? '<span class="model-status status-available">Ready</span>'
      : '<span class="model-status status-not-available">Not pulled</span>';
    return `<tr><td>${ROLE_LABELS[role]}</td><td>${escapeHtml(modelId)}</td><td>${badge}</td></tr>`;
  }).join('');

  return `
  <table class="role-table">
    <thead><tr><th>Role</th><th>Model</th><th>Status</th></tr></thead>
    <tbody>${rows}</tbody>
  </table>`;
}
