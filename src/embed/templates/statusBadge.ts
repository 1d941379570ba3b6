import { escapeHtml } from './layout';

export type BadgeStatus = 'ok' | 'warning' | 'critical' | 'offline' | 'info';

const DEFAULT_LABELS: Record<BadgeStatus, string> = {
  ok: 'OK',
  warning: 'Warning',
  critical: 'Critical',
  offline: 'Offline',
  info: 'Info',
};

export function renderStatusBadge(status: BadgeStatus, label?: string): string {
  return `<span class="status-badge status-${status}">${escapeHtml(label ?? DEFAULT_LABELS[status])}</span>`;
}
