import { escapeHtml } from './layout';

export interface ContentSectionData {
  title: string;
  subtitle?: string;
  /** Pre-rendered HTML. */
  body: string;
  id?: string;
}

export function renderContentSection(data: ContentSectionData): string {
  const idAttr = data.id ? ` id="${escapeHtml(data.id)}"` : '';
  return `
  <section class="content-section"${idAttr}>
    <h2 class="content-section-title">${escapeHtml(data.title)}</h2>
    ${data.subtitle ? `<p class="content-section-subtitle">${escapeHtml(data.subtitle)}</p>` : ''}
    ${data.body}
  </section>`;
}

export function renderInfoMessage(text: string): string {
  return `<div class="info-message">${escapeHtml(text)}</div>`;
}

export function renderWarningMessage(text: string): string {
  return `<div class="warning-message">${escapeHtml(text)}</div>`;
}
