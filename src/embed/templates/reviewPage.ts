import { renderLayout, renderPageHeader } from './layout';
import { renderContentSection } from './contentSection';
import { renderCodeDisplay, type CodeDisplayData } from './codeDisplay';
import { renderReviewPanel, type ReviewPanelData } from './reviewPanel';
import type { ThemeName } from '../styles/tokens';

export type ReviewPageData = CodeDisplayData & ReviewPanelData & { theme: ThemeName };

export function renderReviewPage(data: ReviewPageData): string {
  const body = `
  <div class="dash">
    <div class="dash-inner">
      ${renderPageHeader('Code Review', 'Find and describe the problems in the code below')}
      ${renderContentSection({ title: 'Java Code to Review', body: renderCodeDisplay(data) })}
      ${renderReviewPanel(data)}
    </div>
  </div>`;

  return renderLayout({ title: 'Code Review', body, theme: data.theme });
}
