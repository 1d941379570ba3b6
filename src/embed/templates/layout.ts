import { THEME_CSS } from '../styles/theme';
import { THEME_TOGGLE_SCRIPT } from '../styles/themeToggle';
import type { ThemeName } from '../styles/tokens';

export function renderLayout(opts: {
  title?: string;
  body: string;
  theme?: ThemeName;
  scripts?: string;
}): string {
  const { title = 'Peer Review Dashboard', body, theme = 'light', scripts = '' } = opts;

  return `<!DOCTYPE html>
<html lang="en" data-theme="${theme}">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>${THEME_CSS}</style>
  <script>${THEME_TOGGLE_SCRIPT}</script>
</head>
<body>
${body}
${scripts}
</body>
</html>`;
}

export function renderThemeToggle(): string {
  return `<button type="button" class="theme-toggle" data-theme-toggle aria-label="Toggle light and dark theme">◐ Theme</button>`;
}

/** `meta` and `extra` are HTML. */
export function renderPageHeader(title: string, meta: string, extra = ''): string {
  return `
      <div class="dash-head">
        <div>
          <div class="dash-title">${escapeHtml(title)}</div>
          <div class="dash-meta">${meta}</div>
        </div>
        <div>${extra}${renderThemeToggle()}</div>
      </div>`;
}

export function escapeHtml(str: string | null | undefined): string {
  if (!str) return '';
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
