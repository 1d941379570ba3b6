import type { ThemeName } from './tokens';

export const THEME_STORAGE_KEY = 'dashboard-theme';

export function nextTheme(theme: ThemeName): ThemeName {
  return theme === 'dark' ? 'light' : 'dark';
}

/**
 * Client-side toggle. A stored preference wins over the server-rendered
 * `data-theme`; clicking any `[data-theme-toggle]` flips the attribute on <html>.
 */
export const THEME_TOGGLE_SCRIPT = `
(function () {
  var root = document.documentElement;
  var key = '${THEME_STORAGE_KEY}';
  try {
    var stored = localStorage.getItem(key);
    if (stored === 'light' || stored === 'dark') root.setAttribute('data-theme', stored);
  } catch (e) { /* storage disabled */ }
  document.addEventListener('click', function (ev) {
    var target = ev.target instanceof Element ? ev.target.closest('[data-theme-toggle]') : null;
    if (!target) return;
    var next = root.getAttribute('data-theme') === 'dark' ? 'light' : 'dark';
    root.setAttribute('data-theme', next);
    try { localStorage.setItem(key, next); } catch (e) { /* storage disabled */ }
  });
})();
`;
