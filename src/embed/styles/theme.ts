import { PALETTES, SCALE_TOKENS, renderDeclarations } from './tokens';
import type { ThemeName } from './tokens';
import { renderThemeBlock } from './cssVars';

const ROOT_BLOCK = renderThemeBlock(
  ':root',
  renderDeclarations(SCALE_TOKENS) + renderDeclarations(PALETTES.light),
);

const DARK_BLOCK = renderThemeBlock('[data-theme="dark"]', renderDeclarations(PALETTES.dark));

const COMPONENT_CSS = `
*,*::before,*::after{box-sizing:border-box;margin:0;padding:0}
html,body{font-family:var(--font);font-size:14px;line-height:1.5;color:var(--text);background:var(--background);-webkit-font-smoothing:antialiased;transition:background .2s,color .2s}

/* ── SHELL ── */
.dash{padding:var(--space-lg);min-height:100vh}
.dash-inner{max-width:1280px;margin:0 auto}
.dash-head{display:flex;align-items:flex-start;justify-content:space-between;flex-wrap:wrap;gap:12px;margin-bottom:var(--space-lg)}
.dash-title{font-size:22px;font-weight:800;letter-spacing:-.4px;line-height:1.2}
.dash-meta{font-size:13px;color:var(--text-muted);margin-top:3px}
.dash-footer{text-align:center;font-size:11px;color:var(--text-muted);padding:28px 0 16px}
.theme-toggle{display:inline-flex;align-items:center;gap:6px;background:var(--card-bg);color:var(--text);border:1px solid var(--border);border-radius:var(--radius-pill);padding:6px 14px;font:inherit;font-size:12px;font-weight:600;cursor:pointer}
.theme-toggle:hover{border-color:var(--primary);color:var(--primary)}
.badge-row{display:flex;align-items:center;flex-wrap:wrap;gap:6px;margin-top:6px}
.action-link{font-size:12px;font-weight:600;color:var(--primary);text-decoration:none}

/* ── CONTENT SECTION ── */
.content-section{background:var(--card-bg);border:1px solid var(--border);border-radius:var(--radius-md);padding:var(--space-lg);margin-bottom:var(--space-lg);box-shadow:0 1px 3px var(--shadow)}
.content-section-title{font-size:1.25rem;font-weight:600;color:var(--text);margin-bottom:var(--space-xs)}
.content-section-subtitle{font-size:13px;color:var(--text-muted);margin-bottom:var(--space-md)}
.info-message{background:var(--info-bg);border-left:4px solid var(--info);border-radius:var(--radius-sm);padding:12px 16px;color:var(--text)}
.warning-message{background:var(--warning-bg);border-left:4px solid var(--warning);border-radius:var(--radius-sm);padding:12px 16px;color:var(--text)}

/* ── STATUS BADGE ── */
.status-badge{display:inline-flex;align-items:center;gap:4px;padding:3px 10px;border-radius:var(--radius-pill);font-size:12px;font-weight:600;white-space:nowrap}
.status-badge.status-ok      {background:var(--success-bg);color:var(--success)}
.status-badge.status-warning {background:var(--warning-bg);color:var(--warning)}
.status-badge.status-critical{background:var(--danger-bg); color:var(--danger)}
.status-badge.status-offline {background:var(--muted-bg);  color:var(--text-muted)}
.status-badge.status-info    {background:var(--info-bg);   color:var(--info)}

/* ── GPU METRICS ── */
.gpu-grid{display:grid;grid-template-columns:repeat(auto-fit,minmax(260px,1fr));gap:var(--space-md)}
.gpu-metric-card{background:var(--card-bg);border:1px solid var(--border);border-left:4px solid var(--gpu-color);border-radius:var(--radius-md);padding:var(--space-md);box-shadow:0 1px 3px var(--shadow)}
.gpu-metric-card.gpu-warning{border-left-color:var(--warning)}
.gpu-metric-card.gpu-critical{border-left-color:var(--danger)}
.gpu-metric-header{display:flex;align-items:center;justify-content:space-between;gap:8px;margin-bottom:12px}
.gpu-name{font-size:15px;font-weight:700;color:var(--text)}
.gpu-index{font-size:12px;font-weight:500;color:var(--text-muted);margin-left:4px}
.gpu-metric-row{display:flex;align-items:center;gap:10px;padding:5px 0}
.gpu-metric-label{width:92px;flex-shrink:0;font-size:11px;font-weight:700;text-transform:uppercase;letter-spacing:.5px;color:var(--text-muted)}
.gpu-metric-value{min-width:86px;text-align:right;font-size:13px;font-weight:600;color:var(--text);font-variant-numeric:tabular-nums}
.gpu-usage-bar{flex:1;height:8px;background:var(--gpu-bg);border-radius:var(--radius-pill);overflow:hidden}
.gpu-usage-fill{height:100%;border-radius:var(--radius-pill);background:var(--gpu-color)}
.gpu-usage-fill.level-warning{background:var(--warning)}
.gpu-usage-fill.level-critical{background:var(--danger)}

/* ── CODE DISPLAY ── */
.code-block{background:var(--muted-bg);border:1px solid var(--border);border-radius:var(--radius-sm);padding:12px 0;overflow-x:auto;font-family:var(--font-mono);font-size:13px;line-height:1.6}
.code-line{display:block;white-space:pre;padding:0 16px}
.line-number{display:inline-block;color:var(--text-muted);user-select:none}
.known-problems{margin-top:var(--space-md);padding-left:20px;color:var(--text)}

/* ── REVIEW ── */
.review-container{background:var(--card-bg);border-radius:var(--radius-md);border:1px solid var(--border);padding:20px;margin-bottom:20px;box-shadow:0 1px 3px var(--shadow)}
.review-header{display:flex;align-items:center;justify-content:space-between;margin-bottom:15px}
.review-title{font-size:1.25rem;font-weight:600;color:var(--text)}
.iteration-badge{display:inline-flex;align-items:center;background:var(--primary);color:#fff;padding:5px 12px;border-radius:20px;font-size:.85rem;font-weight:500;box-shadow:0 2px 4px var(--shadow)}
.guidance-box{background:var(--primary-bg);border-left:4px solid var(--primary);padding:16px;margin:15px 0;border-radius:var(--radius-sm);color:var(--text)}
.guidance-title{display:flex;align-items:center;margin-bottom:10px;font-weight:600;color:var(--primary)}
.guidance-icon{margin-right:8px;font-size:1.1rem}
.analysis-box{background:var(--warning-bg);border-left:4px solid var(--warning);padding:16px;margin:15px 0;border-radius:var(--radius-sm);color:var(--text)}
.review-history-box{background:var(--card-bg);border:1px solid var(--border);border-radius:var(--radius-sm);padding:15px;margin-top:10px;max-height:250px;overflow-y:auto}
.review-history-box pre{margin:0;white-space:pre-wrap;font-size:.85rem;color:var(--text)}
.review-textarea textarea{width:100%;background:var(--card-bg);border:1px solid var(--border);border-radius:var(--radius-sm);padding:12px;font-family:var(--font-mono);font-size:.9rem;min-height:250px;color:var(--text)}
.button-container{display:flex;gap:10px;margin-top:15px}
.submit-button{flex:3}
.clear-button{flex:1}
.btn{width:100%;padding:10px 16px;border-radius:var(--radius-sm);border:1px solid var(--border);background:var(--card-bg);color:var(--text);font:inherit;font-weight:600;cursor:pointer}
.btn-primary{background:var(--primary);border-color:var(--primary-dark);color:#fff}

/* ── ERROR SELECTOR ── */
.error-type-header{font-size:13px;font-weight:700;text-transform:uppercase;letter-spacing:.6px;color:var(--primary);padding-bottom:6px;border-bottom:1px solid var(--border);margin:var(--space-md) 0 var(--space-sm)}
.error-columns{display:grid;grid-template-columns:1fr 1fr;gap:var(--space-md)}
.error-checkbox{display:flex;align-items:center;gap:8px;padding:4px 0;font-size:13px;color:var(--text)}
.error-category{display:inline-block;background:var(--primary-bg);color:var(--primary);border:1px solid var(--primary);border-radius:var(--radius-pill);padding:4px 12px;margin:0 8px 8px 0;font-size:12px;font-weight:500}
.problem-area-grid{display:grid;grid-template-columns:repeat(auto-fill,minmax(220px,1fr));gap:12px;margin:var(--space-md) 0}
.problem-area-card{display:block;background:var(--card-bg);border:1px solid var(--border);border-radius:var(--radius-md);padding:14px 16px;cursor:pointer;transition:border-color .2s,transform .15s}
.problem-area-card:hover{transform:translateY(-2px);border-color:var(--primary)}
.problem-area-card.selected,.problem-area-card:has(input:checked){border-color:var(--primary);background:var(--primary-bg)}
.problem-area-title{font-weight:600;color:var(--text);margin-bottom:4px}
.problem-area-description{font-size:12px;color:var(--text-muted)}
.mode-selector{display:flex;flex-wrap:wrap;gap:var(--space-md);margin-bottom:var(--space-sm)}
.param-value{font-size:13px;color:var(--text);margin-top:var(--space-sm)}
.error-selection-form .model-header .btn{width:auto}

/* ── MODEL CARDS ── */
.model-card{background:var(--card-bg);border-radius:var(--radius-md);padding:12px 15px;margin-bottom:12px;box-shadow:0 1px 3px var(--shadow);transition:transform .2s;border-left:4px solid var(--border)}
.model-card:hover{transform:translateY(-2px)}
.model-card.available{border-left-color:var(--success)}
.model-card.not-available{border-left-color:var(--secondary)}
.model-header{display:flex;justify-content:space-between;align-items:center;margin-bottom:8px}
.model-name{font-size:16px;font-weight:600;color:var(--text)}
.model-id{color:var(--text-muted);font-size:13px;font-weight:normal;margin-left:5px}
.model-status{font-size:12px;padding:3px 10px;border-radius:12px;font-weight:500}
.status-available{background:var(--success-bg);color:var(--success)}
.status-not-available{background:var(--muted-bg);color:var(--text-muted)}
.model-description{font-size:14px;color:var(--text);line-height:1.4}
.role-table{width:100%;border-collapse:collapse;font-size:13px;margin-top:var(--space-sm)}
.role-table th{text-align:left;padding:8px 12px;background:var(--muted-bg);border-bottom:1px solid var(--border);font-size:11px;text-transform:uppercase;letter-spacing:.5px;color:var(--text-muted)}
.role-table td{padding:8px 12px;border-bottom:1px solid var(--border);color:var(--text)}
`;

export const THEME_CSS = `${ROOT_BLOCK}\n${DARK_BLOCK}\n${COMPONENT_CSS}`;

/** Every custom property in effect under the given theme, without the leading dashes. */
export function themeVariables(theme: ThemeName): Record<string, string> {
  return { ...SCALE_TOKENS, ...PALETTES[theme] };
}
