export const THEME_NAMES = ['light', 'dark'] as const;
export type ThemeName = (typeof THEME_NAMES)[number];

export type ColorToken =
  | 'primary'
  | 'primary-dark'
  | 'primary-bg'
  | 'secondary'
  | 'success'
  | 'success-bg'
  | 'warning'
  | 'warning-bg'
  | 'danger'
  | 'danger-bg'
  | 'info'
  | 'info-bg'
  | 'text'
  | 'text-muted'
  | 'background'
  | 'card-bg'
  | 'muted-bg'
  | 'border'
  | 'shadow'
  | 'gpu-color'
  | 'gpu-bg';

export type Palette = Record<ColorToken, string>;

export const PALETTES: Record<ThemeName, Palette> = {
  light: {
    'primary': '#4c68d7',
    'primary-dark': '#3a52b5',
    'primary-bg': 'rgba(76, 104, 215, 0.1)',
    'secondary': '#6c757d',
    'success': '#2e7d32',
    'success-bg': '#e8f5e9',
    'warning': '#ffc107',
    'warning-bg': 'rgba(255, 193, 7, 0.1)',
    'danger': '#dc3545',
    'danger-bg': 'rgba(220, 53, 69, 0.1)',
    'info': '#17a2b8',
    'info-bg': 'rgba(23, 162, 184, 0.1)',
    'text': '#2c3e50',
    'text-muted': '#6c757d',
    'background': '#f5f7fb',
    'card-bg': '#ffffff',
    'muted-bg': '#f5f5f5',
    'border': '#e0e4ec',
    'shadow': 'rgba(0, 0, 0, 0.1)',
    'gpu-color': '#76b900',
    'gpu-bg': 'rgba(118, 185, 0, 0.1)',
  },
  dark: {
    'primary': '#6c8aff',
    'primary-dark': '#4c68d7',
    'primary-bg': 'rgba(108, 138, 255, 0.15)',
    'secondary': '#9aa4b2',
    'success': '#66bb6a',
    'success-bg': 'rgba(102, 187, 106, 0.15)',
    'warning': '#ffca28',
    'warning-bg': 'rgba(255, 202, 40, 0.12)',
    'danger': '#ef5350',
    'danger-bg': 'rgba(239, 83, 80, 0.15)',
    'info': '#4dd0e1',
    'info-bg': 'rgba(77, 208, 225, 0.12)',
    'text': '#e4e6eb',
    'text-muted': '#9aa4b2',
    'background': '#0f1117',
    'card-bg': '#1a1d24',
    'muted-bg': '#242832',
    'border': '#2d323c',
    'shadow': 'rgba(0, 0, 0, 0.4)',
    'gpu-color': '#8fd14f',
    'gpu-bg': 'rgba(143, 209, 79, 0.12)',
  },
};

/** Theme-independent scales, declared once on :root. */
export const SCALE_TOKENS = {
  'space-xs': '4px',
  'space-sm': '8px',
  'space-md': '16px',
  'space-lg': '24px',
  'space-xl': '32px',
  'radius-sm': '5px',
  'radius-md': '10px',
  'radius-lg': '14px',
  'radius-pill': '9999px',
  'font': "'Inter',-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif",
  'font-mono': "'Roboto Mono','SFMono-Regular',Menlo,Consolas,monospace",
} as const;

export type ScaleToken = keyof typeof SCALE_TOKENS;

export function customProperty(token: ColorToken | ScaleToken): string {
  return `--${token}`;
}

/** `--name:value;` pairs in insertion order. */
export function renderDeclarations(tokens: Readonly<Record<string, string>>): string {
  return Object.entries(tokens)
    .map(([name, value]) => `--${name}:${value};`)
    .join('');
}

export function isThemeName(value: unknown): value is ThemeName {
  return THEME_NAMES.some((name) => name === value);
}

export function parseTheme(value: unknown, fallback: ThemeName): ThemeName {
  return isThemeName(value) ? value : fallback;
}
