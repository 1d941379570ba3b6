import { escapeHtml } from './layout';
import { renderInfoMessage, renderWarningMessage } from './contentSection';
import {
  CODE_LENGTHS,
  DIFFICULTIES,
  ERROR_TYPES,
  type CatalogError,
  type CategorySelection,
  type CodeLength,
  type Difficulty,
  type ErrorType,
} from '../../errors/schema';
import type { ErrorsForLlmResult } from '../../errors/jsonErrorRepository';
import { PROBLEM_AREAS, PROBLEM_AREA_NAMES } from '../../errors/problemAreas';

const TYPE_HEADINGS: Record<ErrorType, string> = {
  build: 'Build Errors',
  checkstyle: 'Checkstyle Errors',
};

export const SELECTION_MODES = ['standard', 'advanced', 'specific'] as const;
export type SelectionMode = (typeof SELECTION_MODES)[number];

const MODE_OPTIONS: Record<SelectionMode, { label: string; help: string }> = {
  standard: {
    label: 'Standard: Select by problem areas (recommended)',
    help: 'Standard mode: Select general problem areas like Style, Logic, or Performance. The system will map these to specific error categories.',
  },
  advanced: {
    label: 'Advanced: Select by error categories',
    help: 'Advanced mode: Select specific error categories like LogicalErrors or NamingConventionChecks. The system will randomly select errors from these categories.',
  },
  specific: {
    label: 'Specific: Choose exact errors to include',
    help: 'Specific mode: Choose exactly which errors will appear in the generated code.',
  },
};

const DIFFICULTY_OPTIONS: Record<Difficulty, { label: string; explanation: string }> = {
  easy: { label: 'Easy', explanation: 'Basic errors that are relatively obvious, suitable for beginners' },
  medium: { label: 'Medium', explanation: 'More subtle errors requiring careful code reading, good for practice' },
  hard: { label: 'Hard', explanation: 'Complex, hard-to-spot errors that might require deeper Java knowledge' },
};

const LENGTH_OPTIONS: Record<CodeLength, { label: string; explanation: string }> = {
  short: { label: 'Short', explanation: '~50 lines of code, typically 1 class with a few methods' },
  medium: { label: 'Medium', explanation: '~100-150 lines, 1-2 classes with multiple methods' },
  long: { label: 'Long', explanation: '~200+ lines, multiple classes with complex relationships' },
};

export function isSelectionMode(value: unknown): value is SelectionMode {
  return SELECTION_MODES.some((mode) => mode === value);
}

/** `type:category:name`; the name may itself contain colons. */
export function specificErrorKey(error: Pick<CatalogError, 'type' | 'category' | 'name'>): string {
  return `${error.type}:${error.category}:${error.name}`;
}

export function parseSpecificErrorKey(key: string): { type: ErrorType; category: string; name: string } | null {
  const first = key.indexOf(':');
  const second = key.indexOf(':', first + 1);
  if (first < 0 || second < 0) return null;
  const type = key.slice(0, first);
  const category = key.slice(first + 1, second);
  const name = key.slice(second + 1);
  const errorType = ERROR_TYPES.find((t) => t === type);
  if (!errorType || !category || !name) return null;
  return { type: errorType, category, name };
}

function radio(name: string, value: string, label: string, checked: boolean): string {
  return `<label class="error-checkbox"><input type="radio" name="${name}" value="${value}"${checked ? ' checked' : ''}> ${escapeHtml(label)}</label>`;
}

export function renderModeSelector(mode: SelectionMode): string {
  const options = SELECTION_MODES.map((m) => radio('mode', m, MODE_OPTIONS[m].label, m === mode)).join('');
  return `
    <div class="mode-selector">${options}</div>
    ${renderInfoMessage(MODE_OPTIONS[mode].help)}
    <div class="button-container"><div class="submit-button"><button type="submit" class="btn btn-primary">Switch Mode</button></div></div>`;
}

export function renderCodeParams(params: { difficulty: Difficulty; length: CodeLength }): string {
  const difficulty = DIFFICULTIES.map((d) => radio('difficulty', d, DIFFICULTY_OPTIONS[d].label, d === params.difficulty)).join('');
  const length = CODE_LENGTHS.map((l) => radio('length', l, LENGTH_OPTIONS[l].label, l === params.length)).join('');
  return `
    <div class="error-columns">
      <div class="error-column">
        <div class="error-type-header">Difficulty Level</div>
        <p class="content-section-subtitle">Determines the complexity and subtlety of errors in the code</p>
        ${difficulty}
      </div>
      <div class="error-column">
        <div class="error-type-header">Code Length</div>
        <p class="content-section-subtitle">Controls the size and complexity of the generated code</p>
        ${length}
      </div>
    </div>
    <p class="param-value"><strong>Difficulty:</strong> ${DIFFICULTY_OPTIONS[params.difficulty].label} - ${DIFFICULTY_OPTIONS[params.difficulty].explanation}</p>
    <p class="param-value"><strong>Length:</strong> ${LENGTH_OPTIONS[params.length].label} - ${LENGTH_OPTIONS[params.length].explanation}</p>`;
}

export interface SpecificErrorPickerData {
  errorType: ErrorType;
  /** Errors of `errorType` matching the current search. */
  available: readonly CatalogError[];
  selected: readonly CatalogError[];
}

/**
 * Pick exact errors. Select and Remove are submit buttons named `add` and
 * `remove`; the current picks travel as hidden `specific` fields rendered by the page.
 */
export function renderSpecificErrorSelection(data: SpecificErrorPickerData): string {
  const selectedKeys = new Set(data.selected.map(specificErrorKey));
  const typeRadios = ERROR_TYPES.map((t) => radio('etype', t, TYPE_HEADINGS[t], t === data.errorType)).join('');

  const byCategory = new Map<string, CatalogError[]>();
  for (const error of data.available) {
    byCategory.set(error.category, [...(byCategory.get(error.category) ?? []), error]);
  }

  const groups = [...byCategory].map(([category, errors]) => `
    <div class="error-type-header">${escapeHtml(category)} (${errors.length} errors)</div>
    ${errors.map((e) => {
      const key = specificErrorKey(e);
      const action = selectedKeys.has(key)
        ? '<span class="model-status status-available">Selected</span>'
        : `<button type="submit" class="btn" name="add" value="${escapeHtml(key)}">Select</button>`;
      return `
    <div class="model-card">
      <div class="model-header">
        <div class="model-name">${escapeHtml(e.name)}</div>
        ${action}
      </div>
      <div class="model-description">${escapeHtml(e.description)}</div>
    </div>`;
    }).join('')}`).join('');

  const selectedHtml = data.selected.length === 0
    ? renderInfoMessage('No specific errors selected. Random errors will be used based on categories.')
    : data.selected.map((e) => `
    <div class="model-card available">
      <div class="model-header">
        <div class="model-name">${TYPE_HEADINGS[e.type]} - ${escapeHtml(e.name)}</div>
        <button type="submit" class="btn" name="remove" value="${escapeHtml(specificErrorKey(e))}">Remove</button>
      </div>
      <div class="model-description">${escapeHtml(e.description)}</div>
    </div>`).join('');

  return `
    <div class="mode-selector">${typeRadios}</div>
    ${groups || renderWarningMessage('No matching errors.')}
    <div class="error-type-header">Selected Errors</div>
    ${selectedHtml}`;
}

export function renderErrorPreview(result: ErrorsForLlmResult): string {
  if (result.problems.length === 0) return renderWarningMessage('No errors match the current selection.');
  return `<ol class="known-problems">${result.problems.map((p) => `<li>${escapeHtml(p)}</li>`).join('')}</ol>`;
}

/** The first column takes floor(n/2) entries, the second the rest. */
export function splitColumns<T>(items: readonly T[]): [T[], T[]] {
  const half = Math.floor(items.length / 2);
  return [items.slice(0, half), items.slice(half)];
}

function renderCheckbox(type: ErrorType, category: string, checked: boolean): string {
  return `<label class="error-checkbox"><input type="checkbox" name="${type}" value="${escapeHtml(category)}"${checked ? ' checked' : ''}> ${escapeHtml(category)}</label>`;
}

export function renderCategorySelector(categories: CategorySelection, selected: CategorySelection): string {
  const sections = ERROR_TYPES.map((type) => {
    const columns = splitColumns(categories[type]).map(
      (column) => `<div class="error-column">${column.map((c) => renderCheckbox(type, c, selected[type].includes(c))).join('')}</div>`,
    );
    return `
    <div class="error-type-header">${TYPE_HEADINGS[type]}</div>
    <div class="error-columns">${columns.join('')}</div>`;
  }).join('');

  return `
  <div class="category-selector">
    ${sections}
    <div class="button-container"><div class="submit-button"><button type="submit" class="btn btn-primary">Apply Selection</button></div></div>
  </div>`;
}

export function renderSelectedCategories(selected: CategorySelection): string {
  if (selected.build.length === 0 && selected.checkstyle.length === 0) {
    return renderWarningMessage('No error categories selected. No errors will be included until you make a selection.');
  }

  return ERROR_TYPES.filter((type) => selected[type].length > 0)
    .map((type) => `
    <div class="error-type-header">${TYPE_HEADINGS[type]} Categories</div>
    <div>${selected[type].map((c) => `<span class="error-category">${escapeHtml(c)}</span>`).join('')}</div>`)
    .join('');
}

export function renderProblemAreaGrid(selectedAreas: readonly string[]): string {
  const cards = PROBLEM_AREA_NAMES.map((area) => {
    const { icon, description } = PROBLEM_AREAS[area];
    const isSelected = selectedAreas.includes(area);
    return `
    <label class="problem-area-card${isSelected ? ' selected' : ''}" id="card-${area.toLowerCase()}">
      <input type="checkbox" name="area" value="${area}" hidden${isSelected ? ' checked' : ''}>
      <div class="problem-area-title">${area} <span class="icon">${icon}</span></div>
      <p class="problem-area-description">${escapeHtml(description)}</p>
    </label>`;
  }).join('');

  return `
    <div class="problem-area-grid">${cards}</div>
    <div class="button-container"><div class="submit-button"><button type="submit" class="btn btn-primary">Use Focus Areas</button></div></div>`;
}

export function renderErrorList(errors: readonly CatalogError[]): string {
  if (errors.length === 0) return renderWarningMessage('No matching errors.');
  return `<div>${errors.map((e) => `
    <div class="model-card available">
      <div class="model-header">
        <div class="model-name">${escapeHtml(e.name)} <span class="model-id">(${escapeHtml(e.category)})</span></div>
        <span class="status-badge status-info">${TYPE_HEADINGS[e.type]}</span>
      </div>
      <div class="model-description">${escapeHtml(e.description)}</div>
    </div>`).join('')}</div>`;
}
