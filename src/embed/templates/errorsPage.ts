import { escapeHtml, renderLayout, renderPageHeader } from './layout';
import { renderContentSection, renderInfoMessage, renderWarningMessage } from './contentSection';
import {
  renderCategorySelector,
  renderCodeParams,
  renderErrorList,
  renderErrorPreview,
  renderModeSelector,
  renderProblemAreaGrid,
  renderSelectedCategories,
  renderSpecificErrorSelection,
  specificErrorKey,
  type SelectionMode,
} from './errorSelector';
import type { ErrorsForLlmResult } from '../../errors/jsonErrorRepository';
import type { CatalogError, CategorySelection, CodeLength, Difficulty, ErrorType } from '../../errors/schema';
import type { ThemeName } from '../styles/tokens';

export interface ErrorsPageData {
  theme: ThemeName;
  mode: SelectionMode;
  difficulty: Difficulty;
  length: CodeLength;
  categories: CategorySelection;
  selected: CategorySelection;
  areas: string[];
  specificErrors: CatalogError[];
  pickerType: ErrorType;
  pickerErrors: CatalogError[];
  searchTerm?: string;
  searchResults?: CatalogError[];
  /** Absent until something is selected. */
  preview?: ErrorsForLlmResult;
}

function renderModeBody(data: ErrorsPageData): string {
  switch (data.mode) {
    case 'standard': {
      const warning = data.areas.length === 0
        ? renderWarningMessage('Please select at least one problem area. No errors will be included until you make a selection.')
        : '';
      return `
      ${renderContentSection({
        title: 'Focus Areas for Code Review',
        subtitle: 'Select the categories of issues you want to find in the generated code',
        body: `${renderProblemAreaGrid(data.areas)}${warning}`,
      })}
      ${renderContentSection({ title: 'Selected Categories', body: renderSelectedCategories(data.selected) })}`;
    }
    case 'advanced':
      return `
      ${renderContentSection({ title: 'Error Categories', body: renderCategorySelector(data.categories, data.selected) })}
      ${renderContentSection({ title: 'Selected Categories', body: renderSelectedCategories(data.selected) })}`;
    case 'specific':
      return renderContentSection({
        title: 'Select Specific Errors',
        body: `
        <div class="button-container">
          <input class="btn" type="search" name="q" placeholder="Search errors" value="${escapeHtml(data.searchTerm)}">
          <div class="clear-button"><button type="submit" class="btn btn-primary">Search</button></div>
        </div>
        ${renderSpecificErrorSelection({ errorType: data.pickerType, available: data.pickerErrors, selected: data.specificErrors })}`,
      });
  }
}

function renderSearchSection(data: ErrorsPageData): string {
  const searchForm = `
    <div class="button-container">
      <input class="btn" type="search" name="q" placeholder="Search errors" value="${escapeHtml(data.searchTerm)}">
      <div class="clear-button"><button type="submit" class="btn btn-primary">Search</button></div>
    </div>`;
  const body = data.searchTerm ? `${searchForm}${renderErrorList(data.searchResults ?? [])}` : searchForm;
  return renderContentSection({ title: 'Search Errors', body });
}

/** One GET form holds every control, so each submit carries the whole selection. */
export function renderErrorsPage(data: ErrorsPageData): string {
  const carried = [
    `<input type="hidden" name="theme" value="${data.theme}">`,
    ...data.specificErrors.map((e) => `<input type="hidden" name="specific" value="${escapeHtml(specificErrorKey(e))}">`),
  ].join('');

  const preview = data.preview
    ? renderErrorPreview(data.preview)
    : renderInfoMessage('Make a selection above to preview the problems of the next exercise.');

  const body = `
  <div class="dash">
    <div class="dash-inner">
      ${renderPageHeader('Error Selection', '<a class="action-link" href="/">← Dashboard</a>')}
      <form class="error-selection-form" method="get" action="/errors">
        ${carried}
        ${renderContentSection({ title: 'Error Selection Mode', body: renderModeSelector(data.mode) })}
        ${renderContentSection({ title: 'Code Parameters', body: renderCodeParams({ difficulty: data.difficulty, length: data.length }) })}
        ${renderModeBody(data)}
        ${data.mode === 'specific' ? '' : renderSearchSection(data)}
      </form>
      ${renderContentSection({ title: 'Error Preview', subtitle: 'Problems the next exercise would contain', body: preview })}
    </div>
  </div>`;

  return renderLayout({ title: 'Error Selection', body, theme: data.theme });
}
