import { escapeHtml } from './layout';

export interface ReviewAnalysis {
  identifiedCount: number;
  totalProblems: number;
  identifiedPercentage: number;
}

export interface ReviewPanelData {
  iteration?: number;
  maxIterations?: number;
  /** Targeted hints for the next attempt. */
  guidance?: string;
  analysis?: ReviewAnalysis;
  previousReview?: string;
  /** Shown above the form, e.g. after an empty submission. */
  errorMessage?: string;
  /** Every attempt has been used; the form is replaced by a summary. */
  completed?: boolean;
  // Carried through hidden fields so the next attempt renders the same exercise
  code?: string;
  knownProblems?: string[];
  showKnownProblems?: boolean;
  fileName?: string;
}

export const EMPTY_REVIEW_MESSAGE = 'Please enter your review before submitting.';

function hiddenInput(name: string, value: string): string {
  return `<input type="hidden" name="${name}" value="${escapeHtml(value)}">`;
}

function renderCarriedFields(data: ReviewPanelData, iteration: number, maxIterations: number): string {
  const fields = [
    hiddenInput('iteration', String(iteration)),
    hiddenInput('maxIterations', String(maxIterations)),
  ];
  if (data.code) fields.push(hiddenInput('code', data.code));
  if (data.fileName) fields.push(hiddenInput('fileName', data.fileName));
  if (data.showKnownProblems) fields.push(hiddenInput('showKnownProblems', 'true'));
  for (const problem of data.knownProblems ?? []) fields.push(hiddenInput('knownProblems', problem));
  return fields.join('\n      ');
}

const REVIEW_PLACEHOLDER = [
  "Line 15: [Naming Convention] - The variable 'cnt' uses poor naming. Consider using 'counter' instead.",
  "Line 27: [Logic Error] - The loop condition should use '<=' instead of '<' to include the boundary value.",
].join('\n');

export function submitLabel(iteration: number, maxIterations: number): string {
  return iteration === 1 ? 'Submit Review' : `Submit Review (Attempt ${iteration}/${maxIterations})`;
}

export function renderReviewPanel(data: ReviewPanelData): string {
  const iteration = data.iteration ?? 1;
  const maxIterations = data.maxIterations ?? 3;
  const laterAttempt = iteration > 1;

  const badgeHtml = laterAttempt
    ? `<span class="iteration-badge">Attempt ${iteration} of ${maxIterations}</span>`
    : '';

  const guidanceHtml = laterAttempt && data.guidance
    ? `<div class="guidance-box">
        <div class="guidance-title"><span class="guidance-icon">🎯</span> Review Guidance</div>
        ${escapeHtml(data.guidance)}
      </div>`
    : '';

  const analysisHtml = laterAttempt && data.guidance && data.analysis
    ? `<div class="analysis-box">
        <div class="guidance-title"><span class="guidance-icon">📊</span> Previous Results</div>
        You identified ${data.analysis.identifiedCount} of ${data.analysis.totalProblems} issues
        (${data.analysis.identifiedPercentage.toFixed(1)}%). Try to find more issues in this attempt.
      </div>`
    : '';

  const historyHtml = laterAttempt && data.previousReview
    ? `<div class="guidance-title"><span class="guidance-icon">📝</span> Previous Review</div>
      <div class="review-history-box"><pre>${escapeHtml(data.previousReview)}</pre></div>`
    : '';

  const errorHtml = data.errorMessage
    ? `<div class="warning-message">${escapeHtml(data.errorMessage)}</div>`
    : '';

  const formHtml = data.completed
    ? `<div class="info-message">Review complete: all ${maxIterations} attempts used.</div>`
    : `<form class="review-form" method="post" action="/review" data-review-form>
      <div class="review-textarea">
        <textarea name="review" required aria-label="Enter your review comments here" placeholder="${escapeHtml(REVIEW_PLACEHOLDER)}"></textarea>
      </div>
      ${renderCarriedFields(data, iteration, maxIterations)}
      <div class="button-container">
        <div class="submit-button"><button type="submit" class="btn btn-primary">${escapeHtml(submitLabel(iteration, maxIterations))}</button></div>
        <div class="clear-button"><button type="reset" class="btn">Clear</button></div>
      </div>
    </form>`;

  return `
  <div class="review-container">
    <div class="review-header">
      <span class="review-title">Submit Your Code Review</span>
      ${badgeHtml}
    </div>
    ${guidanceHtml}
    ${analysisHtml}
    ${historyHtml}
    ${errorHtml}
    ${formHtml}
  </div>`;
}
