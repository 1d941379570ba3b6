import { escapeHtml } from './layout';
import { renderInfoMessage } from './contentSection';

export interface CodeDisplayData {
  code: string;
  knownProblems?: string[];
  /** Instructor view. */
  showKnownProblems?: boolean;
  fileName?: string;
}

interface NumberedLine {
  number: string;
  text: string;
}

/** A trailing newline does not produce an extra empty line. */
function splitLines(code: string): string[] {
  const lines = code.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function numberLines(code: string): NumberedLine[] {
  const lines = splitLines(code);
  const width = String(lines.length).length;
  return lines.map((text, i) => ({ number: String(i + 1).padStart(width), text }));
}

export function addLineNumbers(code: string): string {
  return numberLines(code)
    .map((line) => `${line.number} | ${line.text}`)
    .join('\n');
}

export function renderCodeDisplay(data: CodeDisplayData): string {
  if (!data.code) {
    return renderInfoMessage('No code generated yet. Generate a code problem to start reviewing.');
  }

  const fileName = data.fileName ?? 'java_review_problem.java';
  const linesHtml = numberLines(data.code)
    .map((line) => `<span class="code-line"><span class="line-number">${line.number} | </span>${escapeHtml(line.text)}</span>`)
    .join('');

  const problems = data.knownProblems ?? [];
  const problemsHtml = data.showKnownProblems && problems.length > 0
    ? `<h3 class="guidance-title">Known Problems</h3>
    <ol class="known-problems">${problems.map((p) => `<li>${escapeHtml(p)}</li>`).join('')}</ol>`
    : '';

  return `
  <div class="code-display">
    <pre class="code-block"><code>${linesHtml}</code></pre>
    <div class="button-container">
      <a class="btn" download="${escapeHtml(fileName)}" href="data:text/plain;charset=utf-8,${encodeURIComponent(data.code)}">Download Code</a>
    </div>
    ${problemsHtml}
  </div>`;
}
