// node/src/views/page.ts — the single-page UI, rendered on the server (no client script)
import type { PipelineRun, ReasoningMode } from '../types/core';
import { REASONING_MODES } from '../types/core';
import { toMetricRows } from './metric-table';

export interface PageState {
  question?: string;
  mode?: ReasoningMode;
  run?: PipelineRun;
  /** Validation or upload problems shown above the form. */
  errors?: string[];
  backend: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Escaped text with paragraphs and line breaks kept. */
function textBlock(text: string): string {
  return text
    .split(/\n{2,}/)
    .map((p) => `<p>${escapeHtml(p).replace(/\n/g, '<br>')}</p>`)
    .join('\n');
}

function renderForm(state: PageState): string {
  const selected = state.mode ?? 'research';
  const options = REASONING_MODES.map(
    (m) => `<option value="${m}"${m === selected ? ' selected' : ''}>${m}</option>`,
  ).join('');
  return `<form method="post" action="/run" enctype="multipart/form-data">
  <label for="mode">Mode</label>
  <select id="mode" name="mode">${options}</select>
  <label for="question">Question</label>
  <textarea id="question" name="question" rows="4" required>${escapeHtml(state.question ?? '')}</textarea>
  <label for="documents">Documents (optional: PDF, DOCX, TXT, MD)</label>
  <input id="documents" name="documents" type="file" multiple accept=".pdf,.docx,.txt,.md">
  <button type="submit">Run</button>
</form>`;
}

function renderMetrics(run: PipelineRun): string {
  const rows = toMetricRows(run.metrics)
    .map(
      (r) =>
        `<tr class="${r.applicable ? 'computed' : 'na'}"><th scope="row">${escapeHtml(r.label)}</th><td>${escapeHtml(r.display)}</td></tr>`,
    )
    .join('\n');
  return `<section id="metrics">
  <h2>Evaluation Metrics</h2>
  <table>
${rows}
  </table>
</section>`;
}

function renderRun(run: PipelineRun): string {
  const parts: string[] = [];

  if (run.retrievalError) {
    parts.push(
      `<div class="notice warning">Documents could not be used (${escapeHtml(run.retrievalError.code)}): ${escapeHtml(run.retrievalError.message)}. The answer below is not grounded.</div>`,
    );
  }

  if (run.status === 'failed') {
    parts.push(
      `<div class="notice error">The ${run.failedStage} stage failed (${escapeHtml(run.error.code)}): ${escapeHtml(run.error.message)}</div>`,
    );
  } else {
    const score = run.evaluatorScore !== null ? `${run.evaluatorScore.toFixed(1)} / 10` : 'N/A';
    parts.push(`<section id="final-answer">
  <h2>Final Answer</h2>
  ${textBlock(run.finalAnswer)}
  <p class="meta">Evaluator score: ${score} · ${run.answerWordCount} words</p>
</section>`);
  }

  if (run.groundedAnswer !== undefined) {
    parts.push(`<section id="grounded-answer">
  <h2>Grounded Answer</h2>
  ${textBlock(run.groundedAnswer)}
</section>`);
  }

  parts.push(renderMetrics(run));
  return parts.join('\n');
}

export function renderPage(state: PageState): string {
  const errors = (state.errors ?? [])
    .map((e) => `<div class="notice error">${escapeHtml(e)}</div>`)
    .join('\n');
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Hybrid Reasoning Lab</title>
<style>
  body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; }
  label { display: block; margin-top: 0.75rem; font-weight: 600; }
  textarea, select { width: 100%; }
  button { margin-top: 1rem; }
  .notice { padding: 0.5rem 0.75rem; margin: 1rem 0; border-radius: 4px; }
  .notice.error { background: #fde2e1; }
  .notice.warning { background: #fff4ce; }
  table { border-collapse: collapse; }
  th, td { text-align: left; padding: 0.25rem 1rem 0.25rem 0; }
  tr.na td { color: #777; }
  .meta { color: #555; font-size: 0.9rem; }
</style>
</head>
<body>
<h1>Hybrid Reasoning Lab</h1>
<p class="meta">Generation backend: ${escapeHtml(state.backend)}</p>
${errors}
${renderForm(state)}
${state.run ? renderRun(state.run) : ''}
</body>
</html>`;
}
