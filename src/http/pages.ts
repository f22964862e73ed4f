import * as path from 'path';
import type { RenderedOutcome } from '../verification/outcome.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function layout(title: string, body: string): string {
  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>',
  ].join('\n');
}

export function renderForm(): string {
  return layout('Access check', [
    '<h1>Access check</h1>',
    '<form method="post" action="/submit">',
    '<label for="password">Secret</label>',
    '<input type="password" id="password" name="password" autocomplete="off" autofocus>',
    '<button type="submit">Submit</button>',
    '</form>',
  ].join('\n'));
}

export function photoUrl(photoPath: string): string {
  return `/photos/${encodeURIComponent(path.basename(photoPath))}`;
}

export function renderResult(result: RenderedOutcome): string {
  const parts = [
    '<h1>Result</h1>',
    `<p class="${result.status}">${escapeHtml(result.message)}</p>`,
  ];
  if (result.person) {
    parts.push(`<p class="person">${escapeHtml(result.person)}</p>`);
  }
  if (result.photoPath) {
    const href = photoUrl(result.photoPath);
    parts.push(`<p><a href="${escapeHtml(href)}"><img src="${escapeHtml(href)}" alt="Captured photo" width="320"></a></p>`);
  }
  parts.push('<p><a href="/">Back</a></p>');
  return layout('Result', parts.join('\n'));
}
