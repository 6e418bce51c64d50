/**
 * Inline span to HTML.
 *
 * Every style is inline: the editor strips `class` attributes and
 * stylesheets on paste.
 *
 * @module core/inline-renderer
 */

import { INLINE_CODE_STYLE } from './styles.js';
import { escapeHtml } from './text.js';
import type { InlineSpan, Theme } from './types.js';

function titleAttr(title: string | undefined): string {
  return title ? ` title="${escapeHtml(title)}"` : '';
}

/** Render a span sequence; soft line breaks become `<br />`. */
export function renderSpans(spans: readonly InlineSpan[], theme: Theme): string {
  return spans.map((span) => renderSpan(span, theme)).join('');
}

function renderSpan(span: InlineSpan, theme: Theme): string {
  switch (span.kind) {
    case 'text':
      return escapeHtml(span.text).replace(/\n/g, '<br />');
    case 'bold':
      return `<strong>${renderSpans(span.children, theme)}</strong>`;
    case 'italic':
      return `<em>${renderSpans(span.children, theme)}</em>`;
    case 'strike':
      return `<del>${renderSpans(span.children, theme)}</del>`;
    case 'code':
      return `<code style="${INLINE_CODE_STYLE}">${escapeHtml(span.text)}</code>`;
    case 'link':
      return (
        `<a href="${escapeHtml(span.href)}"${titleAttr(span.title)} ` +
        `style="color:${theme.linkColor};text-decoration:none;">${renderSpans(span.children, theme)}</a>`
      );
    case 'image':
      return (
        `<img src="${escapeHtml(span.url)}" alt="${escapeHtml(span.alt)}"${titleAttr(span.title)} ` +
        'style="max-width:100%;" />'
      );
    case 'colored':
      return `<span style="color:${escapeHtml(span.color)};">${renderSpans(span.children, theme)}</span>`;
  }
}
