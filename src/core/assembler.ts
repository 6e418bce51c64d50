/**
 * Article shell: title banner, meta line, body and source footer, all in one
 * outer layout table.
 *
 * @module core/assembler
 */

import { LAYOUT_TABLE_ATTRS } from './styles.js';
import { escapeHtml } from './text.js';
import type { FrontMatter, Theme } from './types.js';

export const SOURCE_LABEL = '来源';

function renderBanner(title: string, theme: Theme): string {
  return (
    `<table ${LAYOUT_TABLE_ATTRS} cellpadding="20" bgcolor="${theme.headerBackground}" style="margin-bottom:16px;">` +
    `<tr><td style="color:${theme.headerTextColor};font-size:${theme.headerFontSize};font-weight:bold;">` +
    `${escapeHtml(title)}</td></tr></table>`
  );
}

/** `date | #tag #tag`, or `null` when there is neither. */
export function formatMetaLine(frontMatter: FrontMatter): string | null {
  const parts: string[] = [];
  if (frontMatter.date) parts.push(escapeHtml(frontMatter.date));
  if (frontMatter.tags && frontMatter.tags.length > 0) {
    parts.push(frontMatter.tags.map((tag) => `#${escapeHtml(tag)}`).join(' '));
  }
  return parts.length > 0 ? parts.join(' | ') : null;
}

function renderMeta(line: string, theme: Theme): string {
  return (
    `<table ${LAYOUT_TABLE_ATTRS} cellpadding="0" style="margin-bottom:16px;">` +
    `<tr><td style="color:${theme.metaTextColor};font-size:${theme.metaFontSize};padding:0 4px;">` +
    `${line}</td></tr></table>`
  );
}

function renderFooter(source: string, theme: Theme): string {
  const href = escapeHtml(source);
  return (
    `<table ${LAYOUT_TABLE_ATTRS} cellpadding="16" style="margin-top:24px;">` +
    `<tr><td align="center" style="border-top:1px solid #eeeeee;color:${theme.sourceTextColor};` +
    `font-size:${theme.metaFontSize};">${SOURCE_LABEL}: ` +
    `<a href="${href}" style="color:${theme.sourceTextColor};">${href}</a></td></tr></table>`
  );
}

export function assembleArticle(body: string, frontMatter: FrontMatter, theme: Theme): string {
  const parts: string[] = [];

  const title = frontMatter.title?.trim();
  if (title) parts.push(renderBanner(title, theme));

  const meta = formatMetaLine(frontMatter);
  if (meta) parts.push(renderMeta(meta, theme));

  parts.push(body);

  if (frontMatter.permalink) parts.push(renderFooter(frontMatter.permalink, theme));

  return `<table ${LAYOUT_TABLE_ATTRS} cellpadding="0"><tr><td>${parts.join('')}</td></tr></table>`;
}
