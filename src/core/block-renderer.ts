/**
 * Block to HTML.
 *
 * Headings, quotes, rules and images are laid out with tables because the
 * editor drops positioning, `border-radius` and most block-level CSS.
 * Lists, tables and code listings have their own renderers.
 *
 * @module core/block-renderer
 */

import { renderCodeBlock } from './code-block.js';
import { renderSpans } from './inline-renderer.js';
import { renderList } from './list-renderer.js';
import { LAYOUT_TABLE_ATTRS, MUTED_TEXT_STYLE } from './styles.js';
import { renderTable } from './table-renderer.js';
import { escapeHtml } from './text.js';
import type { Block, ConversionWarning, HeadingBlock, ImageBlock, Theme } from './types.js';

export interface BlockRenderOptions {
  /** Muted reference styling for text blocks. */
  muted?: boolean;
}

export interface BlockRenderResult {
  html: string;
  warning?: ConversionWarning;
}

/** Font size in px for H4–H6. */
export function minorHeadingSize(level: number): number {
  return Math.max(14, 18 - (level - 4) * 2);
}

export function renderHeading(block: HeadingBlock, theme: Theme): string {
  const content = renderSpans(block.spans, theme);

  switch (block.level) {
    case 1:
      return (
        `<h1 style="font-size:${theme.headerFontSize};font-weight:bold;margin:20px 0 12px;` +
        `text-align:center;color:${theme.headingColor};">${content}</h1>`
      );
    case 2:
      return (
        `<table ${LAYOUT_TABLE_ATTRS} cellpadding="0" style="margin:24px 0 16px;">` +
        `<tr><td align="center" style="border-bottom:2px solid ${theme.accentColor};padding-bottom:8px;">` +
        `<span style="background:${theme.accentColor};color:#FFFFFF;padding:6px 20px;` +
        `font-size:${theme.h2FontSize};font-weight:bold;">${content}</span>` +
        '</td></tr></table>'
      );
    case 3:
      return (
        `<table ${LAYOUT_TABLE_ATTRS} cellpadding="8" bgcolor="${theme.h3Background}" style="margin:18px 0 12px;">` +
        `<tr><td style="border-left:4px solid ${theme.h3BorderColor};font-size:${theme.h3FontSize};` +
        `font-weight:bold;color:${theme.headingColor};">${content}</td></tr></table>`
      );
    default:
      return (
        `<h${block.level} style="font-size:${minorHeadingSize(block.level)}px;font-weight:bold;` +
        `margin:14px 0 8px;color:${theme.headingColor};">${content}</h${block.level}>`
      );
  }
}

function renderImage(block: ImageBlock): string {
  const alt = block.alt ? ` alt="${escapeHtml(block.alt)}"` : '';
  const title = block.title ? ` title="${escapeHtml(block.title)}"` : '';
  return (
    `<table ${LAYOUT_TABLE_ATTRS} cellpadding="0" style="margin:16px 0;"><tr><td align="center">` +
    `<img src="${escapeHtml(block.url)}"${alt}${title} width="100%" style="display:block;" />` +
    '</td></tr></table>'
  );
}

export function renderBlock(block: Block, theme: Theme, options: BlockRenderOptions = {}): BlockRenderResult {
  const muted = options.muted ? MUTED_TEXT_STYLE : '';

  switch (block.kind) {
    case 'heading':
      return { html: renderHeading(block, theme) };
    case 'paragraph':
      return {
        html:
          `<p style="margin:12px 0;line-height:1.8;color:${theme.bodyTextColor};${muted}">` +
          `${renderSpans(block.spans, theme)}</p>`,
      };
    case 'list':
      return { html: renderList(block, theme, options) };
    case 'code':
      return { html: renderCodeBlock(block, theme) };
    case 'table':
      return renderTable(block, theme, options);
    case 'blockquote':
      return {
        html:
          `<table ${LAYOUT_TABLE_ATTRS} cellpadding="8" bgcolor="#F9F9F9" style="margin:12px 0;">` +
          `<tr><td style="border-left:4px solid ${theme.accentColor};color:#666666;font-style:italic;${muted}">` +
          `${renderSpans(block.spans, theme)}</td></tr></table>`,
      };
    case 'rule':
      return {
        html:
          `<table ${LAYOUT_TABLE_ATTRS} cellpadding="0" style="margin:20px 0;">` +
          `<tr><td height="1" bgcolor="${theme.cardBorderColor}"></td></tr></table>`,
      };
    case 'image':
      return { html: renderImage(block) };
    case 'html':
      return { html: block.html };
  }
}
