/**
 * Nested list rendering.
 *
 * `<ul>`/`<ol>` lose their indentation in the editor, so lists are flat
 * `<p>` rows with explicit padding and a glyph or number marker.
 *
 * @module core/list-renderer
 */

import { renderSpans } from './inline-renderer.js';
import { MUTED_TEXT_STYLE } from './styles.js';
import type { ListBlock, Theme } from './types.js';

/** Bullet glyphs, cycled by depth. */
export const BULLET_GLYPHS = ['•', '◦', '▪'] as const;

export interface ListRenderOptions {
  /** Muted reference styling. */
  muted?: boolean;
}

function renderRows(list: ListBlock, theme: Theme, depth: number, options: ListRenderOptions): string {
  const indent = (depth + 1) * theme.listIndent;
  const textStyle = options.muted ? MUTED_TEXT_STYLE : `color:${theme.bodyTextColor};`;

  return list.items
    .map((item, i) => {
      const marker = list.ordered ? `${i + 1}.` : BULLET_GLYPHS[depth % BULLET_GLYPHS.length];
      const row =
        `<p style="margin:6px 0;padding-left:${indent}px;line-height:1.7;${textStyle}">` +
        `<span style="color:${theme.accentColor};margin-right:6px;">${marker}</span>` +
        `${renderSpans(item.spans, theme)}</p>`;
      return item.nested ? row + renderRows(item.nested, theme, depth + 1, options) : row;
    })
    .join('');
}

/**
 * Render a list and its nested lists. Depth `d` is indented by
 * `(d + 1) * theme.listIndent` pixels; ordered lists number from 1 at every
 * depth.
 */
export function renderList(list: ListBlock, theme: Theme, options: ListRenderOptions = {}): string {
  return `<section style="margin:12px 0;">${renderRows(list, theme, 0, options)}</section>`;
}
