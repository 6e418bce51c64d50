/**
 * Line-numbered code listing.
 *
 * The editor mangles `<pre>` and drops CSS counters, so a listing is a
 * bordered table with one row per source line: a right-aligned number cell
 * and a `white-space:pre` content cell.
 *
 * @module core/code-block
 */

import {
  CODE_LINE_CELL_STYLE,
  CODE_LISTING_STYLE,
  CODE_NUMBER_CELL_STYLE,
  LAYOUT_TABLE_ATTRS,
} from './styles.js';
import { escapeCodeText, escapeHtml } from './text.js';
import type { CodeBlock, Theme } from './types.js';

export function renderCodeBlock(block: CodeBlock, theme: Theme): string {
  const rows = block.lines
    .map(
      (line, i) =>
        `<tr><td align="right" style="${CODE_NUMBER_CELL_STYLE}">${i + 1}</td>` +
        `<td style="${CODE_LINE_CELL_STYLE}">${escapeCodeText(line)}</td></tr>`,
    )
    .join('');

  const language = block.language ? ` data-language="${escapeHtml(block.language)}"` : '';

  return (
    `<table ${LAYOUT_TABLE_ATTRS} cellpadding="12" bgcolor="${theme.codeBlockBackground}"${language} ` +
    'style="margin:12px 0;">' +
    `<tr><td style="border:1px solid ${theme.codeBlockBorderColor};">` +
    `<table ${LAYOUT_TABLE_ATTRS} cellpadding="0" style="${CODE_LISTING_STYLE}">${rows}</table>` +
    '</td></tr></table>'
  );
}
