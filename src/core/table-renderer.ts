/**
 * Table rendering.
 *
 * Well-formed tables become a bordered `<table>` with per-column alignment
 * and widths proportional to content. A table whose body rows do not match
 * the header's column count is rendered as plain text rows instead, and a
 * `MALFORMED_TABLE` warning is returned alongside.
 *
 * @module core/table-renderer
 */

import { spansToPlainText } from './inline-parser.js';
import { renderSpans } from './inline-renderer.js';
import { MUTED_TEXT_STYLE, TABLE_CELL_STYLE } from './styles.js';
import { escapeHtml } from './text.js';
import type { Alignment, ConversionWarning, TableBlock, TableCell, Theme } from './types.js';

export interface TableRenderResult {
  html: string;
  warning?: ConversionWarning;
}

export interface TableRenderOptions {
  muted?: boolean;
}

// ---------------------------------------------------------------------------
// Column width helpers
// ---------------------------------------------------------------------------

/**
 * Estimate the visual width of text for column sizing. CJK and fullwidth
 * characters count as 2 units, everything else as 1.
 */
export function measureTextWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (
      (code >= 0x3000 && code <= 0x9fff) ||
      (code >= 0xac00 && code <= 0xd7af) ||
      (code >= 0xf900 && code <= 0xfaff) ||
      (code >= 0xff00 && code <= 0xff60)
    ) {
      width += 2;
    } else {
      width += 1;
    }
  }
  return width;
}

const MIN_COL_WIDTH = 8;
const MAX_COL_WIDTH = 60;

/**
 * Turn per-column content widths into percentages that sum to 100, each
 * clamped to [8, 60] before normalizing.
 */
export function computeColumnWidths(colMaxLen: readonly number[]): number[] {
  const colCount = colMaxLen.length;
  if (colCount === 0) return [];
  if (colCount === 1) return [100];

  const adjusted = colMaxLen.map((w) => Math.max(w, 2));
  const total = adjusted.reduce((a, b) => a + b, 0);

  let widths = adjusted.map((w) => Math.max(MIN_COL_WIDTH, Math.min(MAX_COL_WIDTH, (w / total) * 100)));

  const sum = widths.reduce((a, b) => a + b, 0);
  widths = widths.map((w) => Math.round((w / sum) * 100 * 10) / 10);

  // Rounding drift goes to the widest column.
  const drift = Math.round((100 - widths.reduce((a, b) => a + b, 0)) * 10) / 10;
  if (drift !== 0) {
    const maxIdx = widths.indexOf(Math.max(...widths));
    widths[maxIdx] = Math.round((widths[maxIdx] + drift) * 10) / 10;
  }

  return widths;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function alignmentAttrs(alignment: Alignment | undefined): { attr: string; style: string } {
  if (!alignment || alignment === 'none') return { attr: '', style: '' };
  return { attr: ` align="${alignment}"`, style: `text-align:${alignment};` };
}

function renderCell(
  tag: 'th' | 'td',
  cell: TableCell,
  alignment: Alignment | undefined,
  width: number,
  theme: Theme,
): string {
  const align = alignmentAttrs(alignment);
  const headerStyle = tag === 'th' ? `background:${theme.tableHeaderBackground};font-weight:bold;` : '';
  return (
    `<${tag}${align.attr} style="${TABLE_CELL_STYLE}${align.style}${headerStyle}width:${width}%;">` +
    `${renderSpans(cell.spans, theme)}</${tag}>`
  );
}

function findMismatchedRow(table: TableBlock): number {
  return table.rows.findIndex((row) => row.length !== table.header.length);
}

/** Fallback for tables with ragged rows: one `<p>` per row, cells joined by ` | `. */
function renderPlainRows(table: TableBlock, options: TableRenderOptions): string {
  const style = `margin:4px 0;line-height:1.7;${options.muted ? MUTED_TEXT_STYLE : ''}`;
  const rows = [table.header, ...table.rows].map(
    (row) => `<p style="${style}">${escapeHtml(row.map((cell) => spansToPlainText(cell.spans)).join(' | '))}</p>`,
  );
  return `<section style="margin:12px 0;">${rows.join('')}</section>`;
}

export function renderTable(
  table: TableBlock,
  theme: Theme,
  options: TableRenderOptions = {},
): TableRenderResult {
  const mismatch = findMismatchedRow(table);
  if (mismatch !== -1) {
    return {
      html: renderPlainRows(table, options),
      warning: {
        code: 'MALFORMED_TABLE',
        message:
          `Table row ${mismatch + 1} has ${table.rows[mismatch].length} cells ` +
          `but the header has ${table.header.length}; rendered as plain text`,
      },
    };
  }

  const colMaxLen = table.header.map((cell, col) =>
    Math.max(
      measureTextWidth(spansToPlainText(cell.spans)),
      ...table.rows.map((row) => measureTextWidth(spansToPlainText(row[col].spans))),
    ),
  );
  const widths = computeColumnWidths(colMaxLen);

  const head = table.header
    .map((cell, col) => renderCell('th', cell, table.alignments[col], widths[col], theme))
    .join('');
  const body = table.rows
    .map(
      (row) =>
        `<tr>${row.map((cell, col) => renderCell('td', cell, table.alignments[col], widths[col], theme)).join('')}</tr>`,
    )
    .join('');

  const tableStyle = `width:100%;border-collapse:collapse;margin:16px 0;font-size:14px;${options.muted ? MUTED_TEXT_STYLE : ''}`;
  return {
    html:
      `<table style="${tableStyle}"><thead><tr>${head}</tr></thead>` +
      (body ? `<tbody>${body}</tbody>` : '') +
      '</table>',
  };
}
