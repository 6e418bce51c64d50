import { parseBlocks } from '../../src/core/block-parser.js';
import { computeColumnWidths, measureTextWidth, renderTable } from '../../src/core/table-renderer.js';
import { THEMES } from '../../src/core/themes.js';
import type { TableBlock } from '../../src/core/types.js';

const theme = THEMES.tech;

function table(src: string): TableBlock {
  const [block] = parseBlocks(src);
  if (block.kind !== 'table') throw new Error(`expected a table, got ${block.kind}`);
  return block;
}

describe('measureTextWidth', () => {
  it('should count CJK characters as two units', () => {
    expect(measureTextWidth('ab中文')).toBe(6);
  });
});

describe('computeColumnWidths', () => {
  it('should return nothing for no columns and 100 for one', () => {
    expect(computeColumnWidths([])).toEqual([]);
    expect(computeColumnWidths([7])).toEqual([100]);
  });

  it('should split equal columns evenly', () => {
    expect(computeColumnWidths([10, 10])).toEqual([50, 50]);
  });

  it('should clamp and give rounding drift to the widest column', () => {
    expect(computeColumnWidths([100, 1, 1])).toEqual([79, 10.5, 10.5]);
  });
});

describe('renderTable', () => {
  const scores = table('| Name | Score |\n| :--- | ---: |\n| Ann | 9 |');

  it('should render header cells with alignment, header colour and width', () => {
    const { html, warning } = renderTable(scores, theme);
    expect(warning).toBeUndefined();
    expect(html).toContain(
      '<th align="left" style="padding:10px 12px;border:1px solid #dddddd;text-align:left;' +
        'background:#BBDEFB;font-weight:bold;width:44.4%;">Name</th>',
    );
    expect(html).toContain(
      '<td align="right" style="padding:10px 12px;border:1px solid #dddddd;text-align:right;width:55.6%;">9</td>',
    );
  });

  it('should wrap header and body rows', () => {
    const { html } = renderTable(scores, theme);
    expect(html.startsWith('<table style="width:100%;border-collapse:collapse;margin:16px 0;font-size:14px;"><thead><tr>')).toBe(true);
    expect(html).toContain('</tr></thead><tbody><tr>');
    expect(html.endsWith('</tr></tbody></table>')).toBe(true);
  });

  it('should omit alignment for unaligned columns and tbody for header-only tables', () => {
    const { html } = renderTable(table('a | b\n--- | ---'), theme);
    expect(html).toContain('<th style="padding:10px 12px;border:1px solid #dddddd;background:#BBDEFB;font-weight:bold;width:50%;">a</th>');
    expect(html).not.toContain('<tbody>');
  });

  it('should fall back to plain text rows for ragged tables', () => {
    const { html, warning } = renderTable(table('a | b\n--- | ---\n1 | 2 | 3'), theme);
    expect(html).toBe(
      '<section style="margin:12px 0;">' +
        '<p style="margin:4px 0;line-height:1.7;">a | b</p>' +
        '<p style="margin:4px 0;line-height:1.7;">1 | 2 | 3</p>' +
        '</section>',
    );
    expect(warning).toEqual({
      code: 'MALFORMED_TABLE',
      message: 'Table row 1 has 3 cells but the header has 2; rendered as plain text',
    });
  });

  it('should escape plain-text fallback cells', () => {
    const { html } = renderTable(table('a | b\n--- | ---\n<x> | y | z'), theme);
    expect(html).toContain('<p style="margin:4px 0;line-height:1.7;">&lt;x&gt; | y | z</p>');
  });
});
