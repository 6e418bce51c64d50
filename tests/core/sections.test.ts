import { parseBlocks } from '../../src/core/block-parser.js';
import { renderBlock } from '../../src/core/block-renderer.js';
import { buildSections, isReferenceTitle, renderSections } from '../../src/core/sections.js';
import { MUTED_TEXT_STYLE } from '../../src/core/styles.js';
import { THEMES } from '../../src/core/themes.js';

const theme = THEMES.academic_gray;

describe('isReferenceTitle', () => {
  it.each<[string, boolean]>([
    ['参考文献', true],
    ['Further References', true],
    ['Bibliography', true],
    ['Summary', false],
  ])('should classify %s', (title, expected) => {
    expect(isReferenceTitle(title)).toBe(expected);
  });
});

describe('buildSections', () => {
  it('should open cards at H2 and H3 and keep H1 plain', () => {
    const sections = buildSections(
      parseBlocks('intro\n\n# T\n\n## A\npara\n\n### B\n#### minor\ntext\n\n## 参考文献\n- ref'),
    );

    expect(
      sections.map((s) => [s.kind, s.kind === 'card' ? s.heading.text : null, s.blocks.map((b) => b.kind)]),
    ).toEqual([
      ['plain', null, ['paragraph']],
      ['plain', null, ['heading']],
      ['card', 'A', ['paragraph']],
      ['card', 'B', ['heading', 'paragraph']],
      ['card', '参考文献', ['list']],
    ]);
    expect(sections.map((s) => (s.kind === 'card' ? s.reference : null))).toEqual([null, null, false, false, true]);
  });

  it('should return no sections for no blocks', () => {
    expect(buildSections([])).toEqual([]);
  });
});

describe('renderSections', () => {
  it('should wrap a card heading and its blocks in one bordered table', () => {
    const blocks = parseBlocks('## A\npara');
    const { html, warnings } = renderSections(buildSections(blocks), theme);

    expect(html).toBe(
      '<table width="100%" cellspacing="0" border="0" cellpadding="12" bgcolor="#FAFAFA" style="margin:16px 0;">' +
        '<tr><td style="border:1px solid #E8E8E8;line-height:1.9;">' +
        renderBlock(blocks[0], theme).html +
        renderBlock(blocks[1], theme).html +
        '</td></tr></table>',
    );
    expect(warnings).toEqual([]);
  });

  it('should render plain sections without a card', () => {
    const blocks = parseBlocks('# Title\n\nText');
    expect(renderSections(buildSections(blocks), theme).html).toBe(
      renderBlock(blocks[0], theme).html + renderBlock(blocks[1], theme).html,
    );
  });

  it('should mute reference cards', () => {
    const { html } = renderSections(buildSections(parseBlocks('## References\nSmith 2020')), theme);
    expect(html).toContain(`<td style="border:1px solid #E8E8E8;line-height:1.9;${MUTED_TEXT_STYLE}">`);
    expect(html).toContain(`<p style="margin:12px 0;line-height:1.8;color:#333333;${MUTED_TEXT_STYLE}">Smith 2020</p>`);
  });

  it('should collect table warnings from every section', () => {
    const { warnings } = renderSections(
      buildSections(parseBlocks('a | b\n--- | ---\n1 | 2 | 3\n\n## S\nc | d\n--- | ---\n1 | 2 | 3')),
      theme,
    );
    expect(warnings.map((w) => w.code)).toEqual(['MALFORMED_TABLE', 'MALFORMED_TABLE']);
  });
});
