/**
 * Section cards.
 *
 * Each H2/H3 heading opens a card that holds the heading and every block
 * after it up to the next H1, H2 or H3. Blocks before the first card, and
 * H1 headings, are rendered plain.
 *
 * @module core/sections
 */

import { renderBlock } from './block-renderer.js';
import { LAYOUT_TABLE_ATTRS, MUTED_TEXT_STYLE } from './styles.js';
import type { Block, ConversionWarning, HeadingBlock, Theme } from './types.js';

export type Section =
  | { kind: 'plain'; blocks: Block[] }
  | { kind: 'card'; heading: HeadingBlock; blocks: Block[]; reference: boolean };

const REFERENCE_KEYWORDS = ['参考文献', '参考', 'references', 'bibliography'];

/** Whether a card title names a references section. */
export function isReferenceTitle(title: string): boolean {
  const lower = title.toLowerCase();
  return REFERENCE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function opensCard(heading: HeadingBlock): boolean {
  return heading.level === 2 || heading.level === 3;
}

export function buildSections(blocks: readonly Block[]): Section[] {
  const sections: Section[] = [];
  let current: Section | null = null;

  for (const block of blocks) {
    if (block.kind === 'heading' && opensCard(block)) {
      current = { kind: 'card', heading: block, blocks: [], reference: isReferenceTitle(block.text) };
      sections.push(current);
    } else if (block.kind === 'heading' && block.level === 1) {
      current = { kind: 'plain', blocks: [block] };
      sections.push(current);
    } else if (current) {
      current.blocks.push(block);
    } else {
      current = { kind: 'plain', blocks: [block] };
      sections.push(current);
    }
  }

  return sections;
}

export interface SectionRenderResult {
  html: string;
  warnings: ConversionWarning[];
}

export function renderSections(sections: readonly Section[], theme: Theme): SectionRenderResult {
  const warnings: ConversionWarning[] = [];
  const parts: string[] = [];

  const render = (block: Block, muted: boolean): string => {
    const result = renderBlock(block, theme, { muted });
    if (result.warning) warnings.push(result.warning);
    return result.html;
  };

  for (const section of sections) {
    if (section.kind === 'plain') {
      parts.push(section.blocks.map((block) => render(block, false)).join(''));
      continue;
    }

    const inner = [section.heading, ...section.blocks].map((block) => render(block, section.reference)).join('');
    const tone = section.reference ? MUTED_TEXT_STYLE : '';
    parts.push(
      `<table ${LAYOUT_TABLE_ATTRS} cellpadding="12" bgcolor="${theme.cardBackground}" style="margin:16px 0;">` +
        `<tr><td style="border:1px solid ${theme.cardBorderColor};line-height:1.9;${tone}">${inner}</td></tr></table>`,
    );
  }

  return { html: parts.join(''), warnings };
}
