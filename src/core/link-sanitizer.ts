/**
 * Anchor link removal.
 *
 * The editor has no in-page anchors, so links whose href starts with `#`
 * would be dead. They are unwrapped to their text; every other href is left
 * exactly as written.
 *
 * @module core/link-sanitizer
 */

import type { Block, Document, InlineSpan, ListBlock, TableCell } from './types.js';

function isAnchorHref(href: string): boolean {
  return href.trim().startsWith('#');
}

/** Replace same-document links with their children, recursively. */
export function sanitizeLinks(spans: readonly InlineSpan[]): InlineSpan[] {
  const out: InlineSpan[] = [];
  for (const span of spans) {
    switch (span.kind) {
      case 'link': {
        const children = sanitizeLinks(span.children);
        if (isAnchorHref(span.href)) {
          out.push(...children);
        } else {
          out.push({ ...span, children });
        }
        break;
      }
      case 'bold':
      case 'italic':
      case 'strike':
      case 'colored':
        out.push({ ...span, children: sanitizeLinks(span.children) });
        break;
      case 'text':
      case 'code':
      case 'image':
        out.push(span);
        break;
    }
  }
  return mergeText(out);
}

/** Unwrapping can leave two text spans side by side; join them again. */
function mergeText(spans: InlineSpan[]): InlineSpan[] {
  const merged: InlineSpan[] = [];
  for (const span of spans) {
    const last = merged[merged.length - 1];
    if (span.kind === 'text' && last?.kind === 'text') {
      merged[merged.length - 1] = { kind: 'text', text: last.text + span.text };
    } else {
      merged.push(span);
    }
  }
  return merged;
}

function sanitizeList(list: ListBlock): ListBlock {
  return {
    ...list,
    items: list.items.map((item) =>
      item.nested
        ? { spans: sanitizeLinks(item.spans), nested: sanitizeList(item.nested) }
        : { spans: sanitizeLinks(item.spans) },
    ),
  };
}

function sanitizeCell(cell: TableCell): TableCell {
  return { text: cell.text, spans: sanitizeLinks(cell.spans) };
}

function sanitizeBlock(block: Block): Block {
  switch (block.kind) {
    case 'heading':
    case 'paragraph':
    case 'blockquote':
      return { ...block, spans: sanitizeLinks(block.spans) };
    case 'list':
      return sanitizeList(block);
    case 'table':
      return {
        ...block,
        header: block.header.map(sanitizeCell),
        rows: block.rows.map((row) => row.map(sanitizeCell)),
      };
    case 'html':
      return { kind: 'html', html: stripAnchorLinks(block.html) };
    case 'code':
    case 'rule':
    case 'image':
      return block;
  }
}

/** Return a copy of `doc` with anchor links removed from every block. */
export function sanitizeDocumentLinks(doc: Document): Document {
  return { ...doc, blocks: doc.blocks.map(sanitizeBlock) };
}

const ANCHOR_LINK_RE = /<a\b[^>]*\bhref\s*=\s*(["'])\s*#[^"']*\1[^>]*>([\s\S]*?)<\/a\s*>/gi;

/**
 * Raw HTML counterpart of {@link sanitizeLinks}: `<a href="#...">text</a>`
 * becomes `text`.
 */
export function stripAnchorLinks(html: string): string {
  return html.replace(ANCHOR_LINK_RE, (_match, _quote: string, inner: string) => inner);
}
