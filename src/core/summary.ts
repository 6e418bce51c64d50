/**
 * Title, summary, cover and image extraction.
 *
 * Reads a parsed document without changing it. Caps come from the render
 * context, so callers never have to trim the result themselves.
 *
 * @module core/summary
 */

import { spansToPlainText } from './inline-parser.js';
import { decodeEntities, stripHtmlTags, truncateChars } from './text.js';
import type { Block, Document, InlineSpan, ListBlock, RenderContext } from './types.js';

export const UNTITLED = 'Untitled';

export interface ArticleMetadata {
  title: string;
  summary: string;
  coverUrl?: string;
  images: string[];
  plainText: string;
}

// ---------------------------------------------------------------------------
// Raw HTML helpers
// ---------------------------------------------------------------------------

const HTML_H1_RE = /<h1\b[^>]*>([\s\S]*?)<\/h1\s*>/i;
const HTML_P_RE = /<p\b[^>]*>([\s\S]*?)<\/p\s*>/gi;
const HTML_IMG_SRC_RE = /<img\b[^>]*?\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;

function htmlHeading(html: string): string | undefined {
  const match = HTML_H1_RE.exec(html);
  const text = match ? stripHtmlTags(match[1]).replace(/\s+/g, ' ').trim() : '';
  return text || undefined;
}

function htmlFirstParagraph(html: string): string | undefined {
  for (const match of html.matchAll(HTML_P_RE)) {
    const text = stripHtmlTags(match[1]).replace(/\s+/g, ' ').trim();
    if (text) return text;
  }
  return undefined;
}

export function htmlImageSources(html: string): string[] {
  const sources: string[] = [];
  for (const match of html.matchAll(HTML_IMG_SRC_RE)) {
    const src = match[1] ?? match[2] ?? match[3] ?? '';
    if (src) sources.push(decodeEntities(src));
  }
  return sources;
}

// ---------------------------------------------------------------------------
// Block walkers
// ---------------------------------------------------------------------------

function spanImages(spans: readonly InlineSpan[], out: string[]): void {
  for (const span of spans) {
    switch (span.kind) {
      case 'image':
        out.push(span.url);
        break;
      case 'bold':
      case 'italic':
      case 'strike':
      case 'link':
      case 'colored':
        spanImages(span.children, out);
        break;
      case 'text':
      case 'code':
        break;
    }
  }
}

function listImages(list: ListBlock, out: string[]): void {
  for (const item of list.items) {
    spanImages(item.spans, out);
    if (item.nested) listImages(item.nested, out);
  }
}

/** Every image URL in document order, duplicates included. */
function collectImages(blocks: readonly Block[]): string[] {
  const out: string[] = [];
  for (const block of blocks) {
    switch (block.kind) {
      case 'image':
        out.push(block.url);
        break;
      case 'heading':
      case 'paragraph':
      case 'blockquote':
        spanImages(block.spans, out);
        break;
      case 'list':
        listImages(block, out);
        break;
      case 'table':
        for (const row of [block.header, ...block.rows]) {
          for (const cell of row) spanImages(cell.spans, out);
        }
        break;
      case 'html':
        out.push(...htmlImageSources(block.html));
        break;
      case 'code':
      case 'rule':
        break;
    }
  }
  return out;
}

function listText(list: ListBlock, out: string[]): void {
  for (const item of list.items) {
    out.push(spansToPlainText(item.spans));
    if (item.nested) listText(item.nested, out);
  }
}

/** Plain-text rendition of the body, one line per block or row. */
export function blocksToPlainText(blocks: readonly Block[]): string {
  const lines: string[] = [];
  for (const block of blocks) {
    switch (block.kind) {
      case 'heading':
      case 'paragraph':
      case 'blockquote':
        lines.push(spansToPlainText(block.spans));
        break;
      case 'list':
        listText(block, lines);
        break;
      case 'code':
        lines.push(...block.lines);
        break;
      case 'table':
        for (const row of [block.header, ...block.rows]) {
          lines.push(row.map((cell) => spansToPlainText(cell.spans)).join(' | '));
        }
        break;
      case 'html':
        lines.push(stripHtmlTags(block.html));
        break;
      case 'rule':
      case 'image':
        break;
    }
  }
  return lines.filter((line) => line.trim() !== '').join('\n');
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Front-matter title, else the input's own title, else the first H1, else
 * {@link UNTITLED}.
 */
export function extractTitle(doc: Document): string {
  const declared = doc.frontMatter.title?.trim() || doc.sourceTitle?.trim();
  if (declared) return declared;

  for (const block of doc.blocks) {
    if (block.kind === 'heading' && block.level === 1) {
      const text = spansToPlainText(block.spans).trim();
      if (text) return text;
    } else if (block.kind === 'html') {
      const text = htmlHeading(block.html);
      if (text) return text;
    }
  }
  return UNTITLED;
}

/** Plain text of the first non-empty paragraph, or `""`. */
export function extractSummary(doc: Document, cap: number): string {
  for (const block of doc.blocks) {
    let text: string | undefined;
    if (block.kind === 'paragraph') {
      text = spansToPlainText(block.spans).trim();
    } else if (block.kind === 'html') {
      text = htmlFirstParagraph(block.html);
    }
    if (text) return truncateChars(text, cap);
  }
  return '';
}

export function extractMetadata(doc: Document, ctx: RenderContext): ArticleMetadata {
  const all = collectImages(doc.blocks);
  const unique = [...new Set(all)];
  const images = Number.isFinite(ctx.imageCountCap) ? unique.slice(0, ctx.imageCountCap) : unique;

  const metadata: ArticleMetadata = {
    title: extractTitle(doc),
    summary: extractSummary(doc, ctx.textLengthCap),
    images,
    plainText: truncateChars(blocksToPlainText(doc.blocks), ctx.bodyTextCap),
  };
  if (all.length > 0) metadata.coverUrl = all[0];
  return metadata;
}
