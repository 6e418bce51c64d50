/**
 * Input formats.
 *
 * A {@link ContentParser} turns raw input into a {@link Document}. Parsers
 * live in an ordered list that the caller owns; {@link resolveParser} picks
 * the first one whose `supports` accepts the identifier, which is either a
 * format name (`markdown`, `html`) or a file name.
 *
 * @module core/parsers
 */

import { parseBlocks } from './block-parser.js';
import { extractFrontMatter } from './front-matter.js';
import { sanitizeDocumentLinks } from './link-sanitizer.js';
import { preprocessMarkdown } from './preprocessor.js';
import { stripHtmlTags } from './text.js';
import { UnsupportedInputError } from './types.js';
import type { ContentParser, ConversionWarning, Document } from './types.js';

export interface MarkdownParserOptions {
  /** Spaces per list nesting level. @default 2 */
  indentUnit?: number;
}

function matchesFormat(identifier: string, name: string, extensions: readonly string[]): boolean {
  const lower = identifier.trim().toLowerCase();
  return lower === name || extensions.some((ext) => lower.endsWith(ext));
}

/**
 * Parse a Markdown document: front matter, preprocessing, blocks, then
 * anchor-link removal.
 */
export function parseMarkdownDocument(content: string, options: MarkdownParserOptions = {}): Document {
  const indentUnit = options.indentUnit ?? 2;
  const warnings: ConversionWarning[] = [];

  const { frontMatter, body, malformed } = extractFrontMatter(content);
  if (malformed) {
    warnings.push({
      code: 'MALFORMED_FRONT_MATTER',
      message: 'Front matter could not be parsed as a YAML mapping; it was kept as body text',
    });
  }

  const blocks = parseBlocks(preprocessMarkdown(body, indentUnit), { indentUnit });
  return sanitizeDocumentLinks({ frontMatter, blocks, warnings });
}

export function createMarkdownParser(options: MarkdownParserOptions = {}): ContentParser {
  return {
    name: 'markdown',
    supports: (identifier) => matchesFormat(identifier, 'markdown', ['.md', '.markdown']),
    parse: (content) => parseMarkdownDocument(content, options),
  };
}

const TITLE_RE = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i;
const BODY_RE = /<body\b[^>]*>([\s\S]*?)<\/body\s*>/i;
const SHELL_RE = /<!DOCTYPE[^>]*>|<html\b[^>]*>|<\/html\s*>|<head\b[\s\S]*?<\/head\s*>/gi;

/**
 * Parse an HTML document into a single raw-HTML block. Only the `<body>`
 * content is kept; the `<title>` becomes the document's source title.
 */
export function parseHtmlDocument(content: string): Document {
  const titleMatch = TITLE_RE.exec(content);
  const title = titleMatch ? stripHtmlTags(titleMatch[1]).replace(/\s+/g, ' ').trim() : '';

  const bodyMatch = BODY_RE.exec(content);
  const html = (bodyMatch ? bodyMatch[1] : content.replace(SHELL_RE, '')).trim();

  const doc: Document = {
    frontMatter: {},
    blocks: html ? [{ kind: 'html', html }] : [],
    warnings: [],
  };
  if (title) doc.sourceTitle = title;
  return sanitizeDocumentLinks(doc);
}

export const MARKDOWN_PARSER: ContentParser = createMarkdownParser();

export const HTML_PARSER: ContentParser = {
  name: 'html',
  supports: (identifier) => matchesFormat(identifier, 'html', ['.html', '.htm']),
  parse: parseHtmlDocument,
};

/** Markdown first, then HTML. */
export const DEFAULT_PARSERS: readonly ContentParser[] = Object.freeze([MARKDOWN_PARSER, HTML_PARSER]);

/**
 * @throws {UnsupportedInputError} when no parser accepts `identifier`.
 */
export function resolveParser(
  identifier: string,
  parsers: readonly ContentParser[] = DEFAULT_PARSERS,
): ContentParser {
  const parser = parsers.find((candidate) => candidate.supports(identifier));
  if (!parser) {
    throw new UnsupportedInputError(identifier);
  }
  return parser;
}
