/**
 * Core module barrel exports.
 *
 * Everything here is a pure, synchronous text transform with no network or
 * file-system access.
 *
 * @module core
 */

// Parsing
export { preprocessMarkdown } from './preprocessor.js';
export { extractFrontMatter } from './front-matter.js';
export type { FrontMatterResult } from './front-matter.js';
export { BlockParser, parseBlocks, splitTableRow } from './block-parser.js';
export type { BlockParserOptions } from './block-parser.js';
export { parseInline, spansToPlainText } from './inline-parser.js';
export {
  MARKDOWN_PARSER,
  HTML_PARSER,
  DEFAULT_PARSERS,
  createMarkdownParser,
  parseMarkdownDocument,
  parseHtmlDocument,
  resolveParser,
} from './parsers.js';
export type { MarkdownParserOptions } from './parsers.js';

// Links
export { sanitizeLinks, sanitizeDocumentLinks, stripAnchorLinks } from './link-sanitizer.js';

// Themes
export { THEMES, DEFAULT_THEME, listThemes, isThemeName, lookupTheme } from './themes.js';
export { MODE_LIMITS, createRenderContext, isArticleMode } from './context.js';

// Rendering
export { renderSpans } from './inline-renderer.js';
export { renderCodeBlock } from './code-block.js';
export { renderList, BULLET_GLYPHS } from './list-renderer.js';
export { renderTable, computeColumnWidths, measureTextWidth } from './table-renderer.js';
export { renderBlock, renderHeading } from './block-renderer.js';
export { buildSections, renderSections, isReferenceTitle } from './sections.js';
export type { Section } from './sections.js';
export { assembleArticle, formatMetaLine, SOURCE_LABEL } from './assembler.js';

// Extraction
export { extractMetadata, extractTitle, extractSummary, blocksToPlainText, UNTITLED } from './summary.js';
export type { ArticleMetadata } from './summary.js';

// Postprocessor
export { substituteImageUrls } from './postprocessor.js';

// Types
export { UnknownThemeError, UnknownModeError, UnsupportedInputError } from './types.js';
export type {
  ThemeName,
  ArticleMode,
  Theme,
  RenderContext,
  FrontMatter,
  InlineSpan,
  Block,
  HeadingBlock,
  ListBlock,
  CodeBlock,
  TableBlock,
  ImageBlock,
  Alignment,
  ConversionWarning,
  ConversionWarningCode,
  Document,
  RenderResult,
  ContentParser,
} from './types.js';
