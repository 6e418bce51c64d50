/**
 * Core type definitions for the conversion pipeline.
 *
 * Blocks and inline spans are closed tagged unions discriminated on `kind`,
 * so every renderer can switch over them exhaustively.
 */

// --- Themes / rendering context ---

/** Names of the built-in themes. The set is closed. */
export type ThemeName = 'academic_gray' | 'festival' | 'tech' | 'announcement';

/** Article modes supported by the draft API. */
export type ArticleMode = 'news' | 'newspic';

/** An immutable set of palette and spacing rules. */
export interface Theme {
  readonly name: ThemeName;
  readonly label: string;
  readonly description: string;
  /** Title banner. */
  readonly headerBackground: string;
  readonly headerTextColor: string;
  readonly headerFontSize: string;
  readonly bodyTextColor: string;
  /** H2/H3 section cards. */
  readonly cardBackground: string;
  readonly cardBorderColor: string;
  /** Line under H2 titles; also used for list glyphs and quote borders. */
  readonly accentColor: string;
  readonly headingColor: string;
  readonly h2FontSize: string;
  readonly h3Background: string;
  readonly h3BorderColor: string;
  readonly h3FontSize: string;
  readonly codeBlockBackground: string;
  readonly codeBlockBorderColor: string;
  readonly tableHeaderBackground: string;
  readonly linkColor: string;
  readonly metaTextColor: string;
  readonly metaFontSize: string;
  readonly sourceTextColor: string;
  /** Indent step (px) per list nesting depth. */
  readonly listIndent: number;
}

/**
 * Per-call rendering context. Created fresh for each conversion and frozen.
 */
export interface RenderContext {
  readonly theme: Theme;
  readonly mode: ArticleMode;
  /** Maximum number of entries in `images`. */
  readonly imageCountCap: number;
  /** Maximum summary length in code points. */
  readonly textLengthCap: number;
  /** Maximum plain-text body length in code points. */
  readonly bodyTextCap: number;
}

// --- Front matter ---

/** Metadata read from the leading `---` block. Absent fields stay unset. */
export interface FrontMatter {
  title?: string;
  date?: string;
  /** Deduplicated, in first-seen order. */
  tags?: string[];
  permalink?: string;
}

// --- Inline spans ---

export interface TextSpan {
  kind: 'text';
  text: string;
}

export interface BoldSpan {
  kind: 'bold';
  children: InlineSpan[];
}

export interface ItalicSpan {
  kind: 'italic';
  children: InlineSpan[];
}

export interface StrikeSpan {
  kind: 'strike';
  children: InlineSpan[];
}

export interface CodeSpan {
  kind: 'code';
  text: string;
}

export interface LinkSpan {
  kind: 'link';
  href: string;
  title?: string;
  children: InlineSpan[];
}

export interface ImageSpan {
  kind: 'image';
  alt: string;
  url: string;
  title?: string;
}

/** `[text]{color:#c00}` or `**text**{color:#c00}`. */
export interface ColoredSpan {
  kind: 'colored';
  color: string;
  children: InlineSpan[];
}

export type InlineSpan =
  | TextSpan
  | BoldSpan
  | ItalicSpan
  | StrikeSpan
  | CodeSpan
  | LinkSpan
  | ImageSpan
  | ColoredSpan;

// --- Blocks ---

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type Alignment = 'left' | 'center' | 'right' | 'none';

export interface HeadingBlock {
  kind: 'heading';
  level: HeadingLevel;
  /** Source text after the `#` markers. */
  text: string;
  spans: InlineSpan[];
}

export interface ParagraphBlock {
  kind: 'paragraph';
  spans: InlineSpan[];
}

export interface ListItem {
  spans: InlineSpan[];
  nested?: ListBlock;
}

export interface ListBlock {
  kind: 'list';
  ordered: boolean;
  items: ListItem[];
}

export interface CodeBlock {
  kind: 'code';
  language?: string;
  lines: string[];
}

export interface TableCell {
  text: string;
  spans: InlineSpan[];
}

export interface TableBlock {
  kind: 'table';
  alignments: Alignment[];
  header: TableCell[];
  rows: TableCell[][];
}

export interface BlockquoteBlock {
  kind: 'blockquote';
  spans: InlineSpan[];
}

export interface RuleBlock {
  kind: 'rule';
}

export interface ImageBlock {
  kind: 'image';
  alt: string;
  url: string;
  title?: string;
}

/** Raw HTML body produced by the HTML input parser. */
export interface HtmlBlock {
  kind: 'html';
  html: string;
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | ListBlock
  | CodeBlock
  | TableBlock
  | BlockquoteBlock
  | RuleBlock
  | ImageBlock
  | HtmlBlock;

// --- Documents / results ---

export type ConversionWarningCode = 'MALFORMED_FRONT_MATTER' | 'MALFORMED_TABLE';

/** A recoverable problem found while converting. */
export interface ConversionWarning {
  code: ConversionWarningCode;
  message: string;
}

export interface Document {
  frontMatter: FrontMatter;
  blocks: Block[];
  warnings: ConversionWarning[];
  /** Title carried by the input format itself, such as an HTML `<title>`. */
  sourceTitle?: string;
}

/** Output of a single conversion call. */
export interface RenderResult {
  html: string;
  title: string;
  summary: string;
  coverUrl?: string;
  /** Image URLs in source order, deduplicated, capped per mode. */
  images: string[];
  /** Plain-text rendition of the body, capped per mode. */
  plainText: string;
  warnings: ConversionWarning[];
}

/**
 * An input format. Parsers are kept in an explicit, caller-owned list and
 * the first one whose `supports` returns `true` wins.
 */
export interface ContentParser {
  readonly name: string;
  supports(identifier: string): boolean;
  parse(content: string): Document;
}

// --- Error Types ---

/** Thrown when a theme name is not part of the built-in catalogue. */
export class UnknownThemeError extends Error {
  constructor(public readonly themeName: string, available: readonly string[]) {
    super(`Unknown theme "${themeName}". Available themes: ${available.join(', ')}`);
    this.name = 'UnknownThemeError';
  }
}

/** Thrown when an article mode is neither `news` nor `newspic`. */
export class UnknownModeError extends Error {
  constructor(public readonly mode: string) {
    super(`Unknown article mode "${mode}". Expected "news" or "newspic"`);
    this.name = 'UnknownModeError';
  }
}

/** Thrown when no registered parser accepts the input identifier. */
export class UnsupportedInputError extends Error {
  constructor(public readonly identifier: string) {
    super(`No parser available for input "${identifier}"`);
    this.name = 'UnsupportedInputError';
  }
}
