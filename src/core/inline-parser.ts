/**
 * Inline span parser.
 *
 * Scans a text run left to right and produces a sequence of
 * {@link InlineSpan}s that covers the whole run. Delimiters are matched
 * leftmost-first and never overlap; anything that does not close is kept as
 * literal text.
 *
 * @module core/inline-parser
 */

import type { InlineSpan } from './types.js';

interface Match {
  spans: InlineSpan[];
  /** Index just past the matched source. */
  end: number;
}

/**
 * Deepest nesting of links, colour labels, emphasis and strikethrough.
 * Delimiters past this depth stay literal text.
 */
export const MAX_INLINE_DEPTH = 32;

const ESCAPABLE_RE = /[!-/:-@[-`{-~]/;
const COLOR_RE = /^\{color:\s*(#[0-9a-fA-F]{3,8}|[a-zA-Z]+)\s*\}/;
const WORD_CHAR_RE = /[\p{L}\p{N}]/u;

function isWhitespace(ch: string | undefined): boolean {
  return ch === undefined || /\s/.test(ch);
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR_RE.test(ch);
}

function countRun(source: string, pos: number, ch: string): number {
  let end = pos;
  while (source[end] === ch) end++;
  return end - pos;
}

/**
 * Accumulates spans, merging adjacent text so the output never contains two
 * text spans in a row.
 */
class SpanList {
  readonly spans: InlineSpan[] = [];

  push(...spans: InlineSpan[]): void {
    for (const span of spans) {
      const last = this.spans[this.spans.length - 1];
      if (span.kind === 'text' && last?.kind === 'text') {
        last.text += span.text;
      } else if (span.kind !== 'text' || span.text !== '') {
        this.spans.push(span.kind === 'text' ? { kind: 'text', text: span.text } : span);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Code spans
// ---------------------------------------------------------------------------

/** Index just past the code span opening at `pos`, or -1 when unclosed. */
function codeSpanEnd(source: string, pos: number): number {
  const run = countRun(source, pos, '`');
  let search = pos + run;
  for (;;) {
    const idx = source.indexOf('`', search);
    if (idx === -1) return -1;
    const closeRun = countRun(source, idx, '`');
    if (closeRun === run) return idx + run;
    search = idx + closeRun;
  }
}

function matchCode(source: string, pos: number): Match {
  const run = countRun(source, pos, '`');
  const end = codeSpanEnd(source, pos);
  if (end === -1) {
    // The whole run is literal so a shorter run inside it cannot open.
    return { spans: [{ kind: 'text', text: '`'.repeat(run) }], end: pos + run };
  }
  let code = source.slice(pos + run, end - run).replace(/\n/g, ' ');
  if (code.length >= 2 && code.startsWith(' ') && code.endsWith(' ') && code.trim() !== '') {
    code = code.slice(1, -1);
  }
  return { spans: [{ kind: 'code', text: code }], end };
}

// ---------------------------------------------------------------------------
// Links and images
// ---------------------------------------------------------------------------

/** Index of the `]` matching the `[` at `open`, or -1. */
function findClosingBracket(source: string, open: number): number {
  let depth = 0;
  for (let i = open; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '`') {
      const end = codeSpanEnd(source, i);
      if (end !== -1) i = end - 1;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

interface Destination {
  href: string;
  title?: string;
  end: number;
}

/**
 * Parse `(href "title")` starting at the `(` at `open`. Parentheses inside
 * the href must be balanced.
 */
function parseDestination(source: string, open: number): Destination | null {
  let i = open + 1;
  while (source[i] === ' ') i++;

  const start = i;
  let depth = 0;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\' && i + 1 < source.length) {
      i += 2;
      continue;
    }
    if (/\s/.test(ch)) break;
    if (ch === '(') depth++;
    if (ch === ')') {
      if (depth === 0) break;
      depth--;
    }
    i++;
  }
  const href = source.slice(start, i);

  while (source[i] === ' ') i++;

  let title: string | undefined;
  const quote = source[i];
  if (quote === '"' || quote === "'") {
    const close = source.indexOf(quote, i + 1);
    if (close === -1) return null;
    title = source.slice(i + 1, close);
    i = close + 1;
    while (source[i] === ' ') i++;
  }

  if (source[i] !== ')') return null;
  return title === undefined ? { href, end: i + 1 } : { href, title, end: i + 1 };
}

function matchImage(source: string, pos: number): Match | null {
  const close = findClosingBracket(source, pos + 1);
  if (close === -1 || source[close + 1] !== '(') return null;
  const dest = parseDestination(source, close + 1);
  if (!dest || dest.href === '') return null;
  const alt = source.slice(pos + 2, close);
  return {
    spans: [
      dest.title === undefined
        ? { kind: 'image', alt, url: dest.href }
        : { kind: 'image', alt, url: dest.href, title: dest.title },
    ],
    end: dest.end,
  };
}

function matchLinkOrColor(source: string, pos: number, depth: number): Match | null {
  if (depth >= MAX_INLINE_DEPTH) return null;
  const close = findClosingBracket(source, pos);
  if (close === -1) return null;
  const label = source.slice(pos + 1, close);

  if (source[close + 1] === '(') {
    const dest = parseDestination(source, close + 1);
    if (dest) {
      const children = parseSpans(label, depth + 1);
      return {
        spans: [
          dest.title === undefined
            ? { kind: 'link', href: dest.href, children }
            : { kind: 'link', href: dest.href, title: dest.title, children },
        ],
        end: dest.end,
      };
    }
  }

  const color = COLOR_RE.exec(source.slice(close + 1));
  if (color) {
    return {
      spans: [{ kind: 'colored', color: color[1], children: parseSpans(label, depth + 1) }],
      end: close + 1 + color[0].length,
    };
  }

  return null;
}

// ---------------------------------------------------------------------------
// Emphasis and strikethrough
// ---------------------------------------------------------------------------

/**
 * Find the closing delimiter for an opener of `size` characters. Runs of
 * the other size are skipped whole, so `*a **b** c*` closes on the last
 * `*`. A longer run closes with its last `size` characters.
 *
 * @returns Start index of the closing delimiter, or -1.
 */
function findEmphasisCloser(source: string, from: number, size: number, ch: string): number {
  for (let j = from; j < source.length; j++) {
    const c = source[j];
    if (c === '\\') {
      j++;
      continue;
    }
    if (c === '`') {
      const end = codeSpanEnd(source, j);
      if (end !== -1) j = end - 1;
      continue;
    }
    if (c !== ch) continue;

    const run = countRun(source, j, ch);
    const fits = run === size || run >= 3;
    const closerStart = j + run - size;
    if (
      fits &&
      closerStart > from &&
      !isWhitespace(source[j - 1]) &&
      (ch !== '_' || !isWordChar(source[j + run]))
    ) {
      return closerStart;
    }
    j += run - 1;
  }
  return -1;
}

function matchEmphasis(source: string, pos: number, depth: number): Match | null {
  if (depth >= MAX_INLINE_DEPTH) return null;
  const ch = source[pos];
  const size = Math.min(countRun(source, pos, ch), 3);

  if (isWhitespace(source[pos + size])) return null;
  if (ch === '_' && isWordChar(source[pos - 1])) return null;

  const closer = findEmphasisCloser(source, pos + size, size, ch);
  if (closer === -1) return null;

  const children = parseSpans(source.slice(pos + size, closer), depth + 1);
  let end = closer + size;

  if (size === 3) {
    return { spans: [{ kind: 'bold', children: [{ kind: 'italic', children }] }], end };
  }
  if (size === 1) {
    return { spans: [{ kind: 'italic', children }], end };
  }

  const bold: InlineSpan = { kind: 'bold', children };
  const color = COLOR_RE.exec(source.slice(end));
  if (color) {
    end += color[0].length;
    return { spans: [{ kind: 'colored', color: color[1], children: [bold] }], end };
  }
  return { spans: [bold], end };
}

function matchStrike(source: string, pos: number, depth: number): Match | null {
  if (depth >= MAX_INLINE_DEPTH) return null;
  if (!source.startsWith('~~', pos) || isWhitespace(source[pos + 2])) return null;
  let idx = source.indexOf('~~', pos + 3);
  while (idx !== -1 && isWhitespace(source[idx - 1])) {
    idx = source.indexOf('~~', idx + 1);
  }
  if (idx === -1) return null;
  return {
    spans: [{ kind: 'strike', children: parseSpans(source.slice(pos + 2, idx), depth + 1) }],
    end: idx + 2,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function matchAt(source: string, pos: number, depth: number): Match | null {
  switch (source[pos]) {
    case '\\': {
      const next = source[pos + 1];
      if (next !== undefined && ESCAPABLE_RE.test(next)) {
        return { spans: [{ kind: 'text', text: next }], end: pos + 2 };
      }
      return null;
    }
    case '`':
      return matchCode(source, pos);
    case '!':
      return source[pos + 1] === '[' ? matchImage(source, pos) : null;
    case '[':
      return matchLinkOrColor(source, pos, depth);
    case '~':
      return matchStrike(source, pos, depth);
    case '*':
    case '_':
      return matchEmphasis(source, pos, depth);
    default:
      return null;
  }
}

/**
 * Parse a text run into inline spans.
 *
 * @example
 * ```ts
 * parseInline('Some **bold** text');
 * // => [
 * //   { kind: 'text', text: 'Some ' },
 * //   { kind: 'bold', children: [{ kind: 'text', text: 'bold' }] },
 * //   { kind: 'text', text: ' text' },
 * // ]
 * ```
 */
export function parseInline(source: string): InlineSpan[] {
  return parseSpans(source, 0);
}

function parseSpans(source: string, depth: number): InlineSpan[] {
  const list = new SpanList();
  let pos = 0;

  while (pos < source.length) {
    const match = matchAt(source, pos, depth);
    if (match) {
      list.push(...match.spans);
      pos = match.end;
    } else {
      list.push({ kind: 'text', text: source[pos] });
      pos++;
    }
  }

  return list.spans;
}

/**
 * Flatten spans into the text a reader sees. Soft line breaks become spaces
 * and images contribute their alt text.
 */
export function spansToPlainText(spans: readonly InlineSpan[]): string {
  let text = '';
  for (const span of spans) {
    switch (span.kind) {
      case 'text':
        text += span.text.replace(/\n/g, ' ');
        break;
      case 'code':
        text += span.text;
        break;
      case 'image':
        text += span.alt;
        break;
      case 'bold':
      case 'italic':
      case 'strike':
      case 'link':
      case 'colored':
        text += spansToPlainText(span.children);
        break;
    }
  }
  return text;
}
