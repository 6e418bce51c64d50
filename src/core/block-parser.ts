/**
 * Block parser.
 *
 * A line-oriented state machine that turns a Markdown body into an ordered
 * sequence of {@link Block}s. Text runs of closed blocks are handed to the
 * inline parser; code and rules are not.
 *
 * States: idle, paragraph, list (with a nesting stack), code fence,
 * blockquote and table.
 *
 * @module core/block-parser
 */

import { parseInline } from './inline-parser.js';
import type {
  Alignment,
  Block,
  HeadingLevel,
  ListBlock,
  TableCell,
} from './types.js';

export interface BlockParserOptions {
  /**
   * Spaces per list nesting level. Indentation that is not a multiple of
   * the unit rounds down.
   * @default 2
   */
  indentUnit?: number;
}

// ---------------------------------------------------------------------------
// Line patterns
// ---------------------------------------------------------------------------

const HEADING_RE = /^ {0,3}(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_OPEN_RE = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE_RE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;
const RULE_RE = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const LIST_ITEM_RE = /^([ \t]*)([-*+]|\d{1,9}\.)[ \t]+(.*)$/;
const QUOTE_RE = /^ {0,3}> ?(.*)$/;
const IMAGE_LINE_RE = /^!\[([^\]]*)\]\(\s*([^\s)]+)(?:\s+"([^"]*)")?\s*\)$/;
const SEPARATOR_CELL_RE = /^:?-+:?$/;

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

// ---------------------------------------------------------------------------
// Parser state
// ---------------------------------------------------------------------------

interface DraftItem {
  lines: string[];
  nested?: DraftList;
}

interface DraftList {
  ordered: boolean;
  items: DraftItem[];
}

type ParserState =
  | { kind: 'idle' }
  | { kind: 'paragraph'; lines: string[] }
  | { kind: 'blockquote'; lines: string[] }
  | { kind: 'code'; fenceChar: string; fenceLength: number; language?: string; lines: string[] }
  | { kind: 'list'; root: DraftList; stack: DraftList[]; baseLevel: number }
  | { kind: 'table'; alignments: Alignment[]; header: string[]; rows: string[][] };

interface ListMarker {
  level: number;
  ordered: boolean;
  content: string;
}

// ---------------------------------------------------------------------------
// Table helpers
// ---------------------------------------------------------------------------

/**
 * Split a table row into trimmed cells. One leading and one trailing pipe
 * are optional; `\|` is a literal pipe.
 */
export function splitTableRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) row = row.slice(1);
  if (row.endsWith('|') && !row.endsWith('\\|')) row = row.slice(0, -1);

  const cells: string[] = [];
  let current = '';
  for (let i = 0; i < row.length; i++) {
    const ch = row[i];
    if (ch === '\\' && row[i + 1] === '|') {
      current += '|';
      i++;
    } else if (ch === '|') {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

function parseAlignment(cell: string): Alignment {
  const left = cell.startsWith(':');
  const right = cell.endsWith(':');
  if (left && right) return 'center';
  if (right) return 'right';
  if (left) return 'left';
  return 'none';
}

/** Alignments of a separator row, or `null` when `line` is not one. */
function parseSeparatorRow(line: string | undefined): Alignment[] | null {
  if (line === undefined || !line.includes('-')) return null;
  const cells = splitTableRow(line);
  if (!cells.every((cell) => SEPARATOR_CELL_RE.test(cell))) return null;
  // A lone `---` is a rule, not a one-column separator.
  if (cells.length === 1 && !line.includes('|')) return null;
  return cells.map(parseAlignment);
}

function toCell(text: string): TableCell {
  return { text, spans: parseInline(text) };
}

// ---------------------------------------------------------------------------
// BlockParser
// ---------------------------------------------------------------------------

/**
 * Line-by-line Markdown block parser.
 *
 * Instances hold parse state, so use one instance per document (or call
 * {@link parseBlocks}).
 */
export class BlockParser {
  private readonly indentUnit: number;
  private blocks: Block[] = [];
  private state: ParserState = { kind: 'idle' };

  constructor(options: BlockParserOptions = {}) {
    this.indentUnit = Math.max(1, Math.floor(options.indentUnit ?? 2));
  }

  parse(text: string): Block[] {
    this.blocks = [];
    this.state = { kind: 'idle' };

    const lines = text.replace(/\r\n?/g, '\n').split('\n');
    for (let i = 0; i < lines.length; ) {
      i += this.step(lines, i);
    }
    this.close();

    return this.blocks;
  }

  /** Process the line at `index`; returns the number of lines consumed. */
  private step(lines: string[], index: number): number {
    const line = lines[index];
    const state = this.state;

    if (state.kind === 'code') {
      const close = FENCE_CLOSE_RE.exec(line);
      if (close && close[1][0] === state.fenceChar && close[1].length >= state.fenceLength) {
        this.close();
      } else {
        state.lines.push(line);
      }
      return 1;
    }

    if (line.trim() === '') {
      if (state.kind === 'list' && this.listContinuesAfterBlank(lines, index + 1, state.baseLevel)) {
        return 1;
      }
      this.close();
      return 1;
    }

    if (state.kind === 'table') {
      if (line.includes('|') && !HEADING_RE.test(line) && !FENCE_OPEN_RE.test(line) && !QUOTE_RE.test(line)) {
        state.rows.push(splitTableRow(line));
        return 1;
      }
      this.close();
    }

    const fence = FENCE_OPEN_RE.exec(line);
    if (fence && !(fence[1][0] === '`' && fence[2].includes('`'))) {
      this.close();
      const info = fence[2].trim();
      this.state = {
        kind: 'code',
        fenceChar: fence[1][0],
        fenceLength: fence[1].length,
        ...(info ? { language: info } : {}),
        lines: [],
      };
      return 1;
    }

    const heading = HEADING_RE.exec(line);
    if (heading) {
      this.close();
      const text = heading[2].trim();
      this.blocks.push({
        kind: 'heading',
        level: HEADING_LEVELS[heading[1].length - 1],
        text,
        spans: parseInline(text),
      });
      return 1;
    }

    if (RULE_RE.test(line)) {
      this.close();
      this.blocks.push({ kind: 'rule' });
      return 1;
    }

    const marker = this.matchListItem(line);
    if (marker) {
      this.addListItem(marker);
      return 1;
    }

    const quote = QUOTE_RE.exec(line);
    if (quote) {
      if (state.kind === 'blockquote') {
        state.lines.push(quote[1].trim());
      } else {
        this.close();
        this.state = { kind: 'blockquote', lines: [quote[1].trim()] };
      }
      return 1;
    }

    const image = IMAGE_LINE_RE.exec(line.trim());
    if (image) {
      this.close();
      const [, alt, url, title] = image;
      this.blocks.push(title === undefined ? { kind: 'image', alt, url } : { kind: 'image', alt, url, title });
      return 1;
    }

    const alignments = line.includes('|') ? parseSeparatorRow(lines[index + 1]) : null;
    const header = alignments ? splitTableRow(line) : [];
    if (alignments && header.length === alignments.length) {
      this.close();
      this.state = { kind: 'table', alignments, header, rows: [] };
      return 2;
    }

    this.appendText(line.trim());
    return 1;
  }

  /** Plain text continues the open paragraph, list item or quote. */
  private appendText(text: string): void {
    const state = this.state;
    switch (state.kind) {
      case 'paragraph':
      case 'blockquote':
        state.lines.push(text);
        return;
      case 'list': {
        const list = state.stack[state.stack.length - 1];
        list.items[list.items.length - 1].lines.push(text);
        return;
      }
      default:
        this.close();
        this.state = { kind: 'paragraph', lines: [text] };
    }
  }

  private matchListItem(line: string): ListMarker | null {
    const match = LIST_ITEM_RE.exec(line);
    if (!match) return null;
    const width = match[1].replace(/\t/g, ' '.repeat(this.indentUnit)).length;
    return {
      level: Math.floor(width / this.indentUnit),
      ordered: /^\d/.test(match[2]),
      content: match[3].trim(),
    };
  }

  /**
   * A blank line inside a list keeps it open only when the next non-blank
   * line is an item at or below the list's base level.
   */
  private listContinuesAfterBlank(lines: string[], from: number, baseLevel: number): boolean {
    for (let i = from; i < lines.length; i++) {
      if (lines[i].trim() === '') continue;
      if (RULE_RE.test(lines[i])) return false;
      const marker = this.matchListItem(lines[i]);
      return marker !== null && marker.level >= baseLevel;
    }
    return false;
  }

  private addListItem(marker: ListMarker): void {
    const state = this.state;
    const item: DraftItem = { lines: [marker.content] };

    if (state.kind !== 'list') {
      this.close();
      const root: DraftList = { ordered: marker.ordered, items: [item] };
      this.state = { kind: 'list', root, stack: [root], baseLevel: marker.level };
      return;
    }

    const level = Math.max(0, marker.level - state.baseLevel);
    const depth = state.stack.length - 1;

    if (level > depth) {
      // Deeper markers nest under the most recent item, one level at a time.
      const parent = state.stack[depth];
      const parentItem = parent.items[parent.items.length - 1];
      if (!parentItem.nested) {
        parentItem.nested = { ordered: marker.ordered, items: [] };
      }
      state.stack.push(parentItem.nested);
    } else {
      state.stack.length = level + 1;
    }

    if (state.stack.length === 1 && state.root.ordered !== marker.ordered) {
      // Switching between bullets and numbers at the top level starts a new list.
      this.close();
      const root: DraftList = { ordered: marker.ordered, items: [item] };
      this.state = { kind: 'list', root, stack: [root], baseLevel: marker.level };
      return;
    }

    state.stack[state.stack.length - 1].items.push(item);
  }

  /** Emit the block for the current state and return to idle. */
  private close(): void {
    const state = this.state;
    this.state = { kind: 'idle' };

    switch (state.kind) {
      case 'idle':
        return;
      case 'paragraph':
        this.blocks.push({ kind: 'paragraph', spans: parseInline(state.lines.join('\n')) });
        return;
      case 'blockquote':
        this.blocks.push({ kind: 'blockquote', spans: parseInline(state.lines.join('\n')) });
        return;
      case 'code':
        this.blocks.push(
          state.language === undefined
            ? { kind: 'code', lines: state.lines }
            : { kind: 'code', language: state.language, lines: state.lines },
        );
        return;
      case 'list':
        this.blocks.push(finalizeList(state.root));
        return;
      case 'table':
        this.blocks.push({
          kind: 'table',
          alignments: state.alignments,
          header: state.header.map(toCell),
          rows: state.rows.map((row) => row.map(toCell)),
        });
        return;
    }
  }
}

function finalizeList(draft: DraftList): ListBlock {
  return {
    kind: 'list',
    ordered: draft.ordered,
    items: draft.items.map((item) =>
      item.nested
        ? { spans: parseInline(item.lines.join('\n')), nested: finalizeList(item.nested) }
        : { spans: parseInline(item.lines.join('\n')) },
    ),
  };
}

/**
 * Parse a Markdown body into blocks with a fresh parser.
 *
 * @example
 * ```ts
 * parseBlocks('# Title\n\nHello');
 * // => [{ kind: 'heading', level: 1, ... }, { kind: 'paragraph', ... }]
 * ```
 */
export function parseBlocks(text: string, options?: BlockParserOptions): Block[] {
  return new BlockParser(options).parse(text);
}
