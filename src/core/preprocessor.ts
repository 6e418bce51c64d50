/**
 * Markdown preprocessor.
 *
 * Normalizes source text before block parsing. Fenced code blocks and
 * inline code spans pass through untouched.
 *
 * @module core/preprocessor
 */

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})/;
const INLINE_CODE_RE = /`[^`\n]+`/g;
const PLACEHOLDER_RE = /\x00CODE(\d+)\x00/g;

/**
 * Replace leading tabs with `indentUnit` spaces each, so that list nesting
 * is measured in one unit regardless of the author's editor.
 */
function expandLeadingTabs(line: string, indentUnit: number): string {
  const match = /^[ \t]+/.exec(line);
  if (!match || !match[0].includes('\t')) return line;
  const indent = match[0].replace(/\t/g, ' '.repeat(indentUnit));
  return indent + line.slice(match[0].length);
}

/**
 * Turn task-list markers into glyphs; the editor has no checkbox element.
 *
 * - `- [x]` / `- [X]` becomes `- ✅`
 * - `- [ ]` becomes `- ⬜`
 */
function convertCheckboxes(line: string): string {
  return line
    .replace(/^(\s*[-*+]\s+)\[[xX]\]/, '$1✅')
    .replace(/^(\s*[-*+]\s+)\[ \]/, '$1⬜');
}

/**
 * Split the document into lines and tag each with whether it sits inside a
 * fenced code block (fence lines themselves count as code).
 */
function classifyLines(lines: string[]): boolean[] {
  const inCode: boolean[] = [];
  let fence: { char: string; length: number } | null = null;

  for (const line of lines) {
    const match = FENCE_RE.exec(line);
    if (fence) {
      inCode.push(true);
      if (
        match &&
        match[1][0] === fence.char &&
        match[1].length >= fence.length &&
        line.trim() === match[1]
      ) {
        fence = null;
      }
    } else if (match) {
      inCode.push(true);
      fence = { char: match[1][0], length: match[1].length };
    } else {
      inCode.push(false);
    }
  }

  return inCode;
}

/**
 * Apply `transform` to the parts of a line outside inline code spans.
 */
function outsideInlineCode(line: string, transform: (text: string) => string): string {
  const spans: string[] = [];
  const masked = line.replace(INLINE_CODE_RE, (match) => {
    spans.push(match);
    return `\x00CODE${spans.length - 1}\x00`;
  });
  return transform(masked).replace(PLACEHOLDER_RE, (_m, idx: string) => spans[parseInt(idx, 10)]);
}

/**
 * Expand footnotes inline.
 *
 * Definitions (`[^id]: text`) are removed and each reference `[^id]` is
 * replaced with `(*text*)`. References without a definition stay as written.
 */
function expandFootnotes(lines: string[], inCode: boolean[]): string[] {
  const notes = new Map<string, string>();
  const kept: string[] = [];
  const keptInCode: boolean[] = [];

  lines.forEach((line, i) => {
    const def = inCode[i] ? null : /^\[\^([^\]\s]+)\]:\s*(.+)$/.exec(line);
    if (def) {
      notes.set(def[1], def[2].trim());
      return;
    }
    kept.push(line);
    keptInCode.push(inCode[i]);
  });

  if (notes.size === 0) return lines;

  return kept.map((line, i) =>
    keptInCode[i]
      ? line
      : outsideInlineCode(line, (text) =>
          text.replace(/\[\^([^\]\s]+)\]/g, (match, id: string) => {
            const note = notes.get(id);
            return note === undefined ? match : `(*${note}*)`;
          }),
        ),
  );
}

/**
 * Apply all preprocessing steps in order:
 * 1. Normalize line endings to `\n`
 * 2. Expand leading tabs
 * 3. Convert task-list checkboxes
 * 4. Inline footnotes
 *
 * @param markdown - Raw Markdown body (front matter already removed).
 * @param indentUnit - Spaces per nesting level; one tab equals one unit.
 */
export function preprocessMarkdown(markdown: string, indentUnit = 2): string {
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');
  const inCode = classifyLines(lines);

  const normalized = lines.map((line, i) =>
    inCode[i] ? line : convertCheckboxes(expandLeadingTabs(line, indentUnit)),
  );

  return expandFootnotes(normalized, inCode).join('\n');
}
