/**
 * String helpers shared by the renderers and extractors.
 *
 * @module core/text
 */

const ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape HTML special characters for use in element content or a quoted
 * attribute value.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

/**
 * Escape only `&`, `<` and `>`. Code listings go through this so that the
 * text is otherwise byte-for-byte what the author wrote.
 */
export function escapeCodeText(text: string): string {
  return text.replace(/[&<>]/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

/** Truncate to at most `max` code points. */
export function truncateChars(text: string, max: number): string {
  if (!Number.isFinite(max)) return text;
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') : text;
}

const REPLACEMENT_CHAR = '\uFFFD';

/** Numeric references to NUL, surrogates or past U+10FFFF decode to U+FFFD. */
function fromCodePoint(codePoint: number): string {
  if (codePoint === 0 || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return REPLACEMENT_CHAR;
  }
  return String.fromCodePoint(codePoint);
}

/** Decode the named and numeric entities that `escapeHtml` and editors emit. */
export function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-fA-F]+);/gi, (_m, hex: string) => fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m, dec: string) => fromCodePoint(parseInt(dec, 10)))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

/**
 * Strip tags from an HTML fragment, decode entities and collapse runs of
 * blank lines.
 */
export function stripHtmlTags(html: string): string {
  return decodeEntities(
    html
      .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, '')
      .replace(/<br\s*\/?>/gi, '\n')
      .replace(/<\/(p|div|h[1-6]|li|tr|section|blockquote)>/gi, '\n')
      .replace(/<[^>]*>/g, ''),
  )
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
