/**
 * HTML postprocessor.
 *
 * Applies transformations to rendered HTML after conversion, once images
 * have been uploaded.
 *
 * @module core/postprocessor
 */

import { decodeEntities, escapeHtml } from './text.js';

const IMG_SRC_RE = /(<img\b[^>]*?\bsrc\s*=\s*)(?:"([^"]*)"|'([^']*)')/gi;

/**
 * Rewrite `<img src>` values found in `mapping` to their mapped URL.
 *
 * Keys are compared against the decoded attribute value, so a key written
 * as `a.png?x=1&y=2` matches `src="a.png?x=1&amp;y=2"`. Everything else is
 * left byte-for-byte unchanged.
 *
 * @param html - Rendered article HTML.
 * @param mapping - Original image URL to replacement URL.
 */
export function substituteImageUrls(
  html: string,
  mapping: ReadonlyMap<string, string>,
): string {
  if (mapping.size === 0) return html;

  return html.replace(IMG_SRC_RE, (match, prefix: string, dq: string | undefined, sq: string | undefined) => {
    const raw = dq ?? sq ?? '';
    const replacement = mapping.get(decodeEntities(raw));
    if (replacement === undefined) return match;
    return `${prefix}"${escapeHtml(replacement)}"`;
  });
}
