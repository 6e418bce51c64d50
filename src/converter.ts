import type { ConvertOptions } from './types';
import type { ContentParser, RenderResult } from './core/types';
import { createRenderContext } from './core/context';
import { HTML_PARSER, createMarkdownParser, resolveParser } from './core/parsers';
import { buildSections, renderSections } from './core/sections';
import { assembleArticle } from './core/assembler';
import { extractMetadata } from './core/summary';
import { DEFAULT_THEME } from './core/themes';

/**
 * Convert a Markdown or HTML document into themed editor HTML plus the
 * metadata a publish step needs.
 *
 * Pipeline:
 * 1. Resolve the theme and mode (an unknown theme throws before any work)
 * 2. Pick a parser and parse into a document (front matter, blocks, anchor
 *    links removed)
 * 3. Group blocks into plain sections and H2/H3 cards and render them
 * 4. Wrap the body with the title banner, meta line and source footer
 * 5. Extract title, summary, cover, image list and plain text, capped per
 *    mode
 *
 * Malformed front matter and ragged tables do not fail the call; they are
 * reported in `warnings`.
 *
 * @throws {UnknownThemeError} for a theme outside the catalogue.
 * @throws {UnknownModeError} for a mode other than `news` / `newspic`.
 * @throws {UnsupportedInputError} when no parser accepts `inputFormat`.
 *
 * @example
 * ```ts
 * const result = convert({ source: '# Hello\n\nWorld', theme: 'tech' });
 * result.title;   // 'Hello'
 * result.summary; // 'World'
 * ```
 */
export function convert(options: ConvertOptions): RenderResult {
  const ctx = createRenderContext(options.theme ?? DEFAULT_THEME, options.mode ?? 'news');

  // `indentUnit` configures the built-in Markdown parser; callers passing
  // their own parsers configure them directly.
  const parsers: readonly ContentParser[] =
    options.parsers ?? [createMarkdownParser({ indentUnit: options.indentUnit }), HTML_PARSER];
  const parser = resolveParser(options.inputFormat ?? 'markdown', parsers);

  const doc = parser.parse(options.source);

  const body = renderSections(buildSections(doc.blocks), ctx.theme);
  const html = assembleArticle(body.html, doc.frontMatter, ctx.theme);
  const metadata = extractMetadata(doc, ctx);

  const result: RenderResult = {
    html,
    title: metadata.title,
    summary: metadata.summary,
    images: metadata.images,
    plainText: metadata.plainText,
    warnings: [...doc.warnings, ...body.warnings],
  };
  if (metadata.coverUrl !== undefined) result.coverUrl = metadata.coverUrl;
  return result;
}
