import type { ArticleMode, ContentParser, ThemeName } from './core/types';

/**
 * Options for a single conversion.
 */
export interface ConvertOptions {
  /** Raw document text (Markdown or HTML). */
  source: string;
  /** Theme name. Defaults to `academic_gray`. */
  theme?: ThemeName | string;
  /** Article mode; sets the image and text caps. Defaults to `news`. */
  mode?: ArticleMode | string;
  /**
   * Format name or file name used to pick a parser, e.g. `markdown`,
   * `html` or `post.md`. Defaults to `markdown`.
   */
  inputFormat?: string;
  /** Parsers to choose from, in priority order. */
  parsers?: readonly ContentParser[];
  /** Spaces per list nesting level for Markdown input. Defaults to 2. */
  indentUnit?: number;
}
