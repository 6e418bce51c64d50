/**
 * Render context construction.
 *
 * @module core/context
 */

import { lookupTheme } from './themes.js';
import { UnknownModeError } from './types.js';
import type { ArticleMode, RenderContext } from './types.js';

interface ModeLimits {
  imageCountCap: number;
  textLengthCap: number;
  bodyTextCap: number;
}

/**
 * Per-mode caps. `newspic` (image posts) accepts at most 20 images and
 * 1000 characters of text; `news` digests are limited to 120 characters.
 */
export const MODE_LIMITS: Readonly<Record<ArticleMode, Readonly<ModeLimits>>> = Object.freeze({
  news: Object.freeze({
    imageCountCap: Number.POSITIVE_INFINITY,
    textLengthCap: 120,
    bodyTextCap: Number.POSITIVE_INFINITY,
  }),
  newspic: Object.freeze({
    imageCountCap: 20,
    textLengthCap: 1000,
    bodyTextCap: 1000,
  }),
});

export function isArticleMode(mode: string): mode is ArticleMode {
  return mode === 'news' || mode === 'newspic';
}

/**
 * Build a frozen {@link RenderContext}. The theme is resolved first, so an
 * unknown theme fails before anything else happens.
 *
 * @throws {UnknownThemeError} for a theme outside the catalogue.
 * @throws {UnknownModeError} for a mode other than `news` / `newspic`.
 */
export function createRenderContext(themeName: string, mode: string): RenderContext {
  const theme = lookupTheme(themeName);
  if (!isArticleMode(mode)) {
    throw new UnknownModeError(mode);
  }
  return Object.freeze({ theme, mode, ...MODE_LIMITS[mode] });
}
