/**
 * Built-in theme catalogue.
 *
 * The WeChat editor drops class attributes and most CSS, so each theme is a
 * flat palette that renderers turn into inline styles. Colors are plain hex
 * values: the editor rejects `rgba()` in several attributes.
 */

import { UnknownThemeError } from './types.js';
import type { Theme, ThemeName } from './types.js';

/** Neutral gray palette for essays and papers. */
const academicGray: Theme = Object.freeze({
  name: 'academic_gray',
  label: 'Academic Gray',
  description: 'Neutral grays with restrained accents. Suits essays and research notes.',
  headerBackground: '#3C3C3C',
  headerTextColor: '#FFFFFF',
  headerFontSize: '20px',
  bodyTextColor: '#333333',
  cardBackground: '#FAFAFA',
  cardBorderColor: '#E8E8E8',
  accentColor: '#333333',
  headingColor: '#333333',
  h2FontSize: '18px',
  h3Background: '#F5F5F5',
  h3BorderColor: '#3C3C3C',
  h3FontSize: '16px',
  codeBlockBackground: '#F4F4F4',
  codeBlockBorderColor: '#E0E0E0',
  tableHeaderBackground: '#F5F5F5',
  linkColor: '#576B95',
  metaTextColor: '#888888',
  metaFontSize: '12px',
  sourceTextColor: '#999999',
  listIndent: 20,
});

/** Warm reds and yellows for holiday posts. */
const festival: Theme = Object.freeze({
  name: 'festival',
  label: 'Festival',
  description: 'Warm reds and yellows for celebrations and holiday greetings.',
  headerBackground: '#FF6B6B',
  headerTextColor: '#FFFFFF',
  headerFontSize: '20px',
  bodyTextColor: '#5D4037',
  cardBackground: '#FFFDE7',
  cardBorderColor: '#FFB74D',
  accentColor: '#FF6B6B',
  headingColor: '#D32F2F',
  h2FontSize: '18px',
  h3Background: '#FFE082',
  h3BorderColor: '#FF6B6B',
  h3FontSize: '16px',
  codeBlockBackground: '#FFF3E0',
  codeBlockBorderColor: '#FFB74D',
  tableHeaderBackground: '#FFE082',
  linkColor: '#D32F2F',
  metaTextColor: '#8D6E63',
  metaFontSize: '12px',
  sourceTextColor: '#A1887F',
  listIndent: 24,
});

/** Blues for product and engineering write-ups. */
const tech: Theme = Object.freeze({
  name: 'tech',
  label: 'Tech',
  description: 'Cool blues for product launches and engineering write-ups.',
  headerBackground: '#1565C0',
  headerTextColor: '#FFFFFF',
  headerFontSize: '20px',
  bodyTextColor: '#0D47A1',
  cardBackground: '#E8F4FD',
  cardBorderColor: '#42A5F5',
  accentColor: '#1565C0',
  headingColor: '#0D47A1',
  h2FontSize: '18px',
  h3Background: '#BBDEFB',
  h3BorderColor: '#1565C0',
  h3FontSize: '16px',
  codeBlockBackground: '#E1F5FE',
  codeBlockBorderColor: '#26C6DA',
  tableHeaderBackground: '#BBDEFB',
  linkColor: '#1565C0',
  metaTextColor: '#546E7A',
  metaFontSize: '12px',
  sourceTextColor: '#78909C',
  listIndent: 22,
});

/** High-contrast reds and oranges for notices. */
const announcement: Theme = Object.freeze({
  name: 'announcement',
  label: 'Announcement',
  description: 'High-contrast reds and oranges for important notices.',
  headerBackground: '#D32F2F',
  headerTextColor: '#FFFFFF',
  headerFontSize: '22px',
  bodyTextColor: '#BF360C',
  cardBackground: '#FFF8E1',
  cardBorderColor: '#FF5722',
  accentColor: '#D32F2F',
  headingColor: '#BF360C',
  h2FontSize: '20px',
  h3Background: '#FFE0B2',
  h3BorderColor: '#D32F2F',
  h3FontSize: '17px',
  codeBlockBackground: '#FFEBEE',
  codeBlockBorderColor: '#EF5350',
  tableHeaderBackground: '#FFE0B2',
  linkColor: '#BF360C',
  metaTextColor: '#8D6E63',
  metaFontSize: '12px',
  sourceTextColor: '#A1887F',
  listIndent: 24,
});

export const THEMES: Readonly<Record<ThemeName, Theme>> = Object.freeze({
  academic_gray: academicGray,
  festival,
  tech,
  announcement,
});

export const DEFAULT_THEME: ThemeName = 'academic_gray';

/** Theme names in catalogue order. */
export function listThemes(): ThemeName[] {
  return Object.keys(THEMES).filter(isThemeName);
}

export function isThemeName(name: string): name is ThemeName {
  return Object.prototype.hasOwnProperty.call(THEMES, name);
}

/**
 * Look up a theme by name.
 *
 * @throws {UnknownThemeError} when `name` is not in the catalogue.
 */
export function lookupTheme(name: string): Theme {
  if (!isThemeName(name)) {
    throw new UnknownThemeError(name, Object.keys(THEMES));
  }
  return THEMES[name];
}
