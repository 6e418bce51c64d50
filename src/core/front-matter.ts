/**
 * Front matter extraction.
 *
 * Splits a leading `---` delimited YAML block from the document body. A
 * block that does not parse is reported as malformed and the whole text is
 * kept as body content.
 *
 * @module core/front-matter
 */

import { parse as parseYaml } from 'yaml';
import type { FrontMatter } from './types.js';

export interface FrontMatterResult {
  frontMatter: FrontMatter;
  body: string;
  /** `true` when a delimited block was found but could not be parsed. */
  malformed: boolean;
}

const DELIMITER = '---';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Scalars become strings; anything else is ignored. */
function scalarToString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return undefined;
}

function toTags(value: unknown): string[] | undefined {
  const raw = Array.isArray(value) ? value : [value];
  const tags: string[] = [];
  for (const entry of raw) {
    const tag = scalarToString(entry);
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags.length > 0 ? tags : undefined;
}

/**
 * Map parsed YAML onto {@link FrontMatter}, leaving unknown keys behind and
 * absent or unusable fields unset.
 */
function toFrontMatter(data: Record<string, unknown>): FrontMatter {
  const frontMatter: FrontMatter = {};

  const title = scalarToString(data.title);
  if (title) frontMatter.title = title;

  const date = scalarToString(data.date);
  if (date) frontMatter.date = date;

  const tags = toTags(data.tags);
  if (tags) frontMatter.tags = tags;

  const permalink = scalarToString(data.permalink);
  if (permalink) frontMatter.permalink = permalink;

  return frontMatter;
}

/**
 * Extract front matter from raw document text.
 *
 * @example
 * ```ts
 * extractFrontMatter('---\ntitle: Hello\n---\nBody');
 * // => { frontMatter: { title: 'Hello' }, body: 'Body', malformed: false }
 * ```
 */
export function extractFrontMatter(text: string): FrontMatterResult {
  const none: FrontMatterResult = { frontMatter: {}, body: text, malformed: false };
  const lines = text.split(/\r?\n/);

  if (lines.length < 2 || lines[0].trim() !== DELIMITER) return none;

  const end = lines.findIndex((line, i) => i > 0 && line.trim() === DELIMITER);
  if (end === -1) return none;

  const block = lines.slice(1, end).join('\n');
  let data: unknown;
  try {
    data = parseYaml(block);
  } catch {
    return { ...none, malformed: true };
  }

  if (data === null || data === undefined) {
    // A blank block is "no metadata"; one holding only comments is content.
    return block.trim() === '' ? { ...none, body: lines.slice(end + 1).join('\n') } : none;
  }
  if (!isRecord(data)) {
    return { ...none, malformed: true };
  }

  return {
    frontMatter: toFrontMatter(data),
    body: lines.slice(end + 1).join('\n'),
    malformed: false,
  };
}
