import { createRenderContext } from '../../src/core/context.js';
import { parseHtmlDocument, parseMarkdownDocument } from '../../src/core/parsers.js';
import {
  UNTITLED,
  blocksToPlainText,
  extractMetadata,
  extractSummary,
  extractTitle,
  htmlImageSources,
} from '../../src/core/summary.js';

const news = createRenderContext('tech', 'news');
const newspic = createRenderContext('tech', 'newspic');

describe('extractTitle', () => {
  it('should prefer the front-matter title', () => {
    expect(extractTitle(parseMarkdownDocument('---\ntitle: From front matter\n---\n# Heading'))).toBe(
      'From front matter',
    );
  });

  it('should fall back to the first H1', () => {
    expect(extractTitle(parseMarkdownDocument('intro\n\n# Hello *there*\n\n# Second'))).toBe('Hello there');
  });

  it('should use an HTML document title before its H1', () => {
    const doc = parseHtmlDocument('<html><head><title>Page</title></head><body><h1>Head</h1></body></html>');
    expect(extractTitle(doc)).toBe('Page');
  });

  it('should read the H1 inside raw HTML', () => {
    expect(extractTitle(parseHtmlDocument('<h1>Head <em>line</em></h1><p>x</p>'))).toBe('Head line');
  });

  it('should return Untitled when nothing names the document', () => {
    expect(extractTitle(parseMarkdownDocument(''))).toBe(UNTITLED);
    expect(extractTitle(parseMarkdownDocument('## Only a section'))).toBe('Untitled');
  });
});

describe('extractSummary', () => {
  it('should use the first non-empty paragraph as plain text', () => {
    const doc = parseMarkdownDocument('# T\n\n## S\n\nFirst **para**.\n\nSecond');
    expect(extractSummary(doc, 120)).toBe('First para.');
  });

  it('should truncate to the cap in code points', () => {
    const doc = parseMarkdownDocument('x'.repeat(1200));
    expect(extractSummary(doc, 1000)).toHaveLength(1000);
    expect(Array.from(extractSummary(parseMarkdownDocument('你好世界'), 2))).toEqual(['你', '好']);
  });

  it('should return an empty string without paragraphs', () => {
    expect(extractSummary(parseMarkdownDocument('# Only\n\n- list'), 120)).toBe('');
  });

  it('should skip empty HTML paragraphs', () => {
    expect(extractSummary(parseHtmlDocument('<p> </p><p>Hello &amp; bye</p>'), 120)).toBe('Hello & bye');
  });
});

describe('htmlImageSources', () => {
  it('should read quoted and unquoted sources and decode entities', () => {
    expect(htmlImageSources('<img src="a.png"><img alt=x src=\'b.png\'><img src=c.png><img src="d?a=1&amp;b=2">')).toEqual(
      ['a.png', 'b.png', 'c.png', 'd?a=1&b=2'],
    );
  });
});

describe('blocksToPlainText', () => {
  it('should emit one line per block, list item and table row', () => {
    const doc = parseMarkdownDocument('# T\n\nPara\n\n- a\n  - b\n\n```\ncode\n```\n\n| h |\n| - |\n| c |\n\n---');
    expect(blocksToPlainText(doc.blocks)).toBe('T\nPara\na\nb\ncode\nh\nc');
  });
});

describe('extractMetadata', () => {
  it('should dedupe images in order and take the first as cover', () => {
    const doc = parseMarkdownDocument('![a](1.png) ![b](2.png)\n\n![a](1.png)\n\n- [![c](3.png)](https://example.com)');
    const meta = extractMetadata(doc, news);
    expect(meta.images).toEqual(['1.png', '2.png', '3.png']);
    expect(meta.coverUrl).toBe('1.png');
  });

  it('should cap images at 20 for image posts', () => {
    const src = Array.from({ length: 25 }, (_, i) => `![i](img${i}.png)`).join('\n\n');
    const meta = extractMetadata(parseMarkdownDocument(src), newspic);
    expect(meta.images).toHaveLength(20);
    expect(meta.images[19]).toBe('img19.png');
    expect(meta.coverUrl).toBe('img0.png');
  });

  it('should cap the summary and body text for image posts', () => {
    const meta = extractMetadata(parseMarkdownDocument('y'.repeat(1200)), newspic);
    expect(meta.summary).toHaveLength(1000);
    expect(meta.plainText).toHaveLength(1000);
  });

  it('should leave the cover unset when there are no images', () => {
    const meta = extractMetadata(parseMarkdownDocument('text'), news);
    expect(meta.images).toEqual([]);
    expect('coverUrl' in meta).toBe(false);
  });

  it('should find images in tables and raw HTML', () => {
    expect(extractMetadata(parseMarkdownDocument('a | b\n--- | ---\n![x](t.png) | y'), news).images).toEqual(['t.png']);
    expect(extractMetadata(parseHtmlDocument('<p><img src="h.png"></p>'), news).images).toEqual(['h.png']);
  });
});
