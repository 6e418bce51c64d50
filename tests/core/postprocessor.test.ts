import { substituteImageUrls } from '../../src/core/postprocessor.js';

describe('substituteImageUrls', () => {
  it('should return the input unchanged for an empty mapping', () => {
    const html = '<img src="a.png">';
    expect(substituteImageUrls(html, new Map())).toBe(html);
  });

  it('should rewrite double- and single-quoted sources', () => {
    const mapping = new Map([
      ['a.png', 'https://mmbiz.qpic.cn/a'],
      ['b.png', 'https://mmbiz.qpic.cn/b'],
    ]);
    expect(substituteImageUrls('<img src="a.png" alt="x"><img src=\'b.png\'>', mapping)).toBe(
      '<img src="https://mmbiz.qpic.cn/a" alt="x"><img src="https://mmbiz.qpic.cn/b">',
    );
  });

  it('should match escaped sources and escape the replacement', () => {
    const mapping = new Map([['a.png?x=1&y=2', 'https://cdn.example.com/p?k=1&v=2']]);
    expect(substituteImageUrls('<img src="a.png?x=1&amp;y=2" />', mapping)).toBe(
      '<img src="https://cdn.example.com/p?k=1&amp;v=2" />',
    );
  });

  it('should leave unmapped images and other attributes alone', () => {
    const html = '<a href="a.png">a</a><img alt="a" src="c.png">';
    expect(substituteImageUrls(html, new Map([['a.png', 'X']]))).toBe(html);
  });
});
