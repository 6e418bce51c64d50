/**
 * Tests for ArticlePublisher.
 */

import { convert } from '../../src/converter.js';
import type { RenderResult } from '../../src/core/types.js';
import { ArticlePublisher, MAX_TITLE_LENGTH } from '../../src/wechat-api/publisher.js';
import { WeChatApiError, WeChatAuthError } from '../../src/wechat-api/types.js';
import type { DraftArticle, ImageFile, PublishProgress, UploadedImage } from '../../src/wechat-api/types.js';

function fakeApi() {
  return {
    uploadImage: jest.fn<Promise<UploadedImage>, [ImageFile]>(async (file) => ({
      mediaId: `media-${file.filename}`,
      url: `https://mmbiz.qpic.cn/perm/${file.filename}`,
    })),
    uploadContentImage: jest.fn<Promise<string>, [ImageFile]>(
      async (file) => `https://mmbiz.qpic.cn/up/${file.filename}`,
    ),
    createDraft: jest.fn<Promise<string>, [DraftArticle[]]>(async () => 'draft-1'),
  };
}

const readFile = jest.fn<Promise<Uint8Array>, [string]>(async () => new Uint8Array([1]));

function article(overrides: Partial<RenderResult> = {}): RenderResult {
  return {
    html: '<section><img src="a.png" alt=""><p>Body</p></section>',
    title: 'Hello',
    summary: 'Body',
    coverUrl: 'a.png',
    images: ['a.png'],
    plainText: 'Body',
    warnings: [],
    ...overrides,
  };
}

function sentArticle(api: ReturnType<typeof fakeApi>): DraftArticle {
  expect(api.createDraft).toHaveBeenCalledTimes(1);
  const [articles] = api.createDraft.mock.calls[0];
  expect(articles).toHaveLength(1);
  return articles[0];
}

describe('ArticlePublisher', () => {
  beforeEach(() => {
    readFile.mockClear();
  });

  // -------------------------------------------------------------------------
  // news
  // -------------------------------------------------------------------------

  describe('news articles', () => {
    it('should upload images, rewrite the HTML and create a draft', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });

      const outcome = await publisher.publish(article(), { baseDir: '/docs' });

      expect(outcome).toEqual({ success: true, mediaId: 'draft-1', title: 'Hello', imageFailures: [] });
      expect(sentArticle(api)).toEqual({
        articleType: 'news',
        title: 'Hello',
        content: '<section><img src="https://mmbiz.qpic.cn/up/a.png" alt=""><p>Body</p></section>',
        digest: 'Body',
        thumbMediaId: 'media-a.png',
        commentEnabled: false,
        fansOnlyComment: false,
      });
    });

    it('should pass author, source link and comment settings through', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });

      await publisher.publish(article(), {
        baseDir: '/docs',
        author: 'Ann',
        sourceUrl: 'https://example.com/post',
        commentEnabled: true,
        fansOnlyComment: true,
      });

      expect(sentArticle(api)).toMatchObject({
        author: 'Ann',
        contentSourceUrl: 'https://example.com/post',
        commentEnabled: true,
        fansOnlyComment: true,
      });
    });

    it('should prefer an explicit cover image', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });

      await publisher.publish(article(), { baseDir: '/docs', coverImage: 'cover.jpg' });

      expect(api.uploadImage).toHaveBeenCalledTimes(1);
      expect(api.uploadImage.mock.calls[0][0].filename).toBe('cover.jpg');
      expect(sentArticle(api).thumbMediaId).toBe('media-cover.jpg');
    });

    it('should use the first uploaded image when no cover is known', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });
      const result = article({ images: ['b.png'], html: '<img src="b.png">' });
      delete result.coverUrl;

      await publisher.publish(result, { baseDir: '/docs' });

      expect(sentArticle(api).thumbMediaId).toBe('media-b.png');
    });

    it('should fail without any image or cover', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });
      const result = article({ images: [], html: '<p>Body</p>' });
      delete result.coverUrl;

      await expect(publisher.publish(result)).resolves.toEqual({
        success: false,
        error: 'A draft needs a cover image: add an image to the article or pass a cover',
        code: 'MISSING_COVER_IMAGE',
      });
      expect(api.createDraft).not.toHaveBeenCalled();
    });

    it('should truncate long titles and summaries', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });

      const outcome = await publisher.publish(article({ title: 'T'.repeat(70), summary: 's'.repeat(130) }), {
        baseDir: '/docs',
      });

      const sent = sentArticle(api);
      expect(sent.title).toBe('T'.repeat(MAX_TITLE_LENGTH));
      expect(sent.digest).toBe('s'.repeat(120));
      expect(outcome).toMatchObject({ success: true, title: 'T'.repeat(MAX_TITLE_LENGTH) });
    });

    it('should keep the original URL of an image that failed to upload', async () => {
      const api = fakeApi();
      readFile.mockRejectedValueOnce(new Error('ENOENT: no such file'));
      const publisher = new ArticlePublisher(api, { readFile });
      const result = article({
        images: ['gone.png', 'a.png'],
        html: '<img src="gone.png"><img src="a.png">',
        coverUrl: 'a.png',
      });

      const outcome = await publisher.publish(result, { baseDir: '/docs' });

      expect(outcome).toEqual({
        success: true,
        mediaId: 'draft-1',
        title: 'Hello',
        imageFailures: [{ source: 'gone.png', error: 'ENOENT: no such file' }],
      });
      expect(sentArticle(api).content).toBe('<img src="gone.png"><img src="https://mmbiz.qpic.cn/up/a.png">');
    });

    it('should publish a converted Markdown document', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });
      const result = convert({ source: '# Hello\n\nIntro text.\n\n![p](pic.png)' });

      const outcome = await publisher.publish(result, { baseDir: '/docs' });

      expect(outcome).toMatchObject({ success: true, title: 'Hello' });
      const sent = sentArticle(api);
      expect(sent.digest).toBe('Intro text.');
      expect(sent.thumbMediaId).toBe('media-pic.png');
      expect(sent.content).toContain('src="https://mmbiz.qpic.cn/up/pic.png"');
      expect(sent.content).not.toContain('src="pic.png"');
    });

    it('should report progress phases in order', async () => {
      const phases: string[] = [];
      const publisher = new ArticlePublisher(fakeApi(), { readFile });

      await publisher.publish(article(), {
        baseDir: '/docs',
        onProgress: (p: PublishProgress) => phases.push(p.phase),
      });

      expect(phases).toEqual(['uploading-images', 'uploading-cover', 'creating-draft', 'done']);
    });
  });

  // -------------------------------------------------------------------------
  // newspic
  // -------------------------------------------------------------------------

  describe('image posts', () => {
    it('should send plain text and image media ids', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });
      const result = article({ images: ['a.png', 'b.png'], plainText: 'Just text' });

      await publisher.publish(result, { mode: 'newspic', baseDir: '/docs' });

      expect(api.uploadContentImage).not.toHaveBeenCalled();
      const sent = sentArticle(api);
      expect(sent.articleType).toBe('newspic');
      expect(sent.content).toBe('Just text');
      expect(sent.imageMediaIds).toEqual(['media-a.png', 'media-b.png']);
      expect(sent.thumbMediaId).toBeUndefined();
    });

    it('should put an explicit cover first', async () => {
      const api = fakeApi();
      const publisher = new ArticlePublisher(api, { readFile });

      await publisher.publish(article(), { mode: 'newspic', baseDir: '/docs', coverImage: 'cover.jpg' });

      expect(sentArticle(api).imageMediaIds).toEqual(['media-cover.jpg', 'media-a.png']);
    });

    it('should fail when no image could be uploaded', async () => {
      const api = fakeApi();
      readFile.mockRejectedValueOnce(new Error('ENOENT: no such file'));
      const publisher = new ArticlePublisher(api, { readFile });

      const outcome = await publisher.publish(article(), { mode: 'newspic', baseDir: '/docs' });

      expect(outcome).toMatchObject({ success: false, code: 'MISSING_COVER_IMAGE' });
      expect(api.createDraft).not.toHaveBeenCalled();
    });
  });

  // -------------------------------------------------------------------------
  // Errors
  // -------------------------------------------------------------------------

  describe('errors', () => {
    it('should report credential errors with a hint', async () => {
      const api = fakeApi();
      api.uploadContentImage.mockRejectedValueOnce(
        new WeChatAuthError(200, 40164, 'WeChat API error 40164: invalid ip'),
      );
      const events: PublishProgress[] = [];
      const publisher = new ArticlePublisher(api, { readFile });

      const outcome = await publisher.publish(article(), { baseDir: '/docs', onProgress: (p) => events.push(p) });

      const expected = "WeChat API error 40164: invalid ip (add this machine's IP to the account's IP whitelist)";
      expect(outcome).toEqual({ success: false, error: expected, code: 'AUTH_ERROR' });
      expect(events[events.length - 1]).toEqual({ phase: 'error', current: 0, total: 1, message: expected });
    });

    it('should report other API errors', async () => {
      const api = fakeApi();
      api.createDraft.mockRejectedValueOnce(new WeChatApiError(200, 45002, 'WeChat API error 45002: content size out of limit'));
      const publisher = new ArticlePublisher(api, { readFile });

      await expect(publisher.publish(article(), { baseDir: '/docs' })).resolves.toEqual({
        success: false,
        error: 'WeChat API error 45002: content size out of limit',
        code: 'API_ERROR',
      });
    });
  });
});
