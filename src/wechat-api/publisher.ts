/**
 * Article publisher.
 *
 * Takes a conversion result, uploads its images and cover, substitutes the
 * hosted URLs into the HTML and creates a draft. Failures come back as an
 * outcome object rather than an exception.
 *
 * @module wechat-api/publisher
 */

import { MODE_LIMITS } from '../core/context.js';
import { substituteImageUrls } from '../core/postprocessor.js';
import { truncateChars } from '../core/text.js';
import type { ArticleMode, RenderResult } from '../core/types.js';
import { ImageProcessor } from './image-processor.js';
import type { ImageLoaderOptions, ImageUploadFailure } from './image-processor.js';
import { WeChatAuthError, authErrorHint } from './types.js';
import type { DraftArticle, ProgressCallback, WeChatApi } from './types.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Longest title the draft API accepts, in characters. */
export const MAX_TITLE_LENGTH = 64;

export type PublishErrorCode = 'MISSING_COVER_IMAGE' | 'AUTH_ERROR' | 'API_ERROR';

export interface PublishOptions {
  /** Must match the mode the article was converted with. Default: `news`. */
  mode?: ArticleMode;
  author?: string;
  /** Cover image source; overrides the article's first image. */
  coverImage?: string;
  /** "Read more" link. */
  sourceUrl?: string;
  /** Default: `false`. */
  commentEnabled?: boolean;
  /** Default: `false`. */
  fansOnlyComment?: boolean;
  /** Directory that relative image paths are resolved against. Default: cwd. */
  baseDir?: string;
  onProgress?: ProgressCallback;
}

export type PublishOutcome =
  | {
      success: true;
      mediaId: string;
      title: string;
      /** Images that could not be uploaded and kept their original URL. */
      imageFailures: ImageUploadFailure[];
    }
  | {
      success: false;
      error: string;
      code: PublishErrorCode;
    };

export interface ArticlePublisherOptions {
  fetch?: typeof fetch;
  readFile?: (filePath: string) => Promise<Uint8Array>;
}

// ---------------------------------------------------------------------------
// ArticlePublisher
// ---------------------------------------------------------------------------

function failure(error: unknown): PublishOutcome {
  if (error instanceof WeChatAuthError) {
    const hint = authErrorHint(error.errcode);
    return {
      success: false,
      error: hint ? `${error.message} (${hint})` : error.message,
      code: 'AUTH_ERROR',
    };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
    code: 'API_ERROR',
  };
}

const MISSING_COVER: PublishOutcome = {
  success: false,
  error: 'A draft needs a cover image: add an image to the article or pass a cover',
  code: 'MISSING_COVER_IMAGE',
};

export class ArticlePublisher {
  constructor(
    private readonly api: WeChatApi,
    private readonly options: ArticlePublisherOptions = {},
  ) {}

  async publish(result: RenderResult, options: PublishOptions = {}): Promise<PublishOutcome> {
    const mode = options.mode ?? 'news';
    const onProgress = options.onProgress;

    try {
      const loader: ImageLoaderOptions = {
        baseDir: options.baseDir ?? process.cwd(),
        ...(this.options.fetch ? { fetch: this.options.fetch } : {}),
        ...(this.options.readFile ? { readFile: this.options.readFile } : {}),
      };
      const processor = new ImageProcessor(this.api, loader);

      const uploads = await processor.processImages(result.images, {
        permanent: mode === 'newspic',
        onProgress,
      });

      const title = truncateChars(result.title, MAX_TITLE_LENGTH);
      const digest = truncateChars(result.summary, MODE_LIMITS[mode].textLengthCap);

      const article: DraftArticle = {
        articleType: mode,
        title,
        content: mode === 'newspic' ? result.plainText : substituteImageUrls(result.html, uploads.urls),
        commentEnabled: options.commentEnabled ?? false,
        fansOnlyComment: options.fansOnlyComment ?? false,
      };
      if (options.author) article.author = options.author;
      if (digest) article.digest = digest;
      if (options.sourceUrl) article.contentSourceUrl = options.sourceUrl;

      if (mode === 'newspic') {
        const mediaIds = result.images.flatMap((source) => {
          const id = uploads.mediaIds.get(source);
          return id ? [id] : [];
        });
        if (options.coverImage) {
          onProgress?.({ phase: 'uploading-cover', current: 0, total: 1, message: 'Uploading cover image' });
          const cover = await processor.uploadCover(options.coverImage);
          mediaIds.unshift(cover.mediaId);
        }
        if (mediaIds.length === 0) return MISSING_COVER;
        article.imageMediaIds = mediaIds.slice(0, MODE_LIMITS.newspic.imageCountCap);
      } else {
        const coverSource =
          options.coverImage ??
          result.coverUrl ??
          result.images.find((source) => uploads.urls.has(source));
        if (!coverSource) return MISSING_COVER;

        onProgress?.({ phase: 'uploading-cover', current: 0, total: 1, message: 'Uploading cover image' });
        const cover = await processor.uploadCover(coverSource);
        article.thumbMediaId = cover.mediaId;
      }

      onProgress?.({ phase: 'creating-draft', current: 0, total: 1, message: `Creating draft "${title}"` });
      const mediaId = await this.api.createDraft([article]);

      onProgress?.({ phase: 'done', current: 1, total: 1, message: 'Draft created' });
      return { success: true, mediaId, title, imageFailures: uploads.failures };
    } catch (error) {
      const outcome = failure(error);
      if (!outcome.success) {
        onProgress?.({ phase: 'error', current: 0, total: 1, message: outcome.error });
      }
      return outcome;
    }
  }
}
