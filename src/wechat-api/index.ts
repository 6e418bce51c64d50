/**
 * WeChat Official Account API barrel exports.
 *
 * @module wechat-api
 */

export { WeChatClient, classifyWeChatError } from './client.js';
export type { WeChatClientConfig } from './client.js';
export { isTokenExpired, buildTokenUrl, requestAccessToken, TOKEN_SAFETY_MARGIN_MS } from './auth.js';
export { RateLimiter, withRetry } from './rate-limiter.js';
export type { RetryClass, RetryOptions } from './rate-limiter.js';
export { ImageProcessor, loadImage, isHostedImage } from './image-processor.js';
export type {
  ImageLoaderOptions,
  ImageProcessResult,
  ImageUploadFailure,
  ProcessImagesOptions,
} from './image-processor.js';
export { ArticlePublisher, MAX_TITLE_LENGTH } from './publisher.js';
export type { ArticlePublisherOptions, PublishErrorCode, PublishOptions, PublishOutcome } from './publisher.js';
export { BatchPublisher, runWithConcurrency, DEFAULT_BATCH_CONCURRENCY } from './batch.js';
export type { BatchErrorCode, BatchItem, BatchItemResult, BatchOptions, BatchSummary } from './batch.js';
export {
  WeChatApiError,
  WeChatAuthError,
  WeChatRateLimitError,
  authErrorHint,
  DEFAULT_API_BASE,
} from './types.js';
export type {
  WeChatApi,
  WeChatCredentials,
  ImageFile,
  UploadedImage,
  DraftArticle,
  DraftArticleType,
  PublishPhase,
  PublishProgress,
  ProgressCallback,
} from './types.js';
