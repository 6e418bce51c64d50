/**
 * HTTP client for the WeChat Official Account API.
 *
 * Integrates access-token caching with a shared refresh promise, rate
 * limiting, one retry after a token error, and exponential backoff for
 * rate-limit and transient errors.
 */

import { isTokenExpired, requestAccessToken } from './auth.js';
import { RateLimiter, withRetry } from './rate-limiter.js';
import type { RetryClass, RetryOptions } from './rate-limiter.js';
import { readApiBody, requireString } from './response.js';
import type { ApiBody } from './response.js';
import {
  API_PATHS,
  DEFAULT_API_BASE,
  SYSTEM_BUSY_CODE,
  TOKEN_ERROR_CODES,
  WeChatApiError,
  WeChatAuthError,
  WeChatRateLimitError,
} from './types.js';
import type {
  AccessTokenStore,
  DraftArticle,
  ImageFile,
  UploadedImage,
  WeChatApi,
  WeChatCredentials,
} from './types.js';

// ---------------------------------------------------------------------------
// Client configuration
// ---------------------------------------------------------------------------

/** Configuration used to construct a {@link WeChatClient}. */
export interface WeChatClientConfig extends WeChatCredentials {
  /** API base URL. Default: `https://api.weixin.qq.com/cgi-bin`. */
  baseUrl?: string;
  /** `fetch` implementation; defaults to the global one. */
  fetch?: typeof fetch;
  rateLimiter?: RateLimiter;
  retry?: RetryOptions;
}

/** Retry policy for WeChat errors. */
export function classifyWeChatError(error: unknown): RetryClass {
  if (error instanceof WeChatRateLimitError) return 'rate-limit';
  if (error instanceof WeChatApiError && (error.errcode === SYSTEM_BUSY_CODE || error.httpStatus >= 500)) {
    return 'transient';
  }
  return undefined;
}

function isTokenError(error: unknown): boolean {
  return error instanceof WeChatAuthError && TOKEN_ERROR_CODES.has(error.errcode);
}

function toFormData(file: ImageFile): FormData {
  const form = new FormData();
  form.append('media', new Blob([new Uint8Array(file.data)], { type: file.contentType }), file.filename);
  return form;
}

function toWireArticle(article: DraftArticle): ApiBody {
  const wire: ApiBody = {
    article_type: article.articleType,
    title: article.title,
    content: article.content,
    need_open_comment: article.commentEnabled ? 1 : 0,
    only_fans_can_comment: article.fansOnlyComment ? 1 : 0,
  };
  if (article.author) wire.author = article.author;
  if (article.digest) wire.digest = article.digest;
  if (article.contentSourceUrl) wire.content_source_url = article.contentSourceUrl;
  if (article.thumbMediaId) wire.thumb_media_id = article.thumbMediaId;
  if (article.imageMediaIds && article.imageMediaIds.length > 0) {
    wire.image_info = {
      image_list: article.imageMediaIds.map((id) => ({ image_media_id: id })),
    };
  }
  return wire;
}

// ---------------------------------------------------------------------------
// WeChatClient
// ---------------------------------------------------------------------------

/**
 * Authenticated client for the material and draft APIs.
 *
 * Usage:
 * ```ts
 * const client = new WeChatClient({ appId: '...', appSecret: '...' });
 * const { mediaId } = await client.uploadImage(file);
 * const draftId = await client.createDraft([article]);
 * ```
 */
export class WeChatClient implements WeChatApi {
  private readonly credentials: WeChatCredentials;
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;
  private readonly rateLimiter: RateLimiter;
  private readonly retryOptions: RetryOptions | undefined;

  private token: AccessTokenStore | null = null;

  /**
   * Shared promise used to serialize concurrent token requests.
   * Only one grant call is in-flight at any time.
   */
  private refreshPromise: Promise<AccessTokenStore> | null = null;

  constructor(config: WeChatClientConfig) {
    this.credentials = { appId: config.appId, appSecret: config.appSecret };
    this.apiBase = config.baseUrl ?? DEFAULT_API_BASE;
    this.fetchImpl = config.fetch ?? fetch;
    this.rateLimiter = config.rateLimiter ?? new RateLimiter();
    this.retryOptions = config.retry;
  }

  // -----------------------------------------------------------------------
  // Token management
  // -----------------------------------------------------------------------

  /**
   * Return a valid access token, requesting a new one when the cached token
   * is missing or within five minutes of expiry.
   */
  async getAccessToken(): Promise<string> {
    if (this.token && !isTokenExpired(this.token)) {
      return this.token.accessToken;
    }

    if (!this.refreshPromise) {
      this.refreshPromise = requestAccessToken(this.credentials, this.fetchImpl, this.apiBase).finally(() => {
        this.refreshPromise = null;
      });
    }
    this.token = await this.refreshPromise;
    return this.token.accessToken;
  }

  /** Drop the cached token so the next call requests a new one. */
  invalidateToken(): void {
    this.token = null;
  }

  // -----------------------------------------------------------------------
  // API calls
  // -----------------------------------------------------------------------

  /**
   * Upload a permanent image material, usable as a cover or a `newspic`
   * image.
   */
  async uploadImage(file: ImageFile): Promise<UploadedImage> {
    const body = await this.call(API_PATHS.addMaterial, { type: 'image' }, () => ({
      method: 'POST',
      body: toFormData(file),
    }));
    return { mediaId: requireString(body, 'media_id'), url: requireString(body, 'url') };
  }

  /** Upload an image for use inside article HTML; returns its hosted URL. */
  async uploadContentImage(file: ImageFile): Promise<string> {
    const body = await this.call(API_PATHS.uploadContentImage, {}, () => ({
      method: 'POST',
      body: toFormData(file),
    }));
    return requireString(body, 'url');
  }

  /** Create a draft holding `articles`; returns the draft's media id. */
  async createDraft(articles: DraftArticle[]): Promise<string> {
    const payload = JSON.stringify({ articles: articles.map(toWireArticle) });
    const body = await this.call(API_PATHS.addDraft, {}, () => ({
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: payload,
    }));
    return requireString(body, 'media_id');
  }

  // -----------------------------------------------------------------------
  // Generic request
  // -----------------------------------------------------------------------

  /**
   * Make an authenticated API call.
   *
   * - Attaches `access_token` to the query string.
   * - On a token error, drops the cached token and retries once.
   * - Applies rate limiting and retry with exponential backoff.
   *
   * `init` is a factory because multipart bodies cannot be sent twice.
   */
  private async call(
    path: string,
    query: Record<string, string>,
    init: () => RequestInit,
  ): Promise<ApiBody> {
    const send = async (token: string): Promise<ApiBody> => {
      const params = new URLSearchParams({ access_token: token, ...query });
      const response = await this.fetchImpl(`${this.apiBase}${path}?${params.toString()}`, init());
      return readApiBody(response);
    };

    const execute = async (): Promise<ApiBody> => {
      await this.rateLimiter.acquire();
      const token = await this.getAccessToken();
      try {
        return await send(token);
      } catch (error) {
        if (!isTokenError(error)) throw error;
        // Token revoked or expired server-side.
        this.invalidateToken();
        return send(await this.getAccessToken());
      }
    };

    return withRetry(execute, classifyWeChatError, this.retryOptions);
  }
}
