/**
 * Type definitions for the WeChat Official Account API.
 *
 * Covers the access-token grant, material and in-article image uploads,
 * draft creation and the error hierarchy thrown by the client.
 */

// ---------------------------------------------------------------------------
// Endpoints
// ---------------------------------------------------------------------------

export const DEFAULT_API_BASE = 'https://api.weixin.qq.com/cgi-bin';

export const API_PATHS = {
  token: '/token',
  addMaterial: '/material/add_material',
  uploadContentImage: '/media/uploadimg',
  addDraft: '/draft/add',
} as const;

// ---------------------------------------------------------------------------
// Auth types
// ---------------------------------------------------------------------------

/** Official Account credentials. */
export interface WeChatCredentials {
  appId: string;
  appSecret: string;
}

/** Cached access token. */
export interface AccessTokenStore {
  accessToken: string;
  /** Absolute expiry in epoch ms. */
  expiresAt: number;
}

// ---------------------------------------------------------------------------
// Upload / draft types
// ---------------------------------------------------------------------------

/** Raw image bytes ready for a multipart upload. */
export interface ImageFile {
  filename: string;
  contentType: string;
  data: Uint8Array;
}

/** Permanent image material. */
export interface UploadedImage {
  mediaId: string;
  url: string;
}

export type DraftArticleType = 'news' | 'newspic';

/** One article of a draft, in camelCase; the client maps it to the wire format. */
export interface DraftArticle {
  articleType: DraftArticleType;
  title: string;
  /** HTML for `news`, plain text for `newspic`. */
  content: string;
  author?: string;
  digest?: string;
  contentSourceUrl?: string;
  /** Cover material; required for `news`. */
  thumbMediaId?: string;
  /** Image materials; required for `newspic`. */
  imageMediaIds?: string[];
  commentEnabled: boolean;
  fansOnlyComment: boolean;
}

/** The API surface the publisher needs; implemented by `WeChatClient`. */
export interface WeChatApi {
  uploadImage(file: ImageFile): Promise<UploadedImage>;
  uploadContentImage(file: ImageFile): Promise<string>;
  createDraft(articles: DraftArticle[]): Promise<string>;
}

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** "System busy"; always worth retrying. */
export const SYSTEM_BUSY_CODE = -1;

/** Credential and token failures. */
export const AUTH_ERROR_CODES: ReadonlySet<number> = new Set([
  40001, // invalid credential / access_token
  40013, // invalid appid
  40125, // invalid appsecret
  40164, // caller IP not whitelisted
  42001, // access_token expired
  41001, // access_token missing
  40014, // invalid access_token
]);

/** Token errors cured by fetching a fresh token. */
export const TOKEN_ERROR_CODES: ReadonlySet<number> = new Set([40001, 40014, 41001, 42001]);

/** Quota and frequency limits. */
export const RATE_LIMIT_ERROR_CODES: ReadonlySet<number> = new Set([45009, 45011]);

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/** Base error class for WeChat API errors. */
export class WeChatApiError extends Error {
  constructor(
    public readonly httpStatus: number,
    public readonly errcode: number,
    message: string,
  ) {
    super(message);
    this.name = 'WeChatApiError';
  }
}

/** Credential, whitelist or token failure. */
export class WeChatAuthError extends WeChatApiError {
  constructor(httpStatus: number, errcode: number, message: string) {
    super(httpStatus, errcode, message);
    this.name = 'WeChatAuthError';
  }
}

/** API quota or call frequency exceeded. */
export class WeChatRateLimitError extends WeChatApiError {
  constructor(httpStatus: number, errcode: number, message: string) {
    super(httpStatus, errcode, message);
    this.name = 'WeChatRateLimitError';
  }
}

/** Build the error subclass matching `errcode`. */
export function createApiError(httpStatus: number, errcode: number, errmsg: string): WeChatApiError {
  const message = `WeChat API error ${errcode}: ${errmsg}`;
  if (AUTH_ERROR_CODES.has(errcode)) return new WeChatAuthError(httpStatus, errcode, message);
  if (RATE_LIMIT_ERROR_CODES.has(errcode)) return new WeChatRateLimitError(httpStatus, errcode, message);
  return new WeChatApiError(httpStatus, errcode, message);
}

/** Extra guidance for the auth failures users hit most. */
const AUTH_ERROR_HINTS: Readonly<Record<number, string>> = {
  40001: 'check WECHAT_APP_SECRET; resetting the AppSecret invalidates the old one',
  40013: 'check WECHAT_APPID; AppIDs start with "wx"',
  40125: 'check WECHAT_APP_SECRET',
  40164: "add this machine's IP to the account's IP whitelist",
};

export function authErrorHint(errcode: number): string | undefined {
  return AUTH_ERROR_HINTS[errcode];
}

// ---------------------------------------------------------------------------
// Progress reporting
// ---------------------------------------------------------------------------

/** Phases of the publish pipeline. */
export type PublishPhase =
  | 'converting'
  | 'uploading-images'
  | 'uploading-cover'
  | 'creating-draft'
  | 'done'
  | 'error';

/** Progress information emitted while publishing. */
export interface PublishProgress {
  phase: PublishPhase;
  current: number;
  total: number;
  message: string;
}

/** Callback type for progress reporting. */
export type ProgressCallback = (progress: PublishProgress) => void;
