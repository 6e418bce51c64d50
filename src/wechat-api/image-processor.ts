/**
 * Image loading and upload.
 *
 * Images referenced by an article can be remote URLs, `data:` URIs or paths
 * relative to the article's directory. Each is loaded into memory and
 * uploaded; images already hosted by WeChat are left alone. A failing image
 * is recorded and skipped so the rest of the article still publishes.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import { WeChatAuthError } from './types.js';
import type { ImageFile, ProgressCallback, UploadedImage, WeChatApi } from './types.js';

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

const HOSTED_IMAGE_HOSTS = ['mmbiz.qpic.cn', 'mmbiz.qlogo.cn'];

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
};

const EXTENSIONS: Readonly<Record<string, string>> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/bmp': '.bmp',
};

const DATA_URI_RE = /^data:([^;,]+)?(;base64)?,(.*)$/s;

export interface ImageLoaderOptions {
  /** Directory that relative image paths are resolved against. */
  baseDir: string;
  fetch?: typeof fetch;
  readFile?: (filePath: string) => Promise<Uint8Array>;
}

/** Whether `url` is already served from WeChat's image CDN. */
export function isHostedImage(url: string): boolean {
  try {
    const { hostname } = new URL(url);
    return HOSTED_IMAGE_HOSTS.some((host) => hostname === host || hostname.endsWith(`.${host}`));
  } catch {
    // Relative paths and data URIs are not URLs with a host.
    return false;
  }
}

function contentTypeFor(name: string): string {
  return CONTENT_TYPES[path.extname(name).toLowerCase()] ?? 'image/jpeg';
}

function filenameFor(name: string, contentType: string): string {
  const base = path.basename(name.split(/[?#]/)[0]);
  if (base && path.extname(base)) return base;
  return `image${EXTENSIONS[contentType] ?? '.jpg'}`;
}

function decodeDataUri(uri: string): ImageFile {
  const match = DATA_URI_RE.exec(uri);
  if (!match) {
    throw new Error('Malformed data URI');
  }
  const contentType = match[1] ?? 'image/png';
  const data = match[2]
    ? Buffer.from(match[3], 'base64')
    : Buffer.from(decodeURIComponent(match[3]), 'utf8');
  return { filename: filenameFor('', contentType), contentType, data };
}

async function download(url: string, fetchImpl: typeof fetch): Promise<ImageFile> {
  const response = await fetchImpl(url);
  if (!response.ok) {
    throw new Error(`Download failed with HTTP ${response.status}`);
  }
  const header = response.headers.get('content-type')?.split(';')[0].trim().toLowerCase();
  const contentType = header && header.startsWith('image/') ? header : contentTypeFor(url);
  const data = new Uint8Array(await response.arrayBuffer());
  return { filename: filenameFor(url, contentType), contentType, data };
}

/** Load one image source into memory. */
export async function loadImage(source: string, options: ImageLoaderOptions): Promise<ImageFile> {
  if (source.startsWith('data:')) {
    return decodeDataUri(source);
  }
  if (/^https?:\/\//i.test(source)) {
    return download(source, options.fetch ?? fetch);
  }

  const filePath = path.resolve(options.baseDir, decodeURI(source));
  const read: (file: string) => Promise<Uint8Array> = options.readFile ?? ((file) => readFile(file));
  const data = await read(filePath);
  const contentType = contentTypeFor(filePath);
  return { filename: filenameFor(filePath, contentType), contentType, data };
}

// ---------------------------------------------------------------------------
// ImageProcessor
// ---------------------------------------------------------------------------

export interface ImageUploadFailure {
  source: string;
  error: string;
}

export interface ImageProcessResult {
  /** Original source to hosted URL, for every uploaded image. */
  urls: Map<string, string>;
  /** Original source to material media id (permanent uploads only). */
  mediaIds: Map<string, string>;
  /** Sources already hosted by WeChat. */
  skipped: string[];
  failures: ImageUploadFailure[];
}

export interface ProcessImagesOptions {
  /**
   * Upload as permanent material (media id + URL) instead of as in-article
   * images (URL only). Image posts need media ids.
   */
  permanent?: boolean;
  onProgress?: ProgressCallback;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ImageProcessor {
  constructor(
    private readonly api: WeChatApi,
    private readonly loader: ImageLoaderOptions,
  ) {}

  /**
   * Upload every image in `sources`, in order, one at a time.
   *
   * @throws {WeChatAuthError} on credential failures; other per-image
   * errors are collected in `failures`.
   */
  async processImages(sources: readonly string[], options: ProcessImagesOptions = {}): Promise<ImageProcessResult> {
    const result: ImageProcessResult = { urls: new Map(), mediaIds: new Map(), skipped: [], failures: [] };
    const unique = [...new Set(sources)];

    for (const [index, source] of unique.entries()) {
      options.onProgress?.({
        phase: 'uploading-images',
        current: index,
        total: unique.length,
        message: `Uploading image ${index + 1}/${unique.length}`,
      });

      if (isHostedImage(source)) {
        result.skipped.push(source);
        continue;
      }

      try {
        const file = await loadImage(source, this.loader);
        if (options.permanent) {
          const uploaded = await this.api.uploadImage(file);
          result.urls.set(source, uploaded.url);
          result.mediaIds.set(source, uploaded.mediaId);
        } else {
          result.urls.set(source, await this.api.uploadContentImage(file));
        }
      } catch (error) {
        // Credential problems affect every upload; stop here.
        if (error instanceof WeChatAuthError) throw error;
        result.failures.push({ source, error: errorMessage(error) });
      }
    }

    return result;
  }

  /** Upload a cover image as permanent material. */
  async uploadCover(source: string): Promise<UploadedImage> {
    return this.api.uploadImage(await loadImage(source, this.loader));
  }
}
