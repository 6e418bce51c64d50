/**
 * Response decoding shared by the token grant and the API client.
 *
 * Every endpoint answers with a JSON object. Failures carry a non-zero
 * `errcode` and an `errmsg`, sometimes with HTTP 200.
 */

import { WeChatApiError, createApiError } from './types.js';

export type ApiBody = Record<string, unknown>;

function isRecord(value: unknown): value is ApiBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a response, throwing the matching {@link WeChatApiError} subclass
 * for HTTP failures and non-zero `errcode`s.
 */
export async function readApiBody(response: Response): Promise<ApiBody> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WeChatApiError(response.status, 0, `Invalid JSON from WeChat API (HTTP ${response.status}): ${reason}`);
  }

  const record = isRecord(body) ? body : {};
  const errcode = typeof record.errcode === 'number' ? record.errcode : 0;
  const errmsg = typeof record.errmsg === 'string' ? record.errmsg : response.statusText;

  if (!response.ok) {
    throw createApiError(response.status, errcode, errmsg || `HTTP ${response.status}`);
  }
  if (!isRecord(body)) {
    throw new WeChatApiError(response.status, 0, 'Unexpected response shape from WeChat API');
  }
  if (errcode !== 0) {
    throw createApiError(response.status, errcode, errmsg);
  }
  return body;
}

/** Read a required string field. */
export function requireString(body: ApiBody, field: string, status = 200): string {
  const value = body[field];
  if (typeof value !== 'string' || value === '') {
    throw new WeChatApiError(status, 0, `WeChat API response is missing "${field}"`);
  }
  return value;
}
