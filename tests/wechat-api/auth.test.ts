/**
 * Tests for the access-token grant and response decoding.
 */

import { TOKEN_SAFETY_MARGIN_MS, buildTokenUrl, isTokenExpired, requestAccessToken } from '../../src/wechat-api/auth.js';
import { readApiBody, requireString } from '../../src/wechat-api/response.js';
import { WeChatApiError, WeChatAuthError, WeChatRateLimitError, authErrorHint } from '../../src/wechat-api/types.js';

const credentials = { appId: 'wx-test', appSecret: 'test-secret' };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

describe('isTokenExpired', () => {
  const store = { accessToken: 'tok', expiresAt: 1_000_000 };

  it('should treat a token as valid until the safety margin', () => {
    expect(isTokenExpired(store, 1_000_000 - TOKEN_SAFETY_MARGIN_MS - 1)).toBe(false);
  });

  it('should treat a token inside the safety margin as expired', () => {
    expect(isTokenExpired(store, 1_000_000 - TOKEN_SAFETY_MARGIN_MS)).toBe(true);
  });
});

describe('buildTokenUrl', () => {
  it('should use the client-credential grant', () => {
    expect(buildTokenUrl(credentials)).toBe(
      'https://api.weixin.qq.com/cgi-bin/token?grant_type=client_credential&appid=wx-test&secret=test-secret',
    );
  });

  it('should honour a custom base URL', () => {
    expect(buildTokenUrl(credentials, 'http://localhost:1234')).toBe(
      'http://localhost:1234/token?grant_type=client_credential&appid=wx-test&secret=test-secret',
    );
  });
});

describe('authErrorHint', () => {
  it('should explain common credential failures', () => {
    expect(authErrorHint(40164)).toBe("add this machine's IP to the account's IP whitelist");
    expect(authErrorHint(42001)).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// requestAccessToken
// ---------------------------------------------------------------------------

describe('requestAccessToken', () => {
  const fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>();

  beforeEach(() => {
    fetchMock.mockReset();
    jest.spyOn(Date, 'now').mockReturnValue(1_000);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the token with an absolute expiry', async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: 'tok', expires_in: 7200 }));

    await expect(requestAccessToken(credentials, fetchMock)).resolves.toEqual({
      accessToken: 'tok',
      expiresAt: 1_000 + 7_200_000,
    });
    expect(String(fetchMock.mock.calls[0][0])).toBe(buildTokenUrl(credentials));
  });

  it('should throw WeChatAuthError for a bad secret', async () => {
    fetchMock.mockResolvedValueOnce(json({ errcode: 40125, errmsg: 'invalid appsecret' }));

    const error = await requestAccessToken(credentials, fetchMock).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(WeChatAuthError);
    expect(error).toMatchObject({ errcode: 40125, message: 'WeChat API error 40125: invalid appsecret' });
  });

  it('should reject a response without expires_in', async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: 'tok' }));
    await expect(requestAccessToken(credentials, fetchMock)).rejects.toThrow(
      'WeChat API response is missing "expires_in"',
    );
  });
});

// ---------------------------------------------------------------------------
// readApiBody / requireString
// ---------------------------------------------------------------------------

describe('readApiBody', () => {
  it('should return the body of a successful response', async () => {
    await expect(readApiBody(json({ errcode: 0, media_id: 'm' }))).resolves.toEqual({ errcode: 0, media_id: 'm' });
  });

  it('should map rate-limit codes to WeChatRateLimitError', async () => {
    await expect(readApiBody(json({ errcode: 45009, errmsg: 'reach max api daily quota limit' }))).rejects.toBeInstanceOf(
      WeChatRateLimitError,
    );
  });

  it('should report HTTP failures without a WeChat body', async () => {
    const error = await readApiBody(json({}, 500)).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(WeChatApiError);
    expect(error).toMatchObject({ httpStatus: 500, errcode: 0, message: 'WeChat API error 0: HTTP 500' });
  });

  it('should report invalid JSON', async () => {
    await expect(readApiBody(new Response('<html>', { status: 200 }))).rejects.toThrow(
      /^Invalid JSON from WeChat API \(HTTP 200\)/,
    );
  });

  it('should reject a non-object body', async () => {
    await expect(readApiBody(json([1, 2]))).rejects.toThrow('Unexpected response shape from WeChat API');
  });
});

describe('requireString', () => {
  it('should return present strings and reject missing ones', () => {
    expect(requireString({ url: 'u' }, 'url')).toBe('u');
    expect(() => requireString({ url: '' }, 'url')).toThrow('WeChat API response is missing "url"');
  });
});
