import { describe, expect, it, vi } from 'vitest';
import {
  NotConnectedError,
  ReauthRequiredError,
  UpstreamExchangeError,
  UpstreamTimeoutError,
} from './errors.js';
import type { FetchLike } from './googleOAuthClient.js';
import { type AccessTokenSource, GoogleResourceClient, resourceUrl } from './googleResources.js';

const tokens: AccessTokenSource = {
  getValidToken: async () => ({ accessToken: 'access-1', expiresAt: 0, scopes: [] }),
};

describe('resourceUrl', () => {
  it('builds a drive listing with defaults', () => {
    const url = resourceUrl({ kind: 'drive.files', pageSize: 10, includeAllDrives: false });

    expect(`${url.origin}${url.pathname}`).toBe('https://www.googleapis.com/drive/v3/files');
    expect(url.searchParams.get('pageSize')).toBe('10');
    expect(url.searchParams.get('corpora')).toBe('user');
    expect(url.searchParams.get('supportsAllDrives')).toBe('false');
    expect(url.searchParams.has('pageToken')).toBe(false);
    expect(url.searchParams.has('q')).toBe(false);
  });

  it('passes drive filters through', () => {
    const url = resourceUrl({
      kind: 'drive.files',
      pageSize: 50,
      pageToken: 'next-page',
      q: "name contains 'plan'",
      orderBy: 'modifiedTime desc',
      includeAllDrives: true,
      corpora: 'allDrives',
    });

    expect(url.searchParams.get('pageToken')).toBe('next-page');
    expect(url.searchParams.get('q')).toBe("name contains 'plan'");
    expect(url.searchParams.get('orderBy')).toBe('modifiedTime desc');
    expect(url.searchParams.get('includeItemsFromAllDrives')).toBe('true');
    expect(url.searchParams.get('corpora')).toBe('allDrives');
  });

  it('encodes path segments', () => {
    const sheets = resourceUrl({
      kind: 'sheets.values',
      spreadsheetId: 'sheet-1',
      range: 'Sheet1!A1:D10',
    });
    expect(sheets.href).toBe(
      'https://sheets.googleapis.com/v4/spreadsheets/sheet-1/values/Sheet1!A1%3AD10',
    );
    expect(resourceUrl({ kind: 'docs.document', documentId: 'a/b' }).href).toBe(
      'https://docs.googleapis.com/v1/documents/a%2Fb',
    );
  });
});

describe('GoogleResourceClient', () => {
  it('sends the bearer token and returns the json body', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(
      new Response(JSON.stringify({ user: { displayName: 'Test User' } }), { status: 200 }),
    );
    const client = new GoogleResourceClient(tokens, 1_000, fetchMock);

    expect(await client.fetchJson('user-1', { kind: 'drive.about' })).toEqual({
      user: { displayName: 'Test User' },
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://www.googleapis.com/drive/v3/about?fields=user');
    expect(init?.headers).toEqual({ Authorization: 'Bearer access-1', Accept: 'application/json' });
  });

  it('maps an upstream 401 to ReauthRequired', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response('{}', { status: 401 }));
    const client = new GoogleResourceClient(tokens, 1_000, fetchMock);

    await expect(
      client.fetchJson('user-1', { kind: 'docs.document', documentId: 'doc-1' }),
    ).rejects.toBeInstanceOf(ReauthRequiredError);
  });

  it('maps other upstream failures to UpstreamExchangeError', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response('{}', { status: 404 }));
    const client = new GoogleResourceClient(tokens, 1_000, fetchMock);

    const failure = client.fetchJson('user-1', {
      kind: 'slides.presentation',
      presentationId: 'deck-1',
    });
    await expect(failure).rejects.toBeInstanceOf(UpstreamExchangeError);
    await expect(failure).rejects.toMatchObject({ upstreamStatus: 404 });
  });

  it('maps a timeout to UpstreamTimeoutError', async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockRejectedValue(
        Object.assign(new Error('The operation was aborted due to timeout'), {
          name: 'TimeoutError',
        }),
      );
    const client = new GoogleResourceClient(tokens, 1_000, fetchMock);

    await expect(client.fetchJson('user-1', { kind: 'drive.about' })).rejects.toBeInstanceOf(
      UpstreamTimeoutError,
    );
  });

  it('does not call Google when the user has no token', async () => {
    const fetchMock = vi.fn<FetchLike>();
    const client = new GoogleResourceClient(
      {
        getValidToken: async () => {
          throw new NotConnectedError('No stored credential for user');
        },
      },
      1_000,
      fetchMock,
    );

    await expect(client.fetchJson('user-1', { kind: 'drive.about' })).rejects.toBeInstanceOf(
      NotConnectedError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
