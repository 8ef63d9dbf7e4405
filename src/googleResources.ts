import {
  ReauthRequiredError,
  UpstreamExchangeError,
  UpstreamTimeoutError,
  errorMessage,
} from './errors.js';
import { type FetchLike, isTimeoutError } from './googleOAuthClient.js';
import type { ValidAccessToken } from './types.js';

const DRIVE_FILE_FIELDS = [
  'nextPageToken',
  'files(id,name,mimeType,owners(displayName),modifiedTime,trashed,webViewLink,iconLink,size)',
].join(',');

export type ResourceRequest =
  | { kind: 'drive.about' }
  | {
      kind: 'drive.files';
      pageSize: number;
      pageToken?: string;
      q?: string;
      orderBy?: string;
      includeAllDrives: boolean;
      corpora?: string;
    }
  | { kind: 'sheets.values'; spreadsheetId: string; range: string }
  | { kind: 'docs.document'; documentId: string }
  | { kind: 'slides.presentation'; presentationId: string };

/** Fetches a Google resource on behalf of a connected user. */
export interface ResourceFetcher {
  fetchJson(userId: string, request: ResourceRequest): Promise<unknown>;
}

export interface AccessTokenSource {
  getValidToken(userId: string): Promise<ValidAccessToken>;
}

export function resourceUrl(request: ResourceRequest): URL {
  switch (request.kind) {
    case 'drive.about': {
      const url = new URL('https://www.googleapis.com/drive/v3/about');
      url.searchParams.set('fields', 'user');
      return url;
    }
    case 'drive.files': {
      const url = new URL('https://www.googleapis.com/drive/v3/files');
      const params: Record<string, string | undefined> = {
        pageSize: String(request.pageSize),
        pageToken: request.pageToken,
        q: request.q,
        orderBy: request.orderBy,
        fields: DRIVE_FILE_FIELDS,
        supportsAllDrives: String(request.includeAllDrives),
        includeItemsFromAllDrives: String(request.includeAllDrives),
        corpora: request.corpora ?? 'user',
      };
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, value);
        }
      }
      return url;
    }
    case 'sheets.values':
      return new URL(
        `https://sheets.googleapis.com/v4/spreadsheets/${encodeURIComponent(
          request.spreadsheetId,
        )}/values/${encodeURIComponent(request.range)}`,
      );
    case 'docs.document':
      return new URL(
        `https://docs.googleapis.com/v1/documents/${encodeURIComponent(request.documentId)}`,
      );
    case 'slides.presentation':
      return new URL(
        `https://slides.googleapis.com/v1/presentations/${encodeURIComponent(
          request.presentationId,
        )}`,
      );
  }
}

export class GoogleResourceClient implements ResourceFetcher {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly tokens: AccessTokenSource,
    private readonly timeoutMs: number,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchJson(userId: string, request: ResourceRequest): Promise<unknown> {
    const { accessToken } = await this.tokens.getValidToken(userId);
    const url = resourceUrl(request);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new UpstreamTimeoutError(`${request.kind} timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new UpstreamExchangeError(
        `${request.kind} request failed: ${errorMessage(error)}`,
        undefined,
        undefined,
        { cause: error },
      );
    }

    if (response.status === 401) {
      throw new ReauthRequiredError('Google rejected the access token; user must reconnect');
    }
    if (!response.ok) {
      throw new UpstreamExchangeError(`google api error: ${response.status}`, response.status);
    }
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new UpstreamExchangeError(
        `${request.kind} returned a non-JSON body`,
        response.status,
        undefined,
        { cause: error },
      );
    }
  }
}
