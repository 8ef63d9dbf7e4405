import { z } from 'zod';
import type { GoogleOAuthSettings } from './config.js';
import {
  InvalidRequestError,
  RefreshTokenRejectedError,
  UpstreamExchangeError,
  UpstreamTimeoutError,
  errorMessage,
} from './errors.js';
import type { ProviderTokenGrant } from './types.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** The third-party authorization server, as seen by the lifecycle manager. */
export interface OAuthProvider {
  buildAuthorizationUrl(state: string, options?: { promptConsent?: boolean }): string;
  exchangeCode(code: string): Promise<ProviderTokenGrant>;
  refreshAccessToken(refreshToken: string): Promise<ProviderTokenGrant>;
  /** Resolves when the token is revoked or was already unknown upstream. */
  revokeToken(token: string): Promise<void>;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

const errorResponseSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export function parseScopes(scope?: string): string[] {
  if (!scope) return [];
  return scope
    .split(/\s+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export type GoogleOAuthClientOptions = {
  settings: GoogleOAuthSettings;
  allowedRedirectHosts: readonly string[];
  timeoutMs: number;
  fetch?: FetchLike;
  now?: () => number;
};

export class GoogleOAuthClient implements OAuthProvider {
  private readonly settings: GoogleOAuthSettings;
  private readonly allowedRedirectHosts: Set<string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(options: GoogleOAuthClientOptions) {
    this.settings = options.settings;
    this.allowedRedirectHosts = new Set(
      options.allowedRedirectHosts.map((host) => host.toLowerCase()),
    );
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  buildAuthorizationUrl(state: string, options: { promptConsent?: boolean } = {}): string {
    this.ensureRedirectAllowed();
    const url = new URL(this.settings.authorizeEndpoint);
    url.searchParams.set('client_id', this.settings.clientId);
    url.searchParams.set('redirect_uri', this.settings.redirectUri);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('scope', this.settings.scopes.join(' '));
    url.searchParams.set('state', state);
    // offline access is what makes Google issue a refresh token
    url.searchParams.set('access_type', 'offline');
    url.searchParams.set('include_granted_scopes', 'true');
    if (options.promptConsent ?? true) {
      url.searchParams.set('prompt', 'consent');
    }
    return url.toString();
  }

  async exchangeCode(code: string): Promise<ProviderTokenGrant> {
    this.ensureRedirectAllowed();
    const response = await this.postForm(this.settings.tokenEndpoint, 'token exchange', {
      code,
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      redirect_uri: this.settings.redirectUri,
      grant_type: 'authorization_code',
    });
    if (!response.ok) {
      const oauthError = await this.readOAuthError(response, 'token exchange');
      throw new UpstreamExchangeError(
        `token exchange failed (${response.status}${oauthError ? ` ${oauthError}` : ''})`,
        response.status,
        oauthError,
      );
    }
    return this.readGrant(response, 'token exchange');
  }

  async refreshAccessToken(refreshToken: string): Promise<ProviderTokenGrant> {
    if (!refreshToken) {
      throw new InvalidRequestError('refresh token required');
    }
    const response = await this.postForm(this.settings.tokenEndpoint, 'token refresh', {
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      refresh_token: refreshToken,
      grant_type: 'refresh_token',
    });
    if (!response.ok) {
      const oauthError = await this.readOAuthError(response, 'token refresh');
      const message = `token refresh failed (${response.status}${
        oauthError ? ` ${oauthError}` : ''
      })`;
      if ((response.status === 400 || response.status === 401) && oauthError === 'invalid_grant') {
        throw new RefreshTokenRejectedError(message, response.status, oauthError);
      }
      throw new UpstreamExchangeError(message, response.status, oauthError);
    }
    return this.readGrant(response, 'token refresh');
  }

  async revokeToken(token: string): Promise<void> {
    const response = await this.postForm(this.settings.revokeEndpoint, 'token revoke', { token });
    await response.body?.cancel();
    // 400 means Google no longer knows the token.
    if (response.status !== 200 && response.status !== 400) {
      throw new UpstreamExchangeError(`token revoke failed (${response.status})`, response.status);
    }
  }

  private ensureRedirectAllowed(): void {
    let host: string;
    try {
      host = new URL(this.settings.redirectUri).hostname.toLowerCase();
    } catch {
      throw new InvalidRequestError('redirect_uri is not a valid URL');
    }
    if (!this.allowedRedirectHosts.has(host)) {
      throw new InvalidRequestError(`redirect_uri host '${host}' is not allowed`);
    }
  }

  private async postForm(
    url: string,
    operation: string,
    form: Record<string, string>,
  ): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(form).toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw this.timedOut(operation, error);
      }
      throw new UpstreamExchangeError(
        `${operation} request failed: ${errorMessage(error)}`,
        undefined,
        undefined,
        { cause: error },
      );
    }
  }

  private async readOAuthError(response: Response, operation: string): Promise<string | undefined> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw this.timedOut(operation, error);
      }
      // An unreadable error body still leaves the status to report.
      return undefined;
    }
    const parsed = errorResponseSchema.safeParse(body);
    return parsed.success ? parsed.data.error : undefined;
  }

  private timedOut(operation: string, cause: unknown): UpstreamTimeoutError {
    return new UpstreamTimeoutError(`${operation} timed out after ${this.timeoutMs}ms`, { cause });
  }

  private async readGrant(response: Response, operation: string): Promise<ProviderTokenGrant> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw this.timedOut(operation, error);
      }
      throw new UpstreamExchangeError(
        `${operation} returned a non-JSON body`,
        response.status,
        undefined,
        { cause: error },
      );
    }
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamExchangeError(
        `${operation} returned a malformed token response`,
        response.status,
      );
    }
    const data = parsed.data;
    const expiresIn = Number(data.expires_in ?? 0);
    const expiresInMs = Number.isFinite(expiresIn) && expiresIn > 0 ? expiresIn * 1000 : 0;
    const scopes = parseScopes(data.scope);
    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token,
      expiresAt: this.now() + expiresInMs,
      scopes: scopes.length > 0 ? scopes : undefined,
      tokenType: data.token_type,
    };
  }
}
