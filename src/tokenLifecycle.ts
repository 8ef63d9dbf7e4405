import {
  DecryptionError,
  InvalidStateError,
  NotConnectedError,
  ReauthRequiredError,
  RefreshTokenRejectedError,
  WriteConflictError,
  errorMessage,
} from './errors.js';
import type { OAuthProvider } from './googleOAuthClient.js';
import { KeyedMutex } from './keyedMutex.js';
import { createLogger } from './log.js';
import type { StateCodec } from './stateCodec.js';
import type { TokenStore } from './tokenStore.js';
import type { CredentialRecord, ValidAccessToken } from './types.js';
import { normalizeUserId } from './userIdentity.js';

const log = createLogger('token-lifecycle');

export type TokenLifecycleOptions = {
  store: TokenStore;
  provider: OAuthProvider;
  stateCodec: StateCodec;
  /** Refresh once fewer than this many ms remain before expiry. */
  refreshMarginMs: number;
  /** Journal state nonces so a state token completes at most one flow. */
  singleUseState: boolean;
  /** Scopes recorded when Google's token response does not list them. */
  defaultScopes: readonly string[];
  now?: () => number;
};

export type CompletedFlow = {
  userId: string;
  scopes: string[];
  expiresAt: number;
};

export type RevokeOutcome = {
  /** False when there was nothing stored or the upstream call failed. */
  upstreamNotified: boolean;
};

/**
 * Per-user credential lifecycle: UNCONNECTED → CONNECTED ⇄ EXPIRED → REVOKED.
 *
 * Everything that reads a record and then writes it back runs under a per-user
 * lock, so concurrent callers for one user trigger at most one upstream refresh.
 */
export class TokenLifecycleManager {
  private readonly store: TokenStore;
  private readonly provider: OAuthProvider;
  private readonly stateCodec: StateCodec;
  private readonly refreshMarginMs: number;
  private readonly singleUseState: boolean;
  private readonly defaultScopes: readonly string[];
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();

  constructor(options: TokenLifecycleOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.stateCodec = options.stateCodec;
    this.refreshMarginMs = options.refreshMarginMs;
    this.singleUseState = options.singleUseState;
    this.defaultScopes = options.defaultScopes;
    this.now = options.now ?? Date.now;
  }

  beginFlow(rawUserId: string, options: { promptConsent?: boolean } = {}): string {
    const userId = normalizeUserId(rawUserId);
    const state = this.stateCodec.encode(userId);
    return this.provider.buildAuthorizationUrl(state, options);
  }

  async completeFlow(params: { code: string; state: string }): Promise<CompletedFlow> {
    const flow = this.stateCodec.decode(params.state);
    const userId = normalizeUserId(flow.userId);

    if (this.singleUseState) {
      const fresh = await this.store.consumeStateNonce(flow.nonce, flow.expiresAt);
      if (!fresh) {
        throw new InvalidStateError('State already used');
      }
    }

    const grant = await this.provider.exchangeCode(params.code);

    return this.locks.runExclusive(userId, async () => {
      const existing = await this.loadRecord(userId);
      // Google omits refresh_token on re-consent; keep the one we already hold.
      const refreshToken = grant.refreshToken ?? existing?.refreshToken;
      const record: CredentialRecord = {
        userId,
        accessToken: grant.accessToken,
        refreshToken,
        expiresAt: grant.expiresAt,
        scopes: grant.scopes ?? [...this.defaultScopes],
        updatedAt: this.nextUpdatedAt(existing),
      };
      await this.persist(record);
      log.info('credential stored', {
        userId,
        hasRefreshToken: Boolean(refreshToken),
        expiresAt: new Date(record.expiresAt).toISOString(),
      });
      return { userId, scopes: record.scopes, expiresAt: record.expiresAt };
    });
  }

  async getValidToken(rawUserId: string): Promise<ValidAccessToken> {
    const userId = normalizeUserId(rawUserId);

    const cached = await this.store.get(userId).catch(purgedAsReauth);
    if (!cached) {
      throw new NotConnectedError('No stored credential for user');
    }
    if (this.isFresh(cached)) {
      return toValidToken(cached);
    }

    return this.locks.runExclusive(userId, async () => {
      // Another caller may have refreshed while we waited for the lock.
      const current = await this.store.get(userId).catch(purgedAsReauth);
      if (!current) {
        throw new NotConnectedError('No stored credential for user');
      }
      if (this.isFresh(current)) {
        return toValidToken(current);
      }
      return this.refresh(current);
    });
  }

  async revoke(rawUserId: string): Promise<RevokeOutcome> {
    const userId = normalizeUserId(rawUserId);

    return this.locks.runExclusive(userId, async () => {
      const record = await this.loadRecord(userId);
      let upstreamNotified = false;
      if (record) {
        const token = record.refreshToken ?? record.accessToken;
        try {
          await this.provider.revokeToken(token);
          upstreamNotified = true;
        } catch (error) {
          log.warn('upstream revoke failed; deleting local credential anyway', {
            userId,
            error: errorMessage(error),
          });
        }
      }
      await this.store.delete(userId);
      log.info('credential revoked', { userId, hadCredential: Boolean(record), upstreamNotified });
      return { upstreamNotified };
    });
  }

  private isFresh(record: CredentialRecord): boolean {
    return this.now() < record.expiresAt - this.refreshMarginMs;
  }

  // Caller holds the user's lock.
  private async refresh(record: CredentialRecord): Promise<ValidAccessToken> {
    const { userId } = record;
    if (!record.refreshToken) {
      await this.store.delete(userId);
      log.warn('access token expired and no refresh token is stored; purged', { userId });
      throw new ReauthRequiredError('Access token expired and no refresh token is stored');
    }

    let grant;
    try {
      grant = await this.provider.refreshAccessToken(record.refreshToken);
    } catch (error) {
      if (error instanceof RefreshTokenRejectedError) {
        await this.store.delete(userId);
        log.warn('refresh token rejected upstream; purged', { userId, error: error.message });
        throw new ReauthRequiredError('Refresh token was rejected; user must reconnect', {
          cause: error,
        });
      }
      log.warn('token refresh failed; credential kept', { userId, error: errorMessage(error) });
      throw error;
    }

    const updated: CredentialRecord = {
      userId,
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken ?? record.refreshToken,
      expiresAt: grant.expiresAt,
      scopes: grant.scopes ?? record.scopes,
      updatedAt: this.nextUpdatedAt(record),
    };
    await this.persist(updated);
    log.info('access token refreshed', {
      userId,
      rotatedRefreshToken: Boolean(
        grant.refreshToken && grant.refreshToken !== record.refreshToken,
      ),
      expiresAt: new Date(updated.expiresAt).toISOString(),
    });
    return toValidToken(updated);
  }

  // Stamps strictly after the row being replaced, even when the clock lags it.
  private nextUpdatedAt(previous: CredentialRecord | null): number {
    return Math.max(this.now(), (previous?.updatedAt ?? 0) + 1);
  }

  // Caller holds the user's lock.
  private async persist(record: CredentialRecord): Promise<void> {
    const written = await this.store.put(record);
    if (!written) {
      log.error('credential write lost to a newer stored row', {
        userId: record.userId,
        updatedAt: record.updatedAt,
      });
      throw new WriteConflictError('A newer credential was stored concurrently');
    }
  }

  private async loadRecord(userId: string): Promise<CredentialRecord | null> {
    try {
      return await this.store.get(userId);
    } catch (error) {
      // The store has already purged an unreadable record.
      if (error instanceof DecryptionError) {
        return null;
      }
      throw error;
    }
  }
}

function toValidToken(record: CredentialRecord): ValidAccessToken {
  return {
    accessToken: record.accessToken,
    expiresAt: record.expiresAt,
    scopes: [...record.scopes],
  };
}

function purgedAsReauth(error: unknown): never {
  if (error instanceof DecryptionError) {
    throw new ReauthRequiredError('Stored credential was unreadable and has been removed', {
      cause: error,
    });
  }
  throw error;
}
